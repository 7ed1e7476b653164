export {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_TRANSCRIPTION_MODEL,
  TranscriptionClient,
  TranscriptionApiError,
  requireApiKey
} from "./api";

export type { SpeechToText, TranscriptionRequest } from "./api";

export {
  DEFAULT_CONFIG_FILE,
  ConfigurationError,
  loadConfig,
  parseConfig,
  subtitleConfigFrom,
  withOverrides
} from "./config";

export type { AppConfig } from "./config";

export {
  SubtitleConfig,
  CuePacker,
  FormattingError,
  DEFAULT_MAX_CHARS_PER_SEGMENT,
  DEFAULT_MAX_DURATION_SECONDS,
  DEFAULT_MAX_LINES_PER_BLOCK,
  MIN_DURATION_PADDING,
  splitByDuration,
  splitByChars,
  wrapCueLines,
  formatTimestamp,
  buildCues,
  writeCues,
  writeSubtitleFile,
  segmentAndFormat,
  srt
} from "./subtitles";

export type { CueSink, PackerState } from "./subtitles";

export { loadTranscript, parseTranscript, saveTranscript } from "./transcript";

export { transcribeAudioFile, transcribeToFile } from "./transcriber";

export type { TranscribeOptions } from "./transcriber";

export { TranslationClient, TranslationError, translateTranscript } from "./translator";

export type { Translator } from "./translator";

export { SubtitleGenerator, findMediaFiles, MEDIA_EXTENSIONS } from "./generator";

export type { BatchSummary, GenerationResult, MediaFile } from "./generator";

export { OUTPUT_FORMATS } from "./types";

export type { Cue, OutputFormat, Segment, SubtitleConfigOptions, TranscriptSet } from "./types";
