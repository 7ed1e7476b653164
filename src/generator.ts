import fs from "node:fs";
import path from "node:path";

import { SpeechToText } from "./api";
import { FORMAT_EXTENSIONS, SubtitleConfig, segmentAndFormat } from "./subtitles";
import { Translator, translateTranscript } from "./translator";

export const MEDIA_EXTENSIONS = new Set([
  ".mp4",
  ".mkv",
  ".mov",
  ".webm",
  ".mp3",
  ".wav",
  ".m4a",
  ".flac",
  ".ogg"
]);

export interface MediaFile {
  path: string;
  size: number;
}

/** Media files directly inside `inputDir`, smallest first. */
export function findMediaFiles(inputDir: string): MediaFile[] {
  const resolved = path.resolve(inputDir);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Input directory not found: ${resolved}`);
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw new Error(`Input path is not a directory: ${resolved}`);
  }

  console.info(`Scanning ${resolved} for media files`);
  const files: MediaFile[] = [];
  for (const entry of fs.readdirSync(resolved, { withFileTypes: true })) {
    if (!entry.isFile() || !MEDIA_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
      continue;
    }
    const filePath = path.join(resolved, entry.name);
    files.push({ path: filePath, size: fs.statSync(filePath).size });
  }
  files.sort((a, b) => a.size - b.size);
  console.info(`Found ${files.length} media files`);
  return files;
}

export interface SubtitleGeneratorOptions {
  config: SubtitleConfig;
  transcriber: SpeechToText;
  model: string;
  sourceLanguage?: string;
  translator?: Translator;
  targetLanguage?: string;
}

export interface GenerationResult {
  sourcePath: string;
  translatedPath: string | null;
}

export interface BatchSummary {
  processed: number;
  failed: number;
  results: GenerationResult[];
}

export class SubtitleGenerator {
  constructor(private readonly options: SubtitleGeneratorOptions) {}

  private outputName(mediaPath: string, language: string): string {
    const base = path.parse(mediaPath).name;
    return `${base}.${language}.${FORMAT_EXTENSIONS[this.options.config.output_format]}`;
  }

  /**
   * Transcribes one media file and writes its subtitles, then the translated
   * subtitles when a translator and target language are configured.
   */
  async generate(
    mediaPath: string,
    outputDir: string,
    translatedOutputDir: string = outputDir
  ): Promise<GenerationResult> {
    const started = Date.now();
    const resolved = path.resolve(mediaPath);
    if (!fs.existsSync(resolved)) {
      throw new Error(`Media file not found: ${resolved}`);
    }
    console.info(`Starting subtitle generation for ${resolved}`);
    fs.mkdirSync(outputDir, { recursive: true });

    const { config, transcriber, translator, targetLanguage } = this.options;
    console.info("Transcribing media...");
    const transcript = await transcriber.transcribe(resolved, {
      model: this.options.model,
      language: this.options.sourceLanguage
    });
    if (transcript.segments.length === 0) {
      throw new Error(`Transcription of ${resolved} produced no segments.`);
    }

    const sourceLanguage = this.options.sourceLanguage ?? transcript.language ?? "und";
    const sourcePath = segmentAndFormat(
      transcript,
      config,
      path.join(outputDir, this.outputName(resolved, sourceLanguage))
    );

    let translatedPath: string | null = null;
    if (translator && targetLanguage) {
      console.info(`Translating ${transcript.segments.length} segments to ${targetLanguage}...`);
      const translated = await translateTranscript(transcript, translator, targetLanguage, sourceLanguage);
      if (translated.segments.length === 0) {
        console.warn(`Translation produced no segments. Skipping ${targetLanguage} subtitles.`);
      } else {
        fs.mkdirSync(translatedOutputDir, { recursive: true });
        translatedPath = segmentAndFormat(
          translated,
          config,
          path.join(translatedOutputDir, this.outputName(resolved, targetLanguage))
        );
      }
    }

    console.info(
      `Finished ${path.basename(resolved)} in ${((Date.now() - started) / 1000).toFixed(2)}s`
    );
    return { sourcePath, translatedPath };
  }

  /**
   * Processes every media file in `inputDir`, smallest first, writing into
   * `<inputDir>/Subs/<language>`. A failing file is logged and skipped.
   */
  async generateAll(inputDir: string): Promise<BatchSummary> {
    const files = findMediaFiles(inputDir);
    const subsDir = path.join(path.resolve(inputDir), "Subs");
    const sourceDir = path.join(subsDir, this.options.sourceLanguage ?? "source");
    const targetDir = path.join(subsDir, this.options.targetLanguage ?? "translated");

    const summary: BatchSummary = { processed: 0, failed: 0, results: [] };
    for (const [i, file] of files.entries()) {
      console.info(`[${i + 1}/${files.length}] ${path.basename(file.path)}`);
      try {
        summary.results.push(await this.generate(file.path, sourceDir, targetDir));
        summary.processed += 1;
      } catch (error) {
        summary.failed += 1;
        console.error(
          `Failed to generate subtitles for ${file.path}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    console.info(`Batch finished: ${summary.processed} processed, ${summary.failed} failed`);
    return summary;
  }
}
