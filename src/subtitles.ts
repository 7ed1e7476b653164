import fs from "node:fs";
import path from "node:path";

import { loadTranscript } from "./transcript";
import { Cue, OutputFormat, Segment, SubtitleConfigOptions, TranscriptSet } from "./types";

export const DEFAULT_MAX_CHARS_PER_SEGMENT = 80;
export const DEFAULT_MAX_DURATION_SECONDS = 7.0;
export const DEFAULT_MAX_LINES_PER_BLOCK = 2;
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "srt";

// Added to any window whose end would not be after its start.
export const MIN_DURATION_PADDING = 0.1;

// Duration splitting only kicks in well past the ceiling.
const DURATION_TOLERANCE = 1.5;

export const FORMAT_EXTENSIONS: Record<OutputFormat, string> = {
  srt: "srt"
};

export class FormattingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FormattingError";
  }
}

export class SubtitleConfig {
  max_chars_per_segment: number;
  max_duration_seconds: number;
  max_lines_per_block: number;
  output_format: OutputFormat;

  constructor(options: SubtitleConfigOptions = {}) {
    this.max_chars_per_segment = options.maxCharsPerSegment ?? DEFAULT_MAX_CHARS_PER_SEGMENT;
    this.max_duration_seconds = options.maxDurationSeconds ?? DEFAULT_MAX_DURATION_SECONDS;
    this.max_lines_per_block = options.maxLinesPerBlock ?? DEFAULT_MAX_LINES_PER_BLOCK;
    this.output_format = options.outputFormat ?? DEFAULT_OUTPUT_FORMAT;
  }

  get max_combined_chars(): number {
    return this.max_chars_per_segment * this.max_lines_per_block;
  }
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

function padEnd(start: number, end: number): number {
  return end > start ? end : start + MIN_DURATION_PADDING;
}

/**
 * Splits a segment that runs well past `maxDuration` into equal time windows.
 *
 * Words are divided by count, not by length: every piece but the last gets
 * `floor(words / pieces)` words and the last one takes the remainder. The
 * last piece always ends at the segment's own end.
 */
export function splitByDuration(segment: Segment, maxDuration: number): Segment[] {
  const duration = segment.end_time - segment.start_time;
  if (!(maxDuration > 0) || duration <= maxDuration * DURATION_TOLERANCE) {
    return [segment];
  }

  const pieceCount = Math.floor(duration / maxDuration) + 1;
  const pieceDuration = duration / pieceCount;
  const words = splitWords(segment.text);
  const wordsPerPiece = Math.floor(words.length / pieceCount);

  const pieces: Segment[] = [];
  let cursor = segment.start_time;
  let wordIndex = 0;

  for (let i = 0; i < pieceCount; i += 1) {
    const isLast = i === pieceCount - 1;
    const nextIndex = isLast ? words.length : Math.min(wordIndex + wordsPerPiece, words.length);
    const text = words.slice(wordIndex, nextIndex).join(" ");
    wordIndex = nextIndex;
    if (!text) {
      // the next emitted piece starts at the same cursor and absorbs this window
      continue;
    }

    const end = isLast
      ? segment.end_time
      : Math.min(cursor + pieceDuration, segment.end_time);
    const piece: Segment = { start_time: cursor, end_time: padEnd(cursor, end), text };
    pieces.push(piece);
    cursor = piece.end_time;
  }

  console.debug(
    `Split segment by duration (${duration.toFixed(2)}s > ${maxDuration.toFixed(2)}s) into ${pieces.length} parts`
  );
  return pieces;
}

export type PackerState = "mid-line" | "line-complete" | "cue-complete";

/**
 * Greedy word packer behind {@link splitByChars}. Words fill a line up to
 * `lineLimit` characters, closed lines fill a cue up to `maxLines`. A word
 * longer than `lineLimit` is never broken and gets a line to itself.
 */
export class CuePacker {
  private line = "";
  private lines: string[] = [];
  private current: PackerState = "mid-line";

  constructor(
    private readonly lineLimit: number,
    private readonly maxLines: number
  ) {}

  get state(): PackerState {
    return this.current;
  }

  /** Feeds one word; returns the lines of a cue when this word completed one. */
  push(word: string): string[] | null {
    if (this.line.length === 0) {
      this.line = word;
      this.current = "mid-line";
      return null;
    }
    if (this.line.length + 1 + word.length <= this.lineLimit) {
      this.line = `${this.line} ${word}`;
      this.current = "mid-line";
      return null;
    }

    this.lines.push(this.line);
    this.line = word;
    if (this.lines.length >= this.maxLines) {
      const completed = this.lines;
      this.lines = [];
      this.current = "cue-complete";
      return completed;
    }
    this.current = "line-complete";
    return null;
  }

  /** Returns whatever is still buffered as a final cue. */
  drain(): string[] | null {
    const remaining = this.line ? [...this.lines, this.line] : this.lines;
    this.lines = [];
    this.line = "";
    this.current = "cue-complete";
    return remaining.length > 0 ? remaining : null;
  }
}

/**
 * Splits a segment whose text exceeds `maxCombinedChars` into cues of at most
 * `maxLines` lines. Time is handed out in proportion to the characters each
 * cue consumes; the last cue ends at the segment's own end.
 */
export function splitByChars(
  segment: Segment,
  maxCombinedChars: number,
  maxLines: number
): Segment[] {
  const text = segment.text;
  if (text.length <= maxCombinedChars) {
    return [segment];
  }

  const words = splitWords(text);
  if (words.length === 0) {
    return [];
  }

  const lineCount = Math.max(1, Math.floor(maxLines));
  const lineLimit = Math.max(1, Math.floor(maxCombinedChars / lineCount));
  const duration = segment.end_time - segment.start_time;
  const timePerChar = text.length > 0 ? duration / text.length : 0;

  const packer = new CuePacker(lineLimit, lineCount);
  const pieces: Segment[] = [];
  let cueStart = segment.start_time;
  let consumed = 0;

  for (const word of words) {
    const lines = packer.push(word);
    if (!lines) {
      continue;
    }
    consumed += lines.join(" ").length + 1;
    const end = Math.min(segment.start_time + consumed * timePerChar, segment.end_time);
    const piece: Segment = {
      start_time: cueStart,
      end_time: padEnd(cueStart, end),
      text: lines.join("\n")
    };
    pieces.push(piece);
    cueStart = piece.end_time;
  }

  const rest = packer.drain();
  if (rest) {
    pieces.push({
      start_time: cueStart,
      end_time: padEnd(cueStart, segment.end_time),
      text: rest.join("\n")
    });
  }

  const result = pieces.filter((piece) => piece.text.trim().length > 0);
  if (result.length > 1) {
    console.debug(
      `Split segment by chars (${text.length} > ${maxCombinedChars}) into ${result.length} parts`
    );
  }
  return result;
}

/**
 * Final per-cue wrap: every line longer than `maxCharsPerLine` is re-wrapped
 * on word boundaries, then anything past `maxLines` is dropped.
 */
export function wrapCueLines(text: string, maxCharsPerLine: number, maxLines: number): string[] {
  const wrapped: string[] = [];
  for (const line of text.split("\n")) {
    let current = "";
    for (const word of splitWords(line)) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= maxCharsPerLine) {
        current = `${current} ${word}`;
      } else {
        wrapped.push(current);
        current = word;
      }
    }
    if (current) {
      wrapped.push(current);
    }
  }
  return wrapped.slice(0, Math.max(1, maxLines));
}

export function formatTimestamp(seconds: number): string {
  const safe = Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
  const totalMillis = Math.round(safe * 1000);
  const hours = Math.floor(totalMillis / 3_600_000);
  const minutes = Math.floor((totalMillis % 3_600_000) / 60_000);
  const secs = Math.floor((totalMillis % 60_000) / 1000);
  const millis = totalMillis % 1000;
  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")},${millis
    .toString()
    .padStart(3, "0")}`;
}

export function buildCues(
  transcript: TranscriptSet,
  config: SubtitleConfig = new SubtitleConfig()
): Cue[] {
  const cues: Cue[] = [];
  for (const segment of transcript.segments) {
    const words = splitWords(segment.text);
    if (words.length === 0) {
      console.debug(`Skipping empty segment at ${formatTimestamp(segment.start_time)}`);
      continue;
    }

    // Line breaks inside a piece are the packer's own; input whitespace is flattened first.
    const flattened: Segment = { ...segment, text: words.join(" ") };
    const pieces = splitByDuration(flattened, config.max_duration_seconds).flatMap((piece) =>
      splitByChars(piece, config.max_combined_chars, config.max_lines_per_block)
    );

    for (const piece of pieces) {
      const lines = wrapCueLines(piece.text, config.max_chars_per_segment, config.max_lines_per_block);
      if (lines.length === 0) {
        continue;
      }
      let end = piece.end_time;
      if (end <= piece.start_time) {
        console.warn(
          `Segment at ${formatTimestamp(piece.start_time)} has zero or negative duration. Extending it by ${MIN_DURATION_PADDING}s.`
        );
        end = piece.start_time + MIN_DURATION_PADDING;
      }
      cues.push({
        index: cues.length + 1,
        start_time: piece.start_time,
        end_time: end,
        lines
      });
    }
  }
  return cues;
}

export interface CueSink {
  write(chunk: string): void;
}

function renderCue(format: OutputFormat, index: number, cue: Cue): string {
  switch (format) {
    case "srt":
      return `${[
        `${index}`,
        `${formatTimestamp(cue.start_time)} --> ${formatTimestamp(cue.end_time)}`,
        ...cue.lines
      ].join("\n")}\n\n`;
  }
}

/** Writes cues block by block, renumbering them from 1. Returns the count written. */
export function writeCues(
  cues: Cue[],
  sink: CueSink,
  format: OutputFormat = DEFAULT_OUTPUT_FORMAT
): number {
  cues.forEach((cue, position) => {
    const index = position + 1;
    let end = cue.end_time;
    if (end <= cue.start_time) {
      console.warn(
        `Subtitle ${index} has zero or negative duration (${formatTimestamp(cue.start_time)} -> ${formatTimestamp(end)}). Adjusting end time.`
      );
      end = cue.start_time + MIN_DURATION_PADDING;
    }
    const block = renderCue(format, index, { ...cue, end_time: end });
    try {
      sink.write(block);
    } catch (error) {
      throw new FormattingError(
        `Could not write subtitle ${index}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  });
  return cues.length;
}

function openForWriting(resolved: string): number {
  try {
    return fs.openSync(resolved, "w");
  } catch (error) {
    throw new FormattingError(
      `Could not open ${resolved} for writing: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

// A close failure is only raised when it is the first thing to go wrong.
function closeAfterWriting(fd: number, resolved: string, written: boolean): void {
  try {
    fs.closeSync(fd);
  } catch (error) {
    const message = `Could not close ${resolved}: ${error instanceof Error ? error.message : String(error)}`;
    if (written) {
      throw new FormattingError(message, { cause: error });
    }
    console.warn(message);
  }
}

export function writeSubtitleFile(
  cues: Cue[],
  outputPath: string,
  format: OutputFormat = DEFAULT_OUTPUT_FORMAT
): string {
  const resolved = path.resolve(outputPath);
  const fd = openForWriting(resolved);
  let written = false;
  try {
    writeCues(
      cues,
      {
        write: (chunk) => {
          fs.writeSync(fd, chunk, null, "utf-8");
        }
      },
      format
    );
    written = true;
  } finally {
    closeAfterWriting(fd, resolved, written);
  }
  return resolved;
}

/** Runs the whole pipeline for one transcript and writes the result. */
export function segmentAndFormat(
  transcript: TranscriptSet,
  config: SubtitleConfig,
  outputPath: string
): string {
  console.info(
    `Segmentation rules: max_chars=${config.max_chars_per_segment}, max_duration=${config.max_duration_seconds}s, max_lines=${config.max_lines_per_block}`
  );
  const cues = buildCues(transcript, config);
  const resolved = path.resolve(outputPath);
  console.info(`Writing ${cues.length} subtitles to ${resolved}`);
  return writeSubtitleFile(cues, resolved, config.output_format);
}

export function srt(
  transcript: TranscriptSet | string,
  outputPath = "subtitles.srt",
  config: SubtitleConfig = new SubtitleConfig()
): string {
  const data = typeof transcript === "string" ? loadTranscript(transcript) : transcript;
  return segmentAndFormat(data, config, outputPath);
}
