export interface Segment {
  start_time: number;
  end_time: number;
  text: string;
}

export interface TranscriptSet {
  language: string | null;
  segments: Segment[];
}

export interface Cue {
  index: number;
  start_time: number;
  end_time: number;
  lines: string[];
}

export const OUTPUT_FORMATS = ["srt"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface SubtitleConfigOptions {
  maxCharsPerSegment?: number;
  maxDurationSeconds?: number;
  maxLinesPerBlock?: number;
  outputFormat?: OutputFormat;
}
