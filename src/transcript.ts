import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { Segment, TranscriptSet } from "./types";

// Both the transcriber's `start`/`end` keys and the pipeline's own names are accepted.
const SegmentSchema = z
  .object({
    start: z.number().optional(),
    end: z.number().optional(),
    start_time: z.number().optional(),
    end_time: z.number().optional(),
    text: z.string().default("")
  })
  .transform((value, ctx): Segment => {
    const start = value.start_time ?? value.start;
    const end = value.end_time ?? value.end;
    if (start === undefined || end === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "segment needs start and end times"
      });
      return z.NEVER;
    }
    return { start_time: start, end_time: end, text: value.text.trim() };
  });

const TranscriptSchema = z.object({
  language: z.string().nullish(),
  segments: z.array(SegmentSchema)
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseTranscript(data: unknown): TranscriptSet {
  const parsed = TranscriptSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(`Invalid transcript: ${describeIssues(parsed.error)}`);
  }
  return {
    language: parsed.data.language ?? null,
    segments: parsed.data.segments
  };
}

export function loadTranscript(filePath: string): TranscriptSet {
  const resolved = path.resolve(filePath);
  console.info(`Loading transcript from ${resolved}`);
  const raw = fs.readFileSync(resolved, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Transcript ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseTranscript(data);
}

export function saveTranscript(transcript: TranscriptSet, outputPath: string): string {
  const resolved = path.resolve(outputPath);
  const payload = {
    language: transcript.language,
    segments: transcript.segments.map((segment) => ({
      start: segment.start_time,
      end: segment.end_time,
      text: segment.text
    }))
  };
  console.info(`Writing transcript JSON to ${resolved}`);
  fs.writeFileSync(resolved, `${JSON.stringify(payload, null, 2)}\n`, { encoding: "utf-8" });
  return resolved;
}
