import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { DEFAULT_BASE_URL, DEFAULT_TRANSCRIPTION_MODEL } from "./api";
import {
  DEFAULT_MAX_CHARS_PER_SEGMENT,
  DEFAULT_MAX_DURATION_SECONDS,
  DEFAULT_MAX_LINES_PER_BLOCK,
  DEFAULT_OUTPUT_FORMAT,
  SubtitleConfig
} from "./subtitles";
import { OUTPUT_FORMATS } from "./types";

export const DEFAULT_CONFIG_FILE = "cuesmith.config.json";

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

const AppConfigSchema = z
  .object({
    max_chars_per_segment: z.number().int().positive().default(DEFAULT_MAX_CHARS_PER_SEGMENT),
    max_duration_seconds: z.number().positive().default(DEFAULT_MAX_DURATION_SECONDS),
    max_lines_per_block: z.number().int().positive().default(DEFAULT_MAX_LINES_PER_BLOCK),
    output_format: z.enum(OUTPUT_FORMATS).default(DEFAULT_OUTPUT_FORMAT),
    transcription_model: z.string().min(1).default(DEFAULT_TRANSCRIPTION_MODEL),
    transcription_base_url: z.string().url().default(DEFAULT_BASE_URL),
    translation_base_url: z.string().url().optional(),
    source_language: z.string().min(1).default("en"),
    target_language: z.string().min(1).optional()
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function parseConfig(data: unknown, source = "configuration"): AppConfig {
  const parsed = AppConfigSchema.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigurationError(`Invalid ${source}: ${details}`);
  }
  return parsed.data;
}

/**
 * Loads a JSON configuration file. Without an explicit path a missing
 * `cuesmith.config.json` in the working directory just means defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);
  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigurationError(`Configuration file not found: ${resolved}`);
    }
    return parseConfig({});
  }
  if (!fs.statSync(resolved).isFile()) {
    throw new ConfigurationError(`Configuration path is not a file: ${resolved}`);
  }

  console.info(`Loading configuration from ${resolved}`);
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read configuration file ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigurationError(`Invalid configuration in ${resolved}: root must be an object`);
  }
  return parseConfig(data, `configuration in ${resolved}`);
}

/** Applies command-line overrides on top of a loaded configuration. */
export function withOverrides(config: AppConfig, overrides: Partial<AppConfig>): AppConfig {
  const merged: Record<string, unknown> = { ...config };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      console.info(`Overriding ${key} from command line`);
      merged[key] = value;
    }
  }
  return parseConfig(merged, "command-line options");
}

export function subtitleConfigFrom(config: AppConfig): SubtitleConfig {
  return new SubtitleConfig({
    maxCharsPerSegment: config.max_chars_per_segment,
    maxDurationSeconds: config.max_duration_seconds,
    maxLinesPerBlock: config.max_lines_per_block,
    outputFormat: config.output_format
  });
}
