#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import fs from "node:fs";
import path from "node:path";

import { loadConfig, subtitleConfigFrom, withOverrides } from "../config";
import { srt } from "../subtitles";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Convert a timed transcript JSON into an SRT subtitle file.")
    .option("--input <path>", "Path to the transcript JSON", "transcript.json")
    .option("--output <path>", "Path for the generated SRT file", "subtitles.srt")
    .option("--config <path>", "Path to a JSON configuration file")
    .option(
      "--max-chars <value>",
      "Maximum characters per subtitle line",
      (value) => parseInt(value, 10)
    )
    .option(
      "--max-duration <seconds>",
      "Maximum duration of a single subtitle",
      (value) => parseFloat(value)
    )
    .option(
      "--max-lines <value>",
      "Maximum number of lines per subtitle",
      (value) => parseInt(value, 10)
    );
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      input: string;
      output: string;
      config?: string;
      maxChars?: number;
      maxDuration?: number;
      maxLines?: number;
    }>();

    const inputPath = path.resolve(options.input);
    if (!fs.existsSync(inputPath)) {
      throw new Error(`Input file not found: ${inputPath}`);
    }

    const config = withOverrides(loadConfig(options.config), {
      max_chars_per_segment: options.maxChars,
      max_duration_seconds: options.maxDuration,
      max_lines_per_block: options.maxLines
    });

    const written = srt(inputPath, options.output, subtitleConfigFrom(config));
    console.info(`Wrote subtitles to ${written}`);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError && error.code === "commander.helpDisplayed") {
      return 0;
    }
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  }
}

if (require.main === module) {
  main(process.argv).then(
    (code) => process.exit(code),
    (error) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export default main;
