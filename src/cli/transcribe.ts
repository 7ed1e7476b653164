#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import fs from "node:fs";
import path from "node:path";

import { loadConfig, withOverrides } from "../config";
import { transcribeToFile } from "../transcriber";

function buildCommand(): Command {
  const program = new Command();
  program
    .description("Transcribe an audio or video file and save the timed transcript JSON.")
    .option("--media <path>", "Path to the local audio or video file", "audio.wav")
    .option("--output <path>", "Path to save the transcript JSON", "transcript.json")
    .option("--config <path>", "Path to a JSON configuration file")
    .option("--model <name>", "Transcription model to use")
    .option("--language <code>", "Spoken language of the media")
    .option("--base-url <url>", "Override the transcription API base URL");
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      media: string;
      output: string;
      config?: string;
      model?: string;
      language?: string;
      baseUrl?: string;
    }>();

    const mediaPath = path.resolve(options.media);
    if (!fs.existsSync(mediaPath)) {
      throw new Error(`Media file not found: ${mediaPath}`);
    }
    console.info(`Using local media file ${mediaPath}`);

    const config = withOverrides(loadConfig(options.config), {
      transcription_model: options.model,
      transcription_base_url: options.baseUrl,
      source_language: options.language
    });

    await transcribeToFile({
      mediaPath,
      outputPath: options.output,
      model: config.transcription_model,
      language: config.source_language,
      baseUrl: config.transcription_base_url
    });
    console.info(`Saved transcript JSON to ${path.resolve(options.output)}`);
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
    (code) => {
      process.exit(code);
    },
    (err) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  );
}

export default main;
