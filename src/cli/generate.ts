#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import path from "node:path";

import { DEFAULT_API_KEY_ENV, TranscriptionClient, requireApiKey } from "../api";
import { loadConfig, subtitleConfigFrom, withOverrides } from "../config";
import { SubtitleGenerator } from "../generator";
import { TranslationClient } from "../translator";

const TRANSLATION_KEY_ENV = "CUESMITH_TRANSLATION_API_KEY";

function buildCommand(): Command {
  const program = new Command();
  program
    .description(
      "Transcribe media and write source-language and translated SRT subtitles."
    )
    .option("--media <path>", "Path to a single audio or video file")
    .option("--input-dir <path>", "Process every media file in this directory")
    .option("--output-dir <path>", "Directory for the subtitle files (single-file mode)", ".")
    .option("--config <path>", "Path to a JSON configuration file")
    .option("--model <name>", "Transcription model to use")
    .option("--source-language <code>", "Spoken language of the media")
    .option("--target-language <code>", "Language to translate subtitles into")
    .option("--translation-url <url>", "Base URL of the translation service");
  return program;
}

async function main(argv: string[]): Promise<number> {
  const program = buildCommand();
  program.exitOverride();

  try {
    const options = program.parse(argv).opts<{
      media?: string;
      inputDir?: string;
      outputDir: string;
      config?: string;
      model?: string;
      sourceLanguage?: string;
      targetLanguage?: string;
      translationUrl?: string;
    }>();

    if (!options.media && !options.inputDir) {
      throw new Error("Provide either --media or --input-dir.");
    }

    const config = withOverrides(loadConfig(options.config), {
      transcription_model: options.model,
      source_language: options.sourceLanguage,
      target_language: options.targetLanguage,
      translation_base_url: options.translationUrl
    });

    const transcriber = new TranscriptionClient(
      requireApiKey(DEFAULT_API_KEY_ENV),
      config.transcription_base_url
    );
    let translator: TranslationClient | undefined;
    if (config.target_language) {
      if (!config.translation_base_url) {
        throw new Error("A target language needs translation_base_url or --translation-url.");
      }
      translator = new TranslationClient(
        config.translation_base_url,
        process.env[TRANSLATION_KEY_ENV]
      );
    }

    const generator = new SubtitleGenerator({
      config: subtitleConfigFrom(config),
      transcriber,
      model: config.transcription_model,
      sourceLanguage: config.source_language,
      translator,
      targetLanguage: config.target_language
    });

    if (options.inputDir) {
      const summary = await generator.generateAll(options.inputDir);
      return summary.failed > 0 ? 1 : 0;
    }
    if (options.media) {
      const result = await generator.generate(options.media, path.resolve(options.outputDir));
      console.info(`Subtitles saved to ${result.sourcePath}`);
      if (result.translatedPath) {
        console.info(`Translated subtitles saved to ${result.translatedPath}`);
      }
    }
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
