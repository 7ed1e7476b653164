import fs from "node:fs";
import path from "node:path";

import {
  DEFAULT_API_KEY_ENV,
  DEFAULT_BASE_URL,
  DEFAULT_TRANSCRIPTION_MODEL,
  SpeechToText,
  TranscriptionClient,
  requireApiKey
} from "./api";
import { saveTranscript } from "./transcript";
import { TranscriptSet } from "./types";

export interface TranscribeOptions {
  model?: string;
  language?: string;
  prompt?: string;
  client?: SpeechToText;
  baseUrl?: string;
  apiKeyEnv?: string;
  searchEnvPaths?: string[];
}

function ensureClient(options: TranscribeOptions): SpeechToText {
  if (options.client) {
    return options.client;
  }
  const apiKey = requireApiKey(options.apiKeyEnv ?? DEFAULT_API_KEY_ENV, {
    searchPaths: options.searchEnvPaths
  });
  return new TranscriptionClient(apiKey, options.baseUrl ?? DEFAULT_BASE_URL);
}

export async function transcribeAudioFile(
  mediaPath: string,
  options: TranscribeOptions = {}
): Promise<TranscriptSet> {
  const resolved = path.resolve(mediaPath);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Media file not found: ${resolved}`);
  }

  const client = ensureClient(options);
  const model = options.model ?? DEFAULT_TRANSCRIPTION_MODEL;
  console.info(`Transcribing ${resolved} (model=${model}, language=${options.language ?? "auto"})`);
  const transcript = await client.transcribe(resolved, {
    model,
    language: options.language,
    prompt: options.prompt
  });
  console.info(`Transcription complete. Found ${transcript.segments.length} segments.`);
  return transcript;
}

export async function transcribeToFile(
  options: TranscribeOptions & { mediaPath: string; outputPath: string }
): Promise<TranscriptSet> {
  const transcript = await transcribeAudioFile(options.mediaPath, options);
  saveTranscript(transcript, options.outputPath);
  return transcript;
}
