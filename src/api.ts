import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import FormData from "form-data";
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import { TranscriptSet } from "./types";

export const DEFAULT_BASE_URL = "https://api.openai.com";
export const DEFAULT_TRANSCRIPTION_MODEL = "whisper-1";
export const DEFAULT_API_KEY_ENV = "CUESMITH_API_KEY";

export class TranscriptionApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TranscriptionApiError";
  }
}

function loadEnvFile(filePath: string): void {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    console.debug(
      `Skipping env file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
    return;
  }
  const parsed = dotenv.parse(content);
  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

function candidateEnvPaths(extraPaths?: string[]): string[] {
  const seen = new Set<string>();
  const add = (p: string): void => {
    seen.add(path.resolve(p));
  };

  if (extraPaths) {
    for (const p of extraPaths) {
      add(p);
    }
    return Array.from(seen);
  }

  add(path.join(process.cwd(), ".env"));
  add(path.join(path.resolve(__dirname, ".."), ".env"));

  return Array.from(seen);
}

/**
 * Reads an API key from the environment, falling back to `.env` files in the
 * working directory and the package root. When `searchPaths` is given only
 * those files are consulted.
 */
export function requireApiKey(
  envVar = DEFAULT_API_KEY_ENV,
  options?: { searchPaths?: string[] }
): string {
  let apiKey = process.env[envVar];
  if (!apiKey) {
    for (const envPath of candidateEnvPaths(options?.searchPaths)) {
      if (fs.existsSync(envPath)) {
        loadEnvFile(envPath);
        apiKey = process.env[envVar];
        if (apiKey) {
          break;
        }
      }
    }
  }

  if (!apiKey) {
    throw new Error(
      `${envVar} is not set.\n` +
        "Create an API key for your transcription provider and export it:\n" +
        `  export ${envVar}=<YOUR_API_KEY>`
    );
  }
  return apiKey;
}

const VerboseSegmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string()
});

const VerboseTranscriptionSchema = z.object({
  language: z.string().nullish(),
  text: z.string().optional(),
  segments: z.array(VerboseSegmentSchema).optional()
});

export interface TranscriptionRequest {
  model: string;
  language?: string;
  prompt?: string;
}

/** Anything that turns a media file into timed segments. */
export interface SpeechToText {
  transcribe(mediaPath: string, request: TranscriptionRequest): Promise<TranscriptSet>;
}

/**
 * Client for an OpenAI-compatible `/v1/audio/transcriptions` endpoint,
 * always asking for `verbose_json` so that segment timings come back.
 */
export class TranscriptionClient implements SpeechToText {
  private readonly client: AxiosInstance;

  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = DEFAULT_BASE_URL,
    adapter?: AxiosAdapter
  ) {
    this.client = axios.create({
      baseURL: this.baseUrl,
      headers: {
        Authorization: `Bearer ${this.apiKey}`
      },
      timeout: 600_000,
      maxBodyLength: Infinity,
      validateStatus: () => true,
      adapter
    });
  }

  async transcribe(mediaPath: string, request: TranscriptionRequest): Promise<TranscriptSet> {
    const resolved = path.resolve(mediaPath);
    const form = new FormData();
    form.append("file", fs.createReadStream(resolved));
    form.append("model", request.model);
    form.append("response_format", "verbose_json");
    if (request.language) {
      form.append("language", request.language);
    }
    if (request.prompt) {
      form.append("prompt", request.prompt);
    }

    let response: AxiosResponse;
    try {
      response = await this.client.post("/v1/audio/transcriptions", form, {
        headers: form.getHeaders()
      });
    } catch (error) {
      throw new TranscriptionApiError(
        `Transcription request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (response.status !== 200) {
      throw new TranscriptionApiError(
        `Transcription failed: ${response.status} ${response.statusText}`
      );
    }

    const parsed = VerboseTranscriptionSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TranscriptionApiError(
        `Unexpected transcription response: ${JSON.stringify(response.data)}`
      );
    }

    const segments = parsed.data.segments ?? [];
    if (segments.length === 0 && parsed.data.text?.trim()) {
      throw new TranscriptionApiError(
        "Transcription response has text but no timed segments."
      );
    }

    return {
      language: parsed.data.language ?? request.language ?? null,
      segments: segments.map((segment) => ({
        start_time: segment.start,
        end_time: segment.end,
        text: segment.text.trim()
      }))
    };
  }
}

export default TranscriptionClient;
