import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";

import { Segment, TranscriptSet } from "./types";

const PROGRESS_EVERY = 20;

export class TranslationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TranslationError";
  }
}

export interface Translator {
  translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string>;
}

const TranslateResponseSchema = z.object({
  translatedText: z.string()
});

/** Client for a LibreTranslate-compatible `/translate` endpoint. */
export class TranslationClient implements Translator {
  private readonly client: AxiosInstance;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey?: string,
    adapter?: AxiosAdapter
  ) {
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: 60_000,
      validateStatus: () => true,
      adapter
    });
  }

  async translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string> {
    const payload: Record<string, string> = {
      q: text,
      source: sourceLanguage,
      target: targetLanguage,
      format: "text"
    };
    if (this.apiKey) {
      payload.api_key = this.apiKey;
    }

    let response: AxiosResponse;
    try {
      response = await this.client.post("/translate", payload);
    } catch (error) {
      throw new TranslationError(
        `Translation request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (response.status !== 200) {
      throw new TranslationError(`Translation failed: ${response.status} ${response.statusText}`);
    }
    const parsed = TranslateResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TranslationError(
        `Unexpected translation response: ${JSON.stringify(response.data)}`
      );
    }
    return parsed.data.translatedText.trim();
  }
}

/**
 * Translates a transcript segment by segment, keeping every segment's timing.
 * Segments that fail to translate, or translate to nothing, are left out.
 */
export async function translateTranscript(
  transcript: TranscriptSet,
  translator: Translator,
  targetLanguage: string,
  sourceLanguage: string = transcript.language ?? "auto"
): Promise<TranscriptSet> {
  const segments: Segment[] = [];
  const total = transcript.segments.length;

  for (const [i, segment] of transcript.segments.entries()) {
    try {
      const text = await translator.translate(segment.text, sourceLanguage, targetLanguage);
      if (text) {
        segments.push({ start_time: segment.start_time, end_time: segment.end_time, text });
      } else {
        console.warn(`Segment ${i + 1} translated to empty text. Skipping segment.`);
      }
    } catch (error) {
      if (!(error instanceof TranslationError)) {
        throw error;
      }
      console.warn(
        `Failed to translate segment ${i + 1} ('${segment.text.slice(0, 30)}...'): ${error.message}. Skipping segment.`
      );
    }
    if ((i + 1) % PROGRESS_EVERY === 0 || i === total - 1) {
      console.info(`Translated segment ${i + 1}/${total}`);
    }
  }

  return { language: targetLanguage, segments };
}
