import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { TranscriptionApiError, TranscriptionClient, requireApiKey } from "../src/api";

const ENV_VAR = "TS_CUESMITH_API_KEY_TEST";
let originalValue: string | undefined;

beforeEach(() => {
  originalValue = process.env[ENV_VAR];
  delete process.env[ENV_VAR];
});

afterEach(() => {
  if (originalValue !== undefined) {
    process.env[ENV_VAR] = originalValue;
  } else {
    delete process.env[ENV_VAR];
  }
});

function replyWith(status: number, data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return { data, status, statusText: status === 200 ? "OK" : "Server Error", headers: {}, config };
  };
}

function mediaFile(): string {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cuesmith-"));
  const mediaPath = path.join(tmpDir, "clip.wav");
  fs.writeFileSync(mediaPath, "RIFF");
  return mediaPath;
}

describe("requireApiKey", () => {
  it("loads API key from .env file", () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cuesmith-"));
    const envPath = path.join(tempDir, ".env");
    fs.writeFileSync(envPath, `${ENV_VAR}=from-env-file\n`, { encoding: "utf-8" });

    const apiKey = requireApiKey(ENV_VAR, { searchPaths: [envPath] });

    expect(apiKey).toBe("from-env-file");
    expect(process.env[ENV_VAR]).toBe("from-env-file");
  });

  it("prefers a key already in the environment", () => {
    process.env[ENV_VAR] = "from-process";
    expect(requireApiKey(ENV_VAR, { searchPaths: [] })).toBe("from-process");
  });

  it("throws when key missing", () => {
    expect(() => requireApiKey("TS_MISSING_KEY", { searchPaths: [] })).toThrowError(
      "TS_MISSING_KEY is not set."
    );
  });
});

describe("TranscriptionClient", () => {
  it("maps verbose segments into a transcript", async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const client = new TranscriptionClient(
      "test-key",
      "https://transcribe.example.test",
      replyWith(
        200,
        {
          language: "english",
          text: "Hello there. General greeting.",
          segments: [
            { id: 0, start: 0, end: 1.5, text: " Hello there. " },
            { id: 1, start: 1.5, end: 3.25, text: " General greeting." }
          ]
        },
        seen
      )
    );

    const transcript = await client.transcribe(mediaFile(), { model: "whisper-1", language: "en" });

    expect(transcript).toEqual({
      language: "english",
      segments: [
        { start_time: 0, end_time: 1.5, text: "Hello there." },
        { start_time: 1.5, end_time: 3.25, text: "General greeting." }
      ]
    });
    expect(seen).toHaveLength(1);
    expect(seen[0].url).toBe("/v1/audio/transcriptions");
    expect(seen[0].method).toBe("post");
    expect(seen[0].baseURL).toBe("https://transcribe.example.test");
  });

  it("falls back to the requested language", async () => {
    const client = new TranscriptionClient(
      "test-key",
      undefined,
      replyWith(200, { segments: [{ start: 0, end: 1, text: "Hola" }] })
    );
    const transcript = await client.transcribe(mediaFile(), { model: "whisper-1", language: "es" });
    expect(transcript.language).toBe("es");
  });

  it("rejects error statuses", async () => {
    const client = new TranscriptionClient("test-key", undefined, replyWith(500, { error: "boom" }));
    await expect(client.transcribe(mediaFile(), { model: "whisper-1" })).rejects.toThrowError(
      new TranscriptionApiError("Transcription failed: 500 Server Error")
    );
  });

  it("rejects responses without timed segments", async () => {
    const client = new TranscriptionClient("test-key", undefined, replyWith(200, { text: "untimed" }));
    await expect(client.transcribe(mediaFile(), { model: "whisper-1" })).rejects.toThrowError(
      "Transcription response has text but no timed segments."
    );
  });

  it("wraps transport failures", async () => {
    const failing: AxiosAdapter = async () => {
      throw new Error("socket hang up");
    };
    const client = new TranscriptionClient("test-key", undefined, failing);
    await expect(client.transcribe(mediaFile(), { model: "whisper-1" })).rejects.toThrowError(
      "Transcription request failed: socket hang up"
    );
  });
});
