/**
 * Detached file transcription through a TranscribeAudio function (Whisper in
 * production). Near-empty recordings are skipped and well-known Whisper
 * hallucinations on silence are reported as an empty transcript.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import logger, { describeError } from "../logger";
import type { TranscribeAudio } from "../speechServices";
import { WAV_HEADER_BYTES } from "../audio/wav";
import type { Transcriber, TranscriptionResult } from "./transcriber";

/** About 0.15s of 16kHz mono audio. */
export const MIN_AUDIO_BYTES = 4800;

/** Whole-transcript outputs Whisper produces for silence. */
const HALLUCINATION_PHRASES = [
  "silence",
  "music",
  "applause",
  "the end",
  "bye bye",
  "see you next time",
  "subtitles",
  "you",
];

/** Fragments that mark a transcript as a hallucination wherever they occur. */
const HALLUCINATION_MARKERS = [
  "thanks for watching",
  "thank you for watching",
  "like and subscribe",
  "please subscribe",
  "sous-titres",
  "amara.org",
];

export function isHallucination(text: string): boolean {
  const lower = text.toLowerCase().trim();
  const bare = lower.replace(/[^a-z0-9\s]/g, "").replace(/\s+/g, " ").trim();
  if (HALLUCINATION_PHRASES.includes(bare)) return true;
  return HALLUCINATION_MARKERS.some((marker) => lower.includes(marker));
}

export interface WhisperTranscriberOptions {
  /** Undefined disables transcription; every file yields "". */
  transcribe: TranscribeAudio | undefined;
  readAudio?: (filePath: string) => Promise<Buffer>;
}

export class WhisperTranscriber implements Transcriber {
  private readonly transcribe: TranscribeAudio | undefined;
  private readonly readAudio: (filePath: string) => Promise<Buffer>;

  constructor(options: WhisperTranscriberOptions) {
    this.transcribe = options.transcribe;
    this.readAudio = options.readAudio ?? ((filePath) => readFile(filePath));
  }

  startTranscription(filePath: string, onComplete: (result: TranscriptionResult) => void): void {
    this.transcribeFile(filePath)
      .then(
        (text) => onComplete({ ok: true, text }),
        (err: unknown) => onComplete({ ok: false, error: err instanceof Error ? err : new Error(String(err)) })
      )
      .catch((err: unknown) => {
        logger.error("stt", "Transcription callback threw", { filePath, error: describeError(err) });
      });
  }

  async transcribeFile(filePath: string): Promise<string> {
    if (this.transcribe === undefined) {
      logger.debug("stt", "[DISABLED] skipping transcription", { filePath });
      return "";
    }

    const wav = await this.readAudio(filePath);
    if (wav.length - WAV_HEADER_BYTES < MIN_AUDIO_BYTES) {
      logger.info("stt", "Skipped - recording too short", { filePath, bytes: wav.length });
      return "";
    }

    const start = Date.now();
    const text = (await this.transcribe(wav, basename(filePath))).trim();
    if (isHallucination(text)) {
      logger.info("stt", `Filtered hallucination "${text}"`);
      return "";
    }

    logger.info("stt", `"${text}" in ${Date.now() - start}ms`);
    return text;
  }
}
