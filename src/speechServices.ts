/**
 * OpenAI speech services: text-to-speech for prompts and Whisper for
 * transcription. Both go through withRetry; the SDK's own retries are off.
 */

import OpenAI, { toFile } from "openai";
import type { AssessmentConfig } from "./config";
import logger from "./logger";
import { withRetry } from "./retry";

/** OpenAI "pcm" speech is 24kHz mono S16_LE. */
export const TTS_SAMPLE_RATE = 24000;

export type SynthesizeSpeech = (text: string) => Promise<Buffer>;
export type TranscribeAudio = (wav: Buffer, filename: string) => Promise<string>;

export function createOpenAiClient(config: AssessmentConfig): OpenAI {
  return new OpenAI({ timeout: config.api.timeoutMs, maxRetries: 0 });
}

export function createSpeechSynthesizer(client: OpenAI, config: AssessmentConfig): SynthesizeSpeech {
  return async (text) => {
    const start = Date.now();
    const response = await withRetry(
      () =>
        client.audio.speech.create({
          model: config.openai.ttsModel,
          voice: config.openai.ttsVoice,
          input: text,
          response_format: "pcm",
        }),
      "TTS",
      { maxRetries: config.api.retries }
    );
    const buffer = Buffer.from(await response.arrayBuffer());
    logger.debug("tts", `${buffer.length} bytes in ${Date.now() - start}ms`, { text: text.slice(0, 60) });
    return buffer;
  };
}

export function createWhisperTranscribe(client: OpenAI, config: AssessmentConfig): TranscribeAudio {
  return async (wav, filename) => {
    const file = await toFile(wav, filename, { type: "audio/wav" });
    const response = await withRetry(
      () =>
        client.audio.transcriptions.create({
          model: config.openai.sttModel,
          file,
          language: "en",
        }),
      "STT",
      { maxRetries: config.api.retries }
    );
    return response.text;
  };
}
