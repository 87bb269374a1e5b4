/**
 * Runtime configuration, read from environment variables and validated with zod.
 */

import { z } from "zod";
import { ConfigError } from "./errors";

const flag = z
  .enum(["0", "1", "true", "false"])
  .default("0")
  .transform((v) => v === "1" || v === "true");

export const CancelledTrialPolicySchema = z.enum(["recall", "all", "none"]);
export type CancelledTrialPolicy = z.infer<typeof CancelledTrialPolicySchema>;

export const TtsVoiceSchema = z.enum(["alloy", "echo", "fable", "onyx", "nova", "shimmer"]);
export type TtsVoice = z.infer<typeof TtsVoiceSchema>;

const EnvSchema = z.object({
  ASSESS_TIME_SCALE: z.coerce.number().positive().default(1),
  ASSESS_TICK_MS: z.coerce.number().int().positive().default(500),
  ASSESS_RECORDINGS_DIR: z.string().min(1).default("recordings"),
  ASSESS_CANCEL_POLICY: CancelledTrialPolicySchema.default("recall"),
  ASSESS_PLACE: z.string().min(1).default("hospital"),
  ASSESS_CITY: z.string().min(1).default("St. Louis"),
  ASSESS_PATIENT_NAME: z.string().min(1).default("Anonymous"),
  ASSESS_AUDIO_DISABLE: flag,
  ASSESS_AUDIO_INPUT_DEVICE: z.string().min(1).default("pulse"),
  ASSESS_AUDIO_OUTPUT_DEVICE: z.string().min(1).default("pulse"),
  ASSESS_SAMPLE_RATE: z.coerce.number().int().min(8000).max(48000).default(16000),
  ASSESS_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  ASSESS_API_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  OPENAI_TTS_MODEL: z.string().min(1).default("tts-1"),
  OPENAI_TTS_VOICE: TtsVoiceSchema.default("nova"),
  OPENAI_STT_MODEL: z.string().min(1).default("whisper-1"),
});

export interface AssessmentConfig {
  timing: {
    /** Multiplier applied to every wait; 1 is real time. */
    timeScale: number;
    /** Granularity of cancellation checks during timed recordings. */
    tickMs: number;
  };
  recordingsDir: string;
  cancelledTrialPolicy: CancelledTrialPolicy;
  orientation: { place: string; city: string };
  patientName: string;
  audio: {
    disabled: boolean;
    inputDevice: string;
    outputDevice: string;
    sampleRate: number;
  };
  api: { timeoutMs: number; retries: number };
  openai: { ttsModel: string; ttsVoice: TtsVoice; sttModel: string };
}

/**
 * Parse configuration from an environment map. Unset and empty variables take
 * their defaults; malformed ones raise a ConfigError listing every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AssessmentConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    timing: { timeScale: e.ASSESS_TIME_SCALE, tickMs: e.ASSESS_TICK_MS },
    recordingsDir: e.ASSESS_RECORDINGS_DIR,
    cancelledTrialPolicy: e.ASSESS_CANCEL_POLICY,
    orientation: { place: e.ASSESS_PLACE, city: e.ASSESS_CITY },
    patientName: e.ASSESS_PATIENT_NAME,
    audio: {
      disabled: e.ASSESS_AUDIO_DISABLE,
      inputDevice: e.ASSESS_AUDIO_INPUT_DEVICE,
      outputDevice: e.ASSESS_AUDIO_OUTPUT_DEVICE,
      sampleRate: e.ASSESS_SAMPLE_RATE,
    },
    api: { timeoutMs: e.ASSESS_API_TIMEOUT_MS, retries: e.ASSESS_API_RETRIES },
    openai: {
      ttsModel: e.OPENAI_TTS_MODEL,
      ttsVoice: e.OPENAI_TTS_VOICE,
      sttModel: e.OPENAI_STT_MODEL,
    },
  };
}
