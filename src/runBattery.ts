#!/usr/bin/env node
/**
 * Battery Runner
 *
 * Administers the full assessment on this machine's speaker and microphone.
 *
 * Usage:
 *   OPENAI_API_KEY=... npx tsx src/runBattery.ts
 *   ASSESS_AUDIO_DISABLE=1 ASSESS_TIME_SCALE=0.01 npx tsx src/runBattery.ts
 */

import { AlsaSpeechDevice } from "./audio/alsaSpeechDevice";
import { Battery, registerPatient } from "./battery";
import { loadConfig } from "./config";
import logger, { describeError } from "./logger";
import { TaskRunner } from "./runner/taskRunner";
import { createOpenAiClient, createSpeechSynthesizer, createWhisperTranscribe } from "./speechServices";
import { MemoryResponseStore } from "./store/responseStore";
import { WhisperTranscriber } from "./transcription/whisperTranscriber";

async function main(): Promise<number> {
  const config = loadConfig();
  const store = new MemoryResponseStore();

  const client = config.audio.disabled ? undefined : createOpenAiClient(config);
  const device = new AlsaSpeechDevice({
    synthesize: client === undefined ? async () => Buffer.alloc(0) : createSpeechSynthesizer(client, config),
    inputDevice: config.audio.inputDevice,
    outputDevice: config.audio.outputDevice,
    sampleRate: config.audio.sampleRate,
    disabled: config.audio.disabled,
  });
  const transcriber = new WhisperTranscriber({
    transcribe: client === undefined ? undefined : createWhisperTranscribe(client, config),
  });

  const runner = new TaskRunner({
    store,
    device,
    transcriber,
    recordingsDir: config.recordingsDir,
    timing: config.timing,
    cancelledTrialPolicy: config.cancelledTrialPolicy,
  });

  const battery = new Battery(runner, store, {
    place: config.orientation.place,
    city: config.orientation.city,
  });

  const onSignal = () => {
    battery.cancel().catch((err: unknown) => {
      logger.error("cli", "Cancel failed", { error: describeError(err) });
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const patient = await registerPatient(store, config.patientName);
  const result = await battery.run(patient.id);

  console.log("\nBattery Result:");
  console.log(JSON.stringify(result, null, 2));

  return result.session.status === "completed" ? 0 : 2;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("Battery error:", err);
    process.exit(1);
  }
);
