/**
 * ALSA speech device
 *
 * Plays synthesised speech and cue tones through `aplay` and captures to a
 * WAV file with `arecord`. With `disabled` set, nothing is spawned: speech
 * is logged and recordings are written as empty WAV files.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import logger, { describeError } from "../logger";
import type { SynthesizeSpeech } from "../speechServices";
import { TTS_SAMPLE_RATE } from "../speechServices";
import type { Cue, SpeechDevice } from "./speechDevice";
import { createTone, createWavBuffer } from "./wav";

const SAMPLE_FORMAT = "S16_LE";
const CHANNELS = 1;

const CUES: Record<Cue, { frequencyHz: number; durationMs: number }> = {
  start: { frequencyHz: 880, durationMs: 150 },
  end: { frequencyHz: 440, durationMs: 200 },
};

export interface AlsaSpeechDeviceOptions {
  synthesize: SynthesizeSpeech;
  inputDevice: string;
  outputDevice: string;
  /** Capture rate; playback always runs at the TTS rate. */
  sampleRate: number;
  disabled: boolean;
}

interface Capture {
  process?: ChildProcess;
  exited: Promise<void>;
  startedAt: number;
  filePath: string;
}

export class AlsaSpeechDevice implements SpeechDevice {
  private capture: Capture | undefined;

  constructor(private readonly options: AlsaSpeechDeviceOptions) {}

  get isRecording(): boolean {
    return this.capture !== undefined;
  }

  async speak(text: string): Promise<void> {
    if (this.options.disabled) {
      logger.info("speech", `[DISABLED] ${text}`);
      return;
    }
    const pcm = await this.options.synthesize(text);
    await this.play(pcm);
  }

  async playCue(cue: Cue): Promise<void> {
    if (this.options.disabled) {
      logger.debug("speech", `[DISABLED] cue ${cue}`);
      return;
    }
    const { frequencyHz, durationMs } = CUES[cue];
    await this.play(createTone(frequencyHz, durationMs, TTS_SAMPLE_RATE));
  }

  async startRecording(destination: string): Promise<void> {
    if (this.capture) {
      throw new Error(`Already recording to ${this.capture.filePath}`);
    }
    await mkdir(dirname(destination), { recursive: true });

    if (this.options.disabled) {
      await writeFile(destination, createWavBuffer(Buffer.alloc(0), this.options.sampleRate, CHANNELS));
      this.capture = { exited: Promise.resolve(), startedAt: Date.now(), filePath: destination };
      logger.debug("capture", `[DISABLED] recording to ${destination}`);
      return;
    }

    const arecord = spawn(
      "arecord",
      [
        "-t", "wav", "-f", SAMPLE_FORMAT, "-c", String(CHANNELS),
        "-r", String(this.options.sampleRate), "-q", "-D", this.options.inputDevice, destination,
      ],
      { stdio: ["ignore", "ignore", "inherit"] }
    );

    await new Promise<void>((resolve, reject) => {
      arecord.once("spawn", () => resolve());
      arecord.once("error", reject);
    });

    const exited = new Promise<void>((resolve) => {
      arecord.once("exit", () => resolve());
    });
    arecord.on("error", (err) => {
      logger.error("capture", "arecord error", { error: describeError(err) });
    });

    this.capture = { process: arecord, exited, startedAt: Date.now(), filePath: destination };
    logger.debug("capture", `Recording to ${destination}`);
  }

  async stopRecording(): Promise<number> {
    const capture = this.capture;
    if (capture === undefined) return 0;
    this.capture = undefined;

    capture.process?.kill("SIGTERM");
    await capture.exited;
    const seconds = (Date.now() - capture.startedAt) / 1000;
    logger.debug("capture", `Stopped after ${seconds.toFixed(1)}s`, { filePath: capture.filePath });
    return seconds;
  }

  private play(pcm: Buffer): Promise<void> {
    const start = Date.now();
    return new Promise((resolve, reject) => {
      const aplay = spawn(
        "aplay",
        [
          "-t", "raw", "-f", SAMPLE_FORMAT, "-c", String(CHANNELS),
          "-r", String(TTS_SAMPLE_RATE), "-q", "-D", this.options.outputDevice, "-",
        ],
        { stdio: ["pipe", "ignore", "inherit"] }
      );

      aplay.on("error", reject);
      aplay.on("exit", (code) => {
        if (code === 0) {
          logger.debug("speech", `Played ${pcm.length} bytes in ${Date.now() - start}ms`);
          resolve();
        } else {
          reject(new Error(`aplay exited with code ${code}`));
        }
      });

      aplay.stdin?.write(pcm);
      aplay.stdin?.end();
    });
  }
}
