/**
 * In-process stand-ins for the speaker/microphone and the transcription
 * service, plus a harness that wires them to a runner and a memory store.
 */
import type { Cue, SpeechDevice } from "../src/audio/speechDevice";
import type { CancelledTrialPolicy } from "../src/config";
import { TaskRunner } from "../src/runner/taskRunner";
import { MemoryResponseStore } from "../src/store/responseStore";
import type { Transcriber, TranscriptionResult } from "../src/transcription/transcriber";
import type { Task, TaskContext } from "../src/types/task";

process.env.ASSESS_LOG_LEVEL = process.env.ASSESS_LOG_LEVEL ?? "silent";

export const RECORDED_SECONDS = 1.5;

export class FakeSpeechDevice implements SpeechDevice {
  spoken: string[] = [];
  cues: Cue[] = [];
  recordings: string[] = [];
  stopCount = 0;
  failRecording = false;
  failSpeech = false;
  /** Delay before capture is open, as when the recorder process is still spawning. */
  startDelayMs = 0;
  onSpeak: ((text: string) => void) | undefined;
  private recording = false;

  get isRecording(): boolean {
    return this.recording;
  }

  async speak(text: string): Promise<void> {
    this.spoken.push(text);
    this.onSpeak?.(text);
    if (this.failSpeech) throw new Error("speaker unavailable");
  }

  async playCue(cue: Cue): Promise<void> {
    this.cues.push(cue);
  }

  async startRecording(destination: string): Promise<void> {
    if (this.startDelayMs > 0) await delay(this.startDelayMs);
    if (this.failRecording) throw new Error("microphone unavailable");
    this.recording = true;
    this.recordings.push(destination);
  }

  async stopRecording(): Promise<number> {
    this.recording = false;
    this.stopCount++;
    return RECORDED_SECONDS;
  }
}

/** A string is delivered as text, an Error as a failure, null never calls back. */
export type ScriptedTranscript = string | Error | null;

export class FakeTranscriber implements Transcriber {
  requests: string[] = [];

  constructor(
    private readonly script: ScriptedTranscript[] = [],
    private readonly delayMs = 0
  ) {}

  startTranscription(filePath: string, onComplete: (result: TranscriptionResult) => void): void {
    this.requests.push(filePath);
    const next = this.script.length > 0 ? this.script.shift() : "";
    if (next === null || next === undefined) return;
    const result: TranscriptionResult = next instanceof Error ? { ok: false, error: next } : { ok: true, text: next };
    setTimeout(() => onComplete(result), this.delayMs);
  }
}

export interface HarnessOptions {
  transcripts?: ScriptedTranscript[];
  transcriptDelayMs?: number;
  timeScale?: number;
  policy?: CancelledTrialPolicy;
  store?: MemoryResponseStore;
}

export interface Harness {
  store: MemoryResponseStore;
  device: FakeSpeechDevice;
  transcriber: FakeTranscriber;
  runner: TaskRunner;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const store = options.store ?? new MemoryResponseStore();
  const device = new FakeSpeechDevice();
  const transcriber = new FakeTranscriber(options.transcripts ?? [], options.transcriptDelayMs ?? 0);
  const runner = new TaskRunner({
    store,
    device,
    transcriber,
    recordingsDir: "test-recordings",
    timing: { timeScale: options.timeScale ?? 0.01, tickMs: 500 },
    cancelledTrialPolicy: options.policy ?? "recall",
  });
  return { store, device, transcriber, runner };
}

/** Task whose body is supplied by the test. */
export class ScriptedTask implements Task {
  readonly kind = "workingMemory";
  readonly title = "Scripted";
  readonly instructions = "";
  captured: string[] = [];

  constructor(
    private readonly body: (ctx: TaskContext) => Promise<void>,
    readonly id = "scripted-task",
    readonly expectedInputType: "audio" | "text" | "none" = "audio"
  ) {}

  run(ctx: TaskContext): Promise<void> {
    return this.body(ctx);
  }

  captureResponse(text: string): void {
    this.captured.push(text);
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolve the first time the runner enters the given state. */
export function nextState(runner: TaskRunner, state: string): Promise<void> {
  return new Promise((resolve) => {
    const listener = (s: string) => {
      if (s === state) {
        runner.off("state", listener);
        resolve();
      }
    };
    runner.on("state", listener);
  });
}
