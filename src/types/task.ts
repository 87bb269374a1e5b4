/**
 * Task contract and the state shared between the runner and the tasks.
 */

import type { CancelledTrialPolicy } from "../config";
import type { SpeechDevice } from "../audio/speechDevice";
import type { ResponseStore } from "../store/responseStore";
import type { Timing } from "../runner/waits";
import type { TaskRunner } from "../runner/taskRunner";

export type RunnerState = "idle" | "presenting" | "recording" | "evaluating" | "completed";

export type TaskKind =
  | "workingMemory"
  | "delayedRecall"
  | "attention"
  | "language"
  | "abstraction"
  | "orientation";

export type ExpectedInputType = "audio" | "text" | "none";

export type TranscriptKind =
  | "instruction"
  | "stimulus"
  | "prompt"
  | "letter"
  | "calculationPrompt"
  | "fluencyPrompt"
  | "response"
  | "feedback";

export interface TranscriptItem {
  id: string;
  text: string;
  kind: TranscriptKind;
  timestamp: string;
  highlighted: boolean;
}

/** Ids created on entry into `recording` for the current trial. */
export interface TrialHandle {
  responseId: string;
  audioClipId?: string;
}

export interface TaskContext {
  runner: TaskRunner;
  store: ResponseStore;
  device: SpeechDevice;
  sessionId: string;
  signal: AbortSignal;
  timing: Timing;
  cancelledTrialPolicy: CancelledTrialPolicy;
}

export interface Task {
  readonly id: string;
  readonly kind: TaskKind;
  readonly title: string;
  readonly instructions: string;
  readonly expectedInputType: ExpectedInputType;
  run(ctx: TaskContext): Promise<void>;
  /** Typed input from a presentation layer, forwarded by runner.captureResponse(). */
  captureResponse?(text: string): void;
}
