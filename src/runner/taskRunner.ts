/**
 * Task Runner
 *
 * Single state machine driving one task at a time:
 *
 *   idle -> presenting -> recording -> evaluating -> ... -> completed
 *
 * Side effects happen on entry to a state. `recording` starts capture and
 * creates the trial's AudioClip and ItemResponse; `evaluating` stops capture
 * and starts a detached transcription; `completed` finalises the current
 * ItemResponse. Events: "state" (RunnerState), "prompt" (string),
 * "transcript" (TranscriptItem).
 */

import { EventEmitter } from "node:events";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { CancelledTrialPolicy } from "../config";
import type { SpeechDevice } from "../audio/speechDevice";
import type { Transcriber, TranscriptionResult } from "../transcription/transcriber";
import type { ResponseStore } from "../store/responseStore";
import { StoreError, TaskRunnerError } from "../errors";
import logger, { describeError } from "../logger";
import { nowIso, type AudioClip, type ItemResponse } from "../types/records";
import type {
  RunnerState,
  Task,
  TaskContext,
  TranscriptItem,
  TranscriptKind,
  TrialHandle,
} from "../types/task";
import { createDeferred, type Deferred } from "./deferred";
import type { Timing } from "./waits";

export type TranscriptionOutcome =
  | { status: "text"; text: string }
  | { status: "timeout" }
  | { status: "failed" }
  | { status: "cancelled" }
  | { status: "unavailable" };

export interface TaskRunnerOptions {
  store: ResponseStore;
  device: SpeechDevice;
  transcriber: Transcriber;
  recordingsDir: string;
  timing: Timing;
  cancelledTrialPolicy: CancelledTrialPolicy;
}

export class TaskRunner extends EventEmitter {
  readonly store: ResponseStore;
  readonly device: SpeechDevice;
  private readonly transcriber: Transcriber;
  private readonly recordingsDir: string;
  private readonly timing: Timing;
  private readonly cancelledTrialPolicy: CancelledTrialPolicy;

  private _state: RunnerState = "idle";
  private task: Task | undefined;
  private sessionId: string | undefined;
  private controller: AbortController | undefined;
  private handle: TrialHandle | undefined;
  private _prompt = "";
  private log: TranscriptItem[] = [];
  private readonly pending = new Map<string, Deferred<TranscriptionOutcome>>();

  constructor(options: TaskRunnerOptions) {
    super();
    this.store = options.store;
    this.device = options.device;
    this.transcriber = options.transcriber;
    this.recordingsDir = options.recordingsDir;
    this.timing = options.timing;
    this.cancelledTrialPolicy = options.cancelledTrialPolicy;
  }

  get state(): RunnerState {
    return this._state;
  }

  get currentTask(): Task | undefined {
    return this.task;
  }

  get currentSessionId(): string | undefined {
    return this.sessionId;
  }

  /** Ids of the trial opened by the latest entry into `recording`. */
  get trialHandle(): TrialHandle | undefined {
    return this.handle;
  }

  get prompt(): string {
    return this._prompt;
  }

  get transcript(): readonly TranscriptItem[] {
    return this.log;
  }

  /** Transcriptions started by this run that have not called back yet. */
  get pendingTranscriptions(): number {
    return this.pending.size;
  }

  get isCancelled(): boolean {
    return this.controller?.signal.aborted ?? false;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Run a task to completion. Rejects with INVALID_STATE while another task is
   * running. If the task throws, the runner returns to idle and the error is
   * rethrown; otherwise it ends in completed.
   */
  async start(task: Task, sessionId: string): Promise<void> {
    if (this.task !== undefined && this._state !== "idle" && this._state !== "completed") {
      throw TaskRunnerError.invalidState(`Cannot start ${task.title}: ${this.task.title} is ${this._state}`);
    }
    this.reset();

    this.task = task;
    this.sessionId = sessionId;
    const controller = new AbortController();
    this.controller = controller;
    logger.info("runner", `Starting ${task.title}`, { taskId: task.id, sessionId });

    await this.transition("presenting");

    const ctx: TaskContext = {
      runner: this,
      store: this.store,
      device: this.device,
      sessionId,
      signal: controller.signal,
      timing: this.timing,
      cancelledTrialPolicy: this.cancelledTrialPolicy,
    };

    try {
      await task.run(ctx);
    } catch (err) {
      logger.error("runner", `${task.title} failed`, { error: describeError(err) });
      if (this.controller === controller) {
        await this.transition("idle");
      }
      throw err;
    }

    // stop() completes a cancelled run; a later start() may also have taken over
    if (this.controller === controller && !controller.signal.aborted && this._state !== "completed") {
      await this.transition("completed");
    }
    logger.info("runner", `Finished ${task.title}`, { cancelled: controller.signal.aborted });
  }

  /**
   * Cancel the active task. Signals cancellation before touching capture so
   * that the task's waits return on their next tick.
   */
  async stop(): Promise<void> {
    if (this._state === "idle" || this._state === "completed") {
      throw TaskRunnerError.invalidState(`Cannot stop while ${this._state}`);
    }
    logger.info("runner", "Stopping task", { taskId: this.task?.id, state: this._state });
    this.controller?.abort();

    if (this.device.isRecording) {
      await this.stopCapture();
    }

    // The cancelled trial still writes its own score; completion must not race it
    this.handle = undefined;
    await this.transition("completed");
    this.task = undefined;
  }

  /** Clear all scratch state and return to idle. */
  reset(): void {
    this.task = undefined;
    this.sessionId = undefined;
    this.controller = undefined;
    this.handle = undefined;
    this._prompt = "";
    this.log = [];
    // A transcriber that never calls back must not pin its clip past the run
    for (const deferred of this.pending.values()) {
      deferred.resolve({ status: "cancelled" });
    }
    this.pending.clear();
    if (this._state !== "idle") {
      logger.transition(this._state, "idle", { reason: "reset" });
      this._state = "idle";
      this.emit("state", this._state);
    }
  }

  /**
   * Move to a new state and run its entry side effects. Requests from a
   * cancelled task for anything but idle or completed are ignored.
   */
  async transition(next: RunnerState): Promise<void> {
    if (this.isCancelled && next !== "completed" && next !== "idle") {
      logger.debug("runner", `Ignoring ${next} after cancellation`);
      return;
    }
    logger.transition(this._state, next, { taskId: this.task?.id });
    this._state = next;
    this.emit("state", next);

    switch (next) {
      case "recording":
        await this.enterRecording();
        break;
      case "evaluating":
        await this.enterEvaluating();
        break;
      case "completed":
        await this.enterCompleted();
        break;
      case "idle":
      case "presenting":
        break;
    }
  }

  // ==========================================================================
  // Responses
  // ==========================================================================

  /**
   * Record typed input for the active task: update the current response's
   * text, or create a text-only response, then forward it to the task.
   */
  async captureResponse(text: string): Promise<ItemResponse> {
    const task = this.task;
    const sessionId = this.sessionId;
    if (task === undefined || sessionId === undefined) {
      throw TaskRunnerError.noActiveTask();
    }

    const existing = this.handle ? await this.store.fetch("itemResponse", this.handle.responseId) : undefined;
    let response: ItemResponse;
    if (existing) {
      response = await this.store.update("itemResponse", { ...existing, responseText: text, updatedAt: nowIso() });
    } else {
      const now = nowIso();
      response = await this.store.create("itemResponse", {
        id: randomUUID(),
        sessionId,
        taskId: task.id,
        responseText: text,
        createdAt: now,
        updatedAt: now,
      });
      this.handle = { responseId: response.id };
    }

    task.captureResponse?.(text);
    return response;
  }

  /**
   * Wait for the clip's transcription. Resolves immediately with text already
   * stored on the clip, or with "unavailable" when nothing is transcribing it.
   */
  async awaitTranscription(
    clipId: string | undefined,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<TranscriptionOutcome> {
    if (clipId === undefined) return { status: "unavailable" };

    try {
      const clip = await this.store.fetch("audioClip", clipId);
      if (clip?.transcription !== undefined) {
        return { status: "text", text: clip.transcription };
      }
    } catch (err) {
      logger.warn("runner", "Could not read audio clip", { clipId, error: describeError(err) });
    }

    const pending = this.pending.get(clipId);
    if (pending === undefined) return { status: "unavailable" };
    if (signal.aborted) return { status: "cancelled" };

    return new Promise<TranscriptionOutcome>((resolve) => {
      const finish = (outcome: TranscriptionOutcome) => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      };
      const onAbort = () => finish({ status: "cancelled" });
      const timer = setTimeout(() => finish({ status: "timeout" }), Math.max(0, timeoutMs));
      signal.addEventListener("abort", onAbort, { once: true });
      void pending.promise.then(finish);
    });
  }

  // ==========================================================================
  // Presentation scratch state
  // ==========================================================================

  setPrompt(text: string): void {
    this._prompt = text;
    this.emit("prompt", text);
  }

  /** Append a line to the running transcript log. */
  note(text: string, kind: TranscriptKind, highlighted = false): TranscriptItem {
    const item: TranscriptItem = { id: randomUUID(), text, kind, timestamp: nowIso(), highlighted };
    this.log.push(item);
    this.emit("transcript", item);
    return item;
  }

  // ==========================================================================
  // Entry side effects
  // ==========================================================================

  private async enterRecording(): Promise<void> {
    const task = this.task;
    const sessionId = this.sessionId;
    const controller = this.controller;
    this.handle = undefined;
    if (task === undefined || sessionId === undefined || task.expectedInputType !== "audio") return;

    if (this.device.isRecording) {
      await this.stopCapture();
    }

    const filePath = join(this.recordingsDir, `${randomUUID()}.wav`);
    let audioClipId: string | undefined;
    try {
      await this.device.startRecording(filePath);
      if (await this.abandonedRecording(controller)) return;
      const now = nowIso();
      const clip = await this.store.create("audioClip", {
        id: randomUUID(),
        filePath,
        duration: 0,
        createdAt: now,
        updatedAt: now,
      });
      audioClipId = clip.id;
    } catch (err) {
      logger.warn("runner", "Capture unavailable, continuing without audio", { error: describeError(err) });
    }
    if (await this.abandonedRecording(controller)) return;

    try {
      const now = nowIso();
      const response = await this.store.create("itemResponse", {
        id: randomUUID(),
        sessionId,
        taskId: task.id,
        ...(audioClipId !== undefined ? { audioClipId } : {}),
        createdAt: now,
        updatedAt: now,
      });
      if (await this.abandonedRecording(controller)) return;
      this.handle = { responseId: response.id, ...(audioClipId !== undefined ? { audioClipId } : {}) };
    } catch (err) {
      logger.error("runner", "Could not create item response", { error: describeError(err) });
    }
  }

  /**
   * True once the run that entered `recording` has been stopped or replaced.
   * stop() may land while capture is still starting and see no active capture,
   * so the capture opened here is released and no handle is set.
   */
  private async abandonedRecording(controller: AbortController | undefined): Promise<boolean> {
    if (controller !== undefined && this.controller === controller && !controller.signal.aborted) return false;
    logger.info("runner", "Run stopped while capture was starting");
    if (this.device.isRecording) {
      await this.stopCapture();
    }
    return true;
  }

  private async enterEvaluating(): Promise<void> {
    if (this.device.isRecording) {
      await this.stopCapture();
    }

    const clipId = this.handle?.audioClipId;
    if (clipId === undefined) return;

    let clip: AudioClip | undefined;
    try {
      clip = await this.store.fetch("audioClip", clipId);
    } catch (err) {
      logger.warn("runner", "Could not read audio clip", { clipId, error: describeError(err) });
    }
    if (clip === undefined) return;

    const deferred = createDeferred<TranscriptionOutcome>();
    this.pending.set(clipId, deferred);
    try {
      this.transcriber.startTranscription(clip.filePath, (result) => {
        this.completeTranscription(clipId, result, deferred).catch((err: unknown) => {
          logger.error("runner", "Transcription callback failed", { clipId, error: describeError(err) });
        });
      });
    } catch (err) {
      logger.warn("runner", "Could not start transcription", { clipId, error: describeError(err) });
      this.pending.delete(clipId);
      deferred.resolve({ status: "failed" });
    }
  }

  private async enterCompleted(): Promise<void> {
    const responseId = this.handle?.responseId;
    if (responseId === undefined) return;
    try {
      const response = await this.store.fetch("itemResponse", responseId);
      if (response) {
        await this.store.update("itemResponse", { ...response, updatedAt: nowIso() });
      }
    } catch (err) {
      logger.warn("runner", "Could not finalise item response", { responseId, error: describeError(err) });
    }
  }

  /** Stop capture and backfill the current clip's duration. */
  private async stopCapture(): Promise<void> {
    try {
      const duration = await this.device.stopRecording();
      const clipId = this.handle?.audioClipId;
      if (clipId === undefined) return;
      const clip = await this.store.fetch("audioClip", clipId);
      if (clip) {
        await this.store.update("audioClip", { ...clip, duration, updatedAt: nowIso() });
      }
    } catch (err) {
      logger.warn("runner", "Could not stop capture", { error: describeError(err) });
    }
  }

  /**
   * Detached completion of a transcription. Writes only the clip's
   * transcription field; the last delivered text wins.
   */
  private async completeTranscription(
    clipId: string,
    result: TranscriptionResult,
    deferred: Deferred<TranscriptionOutcome>
  ): Promise<void> {
    try {
      if (!result.ok) {
        logger.warn("runner", "Transcription failed", { clipId, error: result.error.message });
        deferred.resolve({ status: "failed" });
        return;
      }

      try {
        const clip = await this.store.fetch("audioClip", clipId);
        if (clip === undefined) {
          throw new StoreError("NOT_FOUND", `audioClip ${clipId} not found`);
        }
        if (clip.transcription !== result.text) {
          await this.store.update("audioClip", { ...clip, transcription: result.text, updatedAt: nowIso() });
        }
        logger.debug("runner", "Transcription stored", { clipId, length: result.text.length });
      } catch (err) {
        logger.error("runner", "Could not store transcription", { clipId, error: describeError(err) });
      }
      deferred.resolve({ status: "text", text: result.text });
    } finally {
      if (this.pending.get(clipId) === deferred) {
        this.pending.delete(clipId);
      }
    }
  }
}
