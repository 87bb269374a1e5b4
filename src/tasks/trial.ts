/**
 * Generic recorded trial: announce, present stimuli, prompt, record for a
 * fixed time, wait for the transcript, score and write the result back.
 */

import { randomUUID } from "node:crypto";
import type { Cue } from "../audio/speechDevice";
import logger, { describeError } from "../logger";
import { scoreTranscript, type ScoreOutcome, type ScorerSpec } from "../scoring/scorers";
import { resolveTrialResponse } from "../store/selection";
import { nowIso, type ItemResponse } from "../types/records";
import type { Task, TaskContext, TranscriptKind, TrialHandle } from "../types/task";
import { scaled, sleep, waitForDuration } from "../runner/waits";

export interface TrialConfig {
  /** Used in log lines only. */
  label: string;
  announcement?: string;
  stimuli?: {
    items: string[];
    /** Pause after each item. */
    pauseMs: number;
    kind: TranscriptKind;
  };
  prompt: string;
  promptKind?: TranscriptKind;
  durationMs: number;
  transcriptTimeoutMs: number;
  scorer: ScorerSpec;
  /** Recall trials get a zero-score record when cancelled before recording under the "recall" policy. */
  recall: boolean;
}

export interface TrialResult {
  cancelled: boolean;
  outcome?: ScoreOutcome;
  responseId?: string;
}

/** Log a line to the runner transcript and speak it. Speech failures are logged, not thrown. */
export async function say(ctx: TaskContext, text: string, kind: TranscriptKind): Promise<void> {
  ctx.runner.note(text, kind);
  try {
    await ctx.device.speak(text);
  } catch (err) {
    logger.warn("speech", "Speech failed", { text: text.slice(0, 60), error: describeError(err) });
  }
}

export async function playCue(ctx: TaskContext, cue: Cue): Promise<void> {
  try {
    await ctx.device.playCue(cue);
  } catch (err) {
    logger.warn("speech", `Cue ${cue} failed`, { error: describeError(err) });
  }
}

/** Closing line for a task that ran to the end. */
export async function finishTask(ctx: TaskContext, text: string): Promise<void> {
  if (ctx.signal.aborted) return;
  await say(ctx, text, "feedback");
  if (ctx.signal.aborted) return;
  await ctx.runner.transition("completed");
}

/** Store a new response carrying a score. Returns undefined if the store failed. */
export async function createScoredResponse(
  task: Task,
  ctx: TaskContext,
  outcome: ScoreOutcome
): Promise<ItemResponse | undefined> {
  const now = nowIso();
  try {
    return await ctx.store.create("itemResponse", {
      id: randomUUID(),
      sessionId: ctx.sessionId,
      taskId: task.id,
      score: outcome.score,
      responseText: outcome.responseText,
      correctWords: outcome.correctWords,
      expectedWords: outcome.expectedWords,
      createdAt: now,
      updatedAt: now,
    });
  } catch (err) {
    logger.error("scoring", "Could not store score", { taskId: task.id, error: describeError(err) });
    return undefined;
  }
}

/**
 * Write score fields onto the trial's response: the one named by the handle,
 * else the newest unscored response for the task, else a new one.
 */
export async function writeScore(
  task: Task,
  ctx: TaskContext,
  handle: TrialHandle | undefined,
  outcome: ScoreOutcome
): Promise<ItemResponse | undefined> {
  let existing: ItemResponse | undefined;
  try {
    existing = await resolveTrialResponse(ctx.store, ctx.sessionId, task.id, handle);
  } catch (err) {
    logger.warn("scoring", "Could not look up response", { taskId: task.id, error: describeError(err) });
  }
  if (existing === undefined || (existing.score !== undefined && existing.id !== handle?.responseId)) {
    return createScoredResponse(task, ctx, outcome);
  }

  try {
    return await ctx.store.update("itemResponse", {
      ...existing,
      score: outcome.score,
      responseText: outcome.responseText,
      correctWords: outcome.correctWords,
      expectedWords: outcome.expectedWords,
      updatedAt: nowIso(),
    });
  } catch (err) {
    logger.error("scoring", "Could not store score", { taskId: task.id, error: describeError(err) });
    return undefined;
  }
}

function zeroOnCancel(ctx: TaskContext, trial: TrialConfig): boolean {
  switch (ctx.cancelledTrialPolicy) {
    case "all":
      return true;
    case "recall":
      return trial.recall;
    case "none":
      return false;
  }
}

async function cancelledBeforeRecording(task: Task, ctx: TaskContext, trial: TrialConfig): Promise<TrialResult> {
  logger.info("trial", `${trial.label} cancelled before recording`, { taskId: task.id });
  if (!zeroOnCancel(ctx, trial)) return { cancelled: true };

  const empty = scoreTranscript(trial.scorer, "");
  const now = nowIso();
  try {
    const response = await ctx.store.create("itemResponse", {
      id: randomUUID(),
      sessionId: ctx.sessionId,
      taskId: task.id,
      score: 0,
      correctWords: [],
      expectedWords: empty.expectedWords,
      createdAt: now,
      updatedAt: now,
    });
    return { cancelled: true, outcome: { ...empty, score: 0, correctWords: [] }, responseId: response.id };
  } catch (err) {
    logger.error("trial", "Could not store zero score", { taskId: task.id, error: describeError(err) });
    return { cancelled: true };
  }
}

export async function runRecordedTrial(task: Task, ctx: TaskContext, trial: TrialConfig): Promise<TrialResult> {
  const { runner, signal, timing } = ctx;

  if (trial.announcement) {
    await say(ctx, trial.announcement, "instruction");
  }
  if (signal.aborted) return cancelledBeforeRecording(task, ctx, trial);

  await runner.transition("presenting");
  for (const item of trial.stimuli?.items ?? []) {
    runner.setPrompt(item);
    await say(ctx, item, trial.stimuli?.kind ?? "stimulus");
    const pause = scaled(trial.stimuli?.pauseMs ?? 0, timing);
    if ((await sleep(pause, signal)) === "cancelled") {
      return cancelledBeforeRecording(task, ctx, trial);
    }
  }

  runner.setPrompt(trial.prompt);
  await say(ctx, trial.prompt, trial.promptKind ?? "prompt");
  if (signal.aborted) return cancelledBeforeRecording(task, ctx, trial);

  await playCue(ctx, "start");
  if (signal.aborted) return cancelledBeforeRecording(task, ctx, trial);

  await runner.transition("recording");
  const handle = runner.trialHandle;
  logger.debug("trial", `${trial.label} recording`, { taskId: task.id, handle });

  const waited = await waitForDuration(
    scaled(trial.durationMs, timing),
    signal,
    Math.max(1, scaled(timing.tickMs, timing))
  );

  if (waited === "elapsed") {
    await playCue(ctx, "end");
    await runner.transition("evaluating");
  }

  const transcription = await runner.awaitTranscription(
    handle?.audioClipId,
    scaled(trial.transcriptTimeoutMs, timing),
    signal
  );
  const transcript = transcription.status === "text" ? transcription.text : "";
  if (transcription.status !== "text") {
    logger.info("trial", `${trial.label}: no transcript (${transcription.status})`, { taskId: task.id });
  }

  const outcome = scoreTranscript(trial.scorer, transcript);
  const stored = await writeScore(task, ctx, handle, outcome);
  logger.info("trial", `${trial.label} scored ${outcome.score}`, {
    taskId: task.id,
    correct: outcome.correctWords.length,
    cancelled: waited === "cancelled",
  });

  return { cancelled: waited === "cancelled", outcome, responseId: stored?.id };
}
