/**
 * Attention
 *
 * Four phases: digit span forward (5 digits), digit span backward (2 digits),
 * letter tapping (30 letters, tap on every "A") and serial 7s from 100.
 */

import { randomUUID } from "node:crypto";
import logger from "../logger";
import { scaled, sleep } from "../runner/waits";
import {
  attributeTaps,
  LETTER_TAPPING_MAX_ERRORS,
  serialSevensTargets,
  type SpanDirection,
} from "../scoring/scorers";
import type { Task, TaskContext } from "../types/task";
import { createScoredResponse, finishTask, runRecordedTrial, say } from "./trial";

const FORWARD_LENGTH = 5;
const BACKWARD_LENGTH = 2;
const DIGIT_PAUSE_MS = 800;
const SPAN_RESPONSE_MS = 10_000;
const LETTER_COUNT = 30;
const MIN_TARGETS = 5;
const MAX_TARGETS = 15;
const LETTER_PAUSE_MS = 600;
const LAST_LETTER_GRACE_MS = 1000;
const SERIAL_SEVENS_MS = 42_000;
const TRANSCRIPT_TIMEOUT_MS = 30_000;

const TARGET_LETTER = "A";
const DISTRACTORS = "BCDEFGHIJKLMNOPQRSTUVWXYZ";

const INTRO =
  "Welcome to the attention task. This test has four parts. I will guide you through each part with " +
  "spoken instructions. Please listen carefully and follow the directions. Let's begin.";
const PHASE_TRANSITIONS = [
  "Good. Now moving to the second part.",
  "Well done. Now for the third part.",
  "Excellent. Now for the final part.",
];
const FORWARD_INTRO = "First, I will read you 5 numbers. Please repeat them back in the same order.";
const FORWARD_PROMPT = "Now please repeat the numbers back in the same order. You have 10 seconds. I'm listening.";
const BACKWARD_INTRO = "Now I will read you 2 numbers. Please repeat them back in reverse order.";
const BACKWARD_PROMPT = "Now please repeat the numbers back in reverse order. You have 10 seconds. I'm listening.";
const TAPPING_INTRO =
  "For this part, I will read you a list of 30 letters. Tap every time you hear the letter A. " +
  "Tap only when you hear the letter A. Are you ready? Here we go.";
const SERIAL_INTRO =
  "For this final part, you will subtract 7 from 100, then continue subtracting 7 from each answer.";
const SERIAL_PROMPT =
  "Start with 100. What is 100 minus 7? Then continue subtracting 7 from each answer. " +
  "Say all five answers out loud. You have 42 seconds. I'm listening.";
const DONE =
  "Excellent work. You have completed all four parts of the attention task. Thank you for your participation.";

export interface AttentionOptions {
  /** Uniform [0, 1) source used for digits and letters. */
  random?: () => number;
  /** Millisecond clock used to time letters and taps. */
  now?: () => number;
  id?: string;
}

export interface LetterTappingResult {
  letters: string[];
  tappedIndices: number[];
  errors: number;
  score: number;
}

export function generateDigitSequence(length: number, random: () => number = Math.random): number[] {
  return Array.from({ length }, () => Math.floor(random() * 10));
}

/** 30 letters with 5-15 "A"s at shuffled positions. */
export function generateLetterSequence(random: () => number = Math.random): string[] {
  const targets = MIN_TARGETS + Math.floor(random() * (MAX_TARGETS - MIN_TARGETS + 1));
  const letters: string[] = [];
  for (let i = 0; i < LETTER_COUNT; i++) {
    letters.push(i < targets ? TARGET_LETTER : DISTRACTORS[Math.floor(random() * DISTRACTORS.length)]);
  }
  for (let i = letters.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [letters[i], letters[j]] = [letters[j], letters[i]];
  }
  return letters;
}

export class AttentionTask implements Task {
  readonly kind = "attention";
  readonly title = "Attention";
  readonly instructions = "This is an attention task with four parts. Please follow the spoken instructions.";
  readonly expectedInputType = "audio";
  readonly id: string;

  private readonly random: () => number;
  private readonly now: () => number;
  private taps: number[] | undefined;
  private lastTapping: LetterTappingResult | undefined;

  constructor(options: AttentionOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.id = options.id ?? randomUUID();
  }

  /** Register a tap during the letter phase. Ignored at any other time. */
  recordTap(timestamp: number = this.now()): void {
    if (this.taps === undefined) {
      logger.debug("attention", "Tap outside letter phase ignored");
      return;
    }
    this.taps.push(timestamp);
  }

  get letterTappingResult(): LetterTappingResult | undefined {
    return this.lastTapping;
  }

  async run(ctx: TaskContext): Promise<void> {
    await say(ctx, INTRO, "instruction");

    const phases: Array<() => Promise<boolean>> = [
      () => this.digitSpan(ctx, "forward"),
      () => this.digitSpan(ctx, "backward"),
      () => this.letterTapping(ctx),
      () => this.serialSevens(ctx),
    ];

    for (let i = 0; i < phases.length; i++) {
      if (i > 0) {
        if (ctx.signal.aborted) return;
        await say(ctx, PHASE_TRANSITIONS[i - 1], "instruction");
      }
      const completed = await phases[i]();
      if (!completed) return;
    }

    await finishTask(ctx, DONE);
  }

  private async digitSpan(ctx: TaskContext, direction: SpanDirection): Promise<boolean> {
    const forward = direction === "forward";
    const digits = generateDigitSequence(forward ? FORWARD_LENGTH : BACKWARD_LENGTH, this.random);
    logger.debug("attention", `Digit span ${direction}`, { digits });

    const result = await runRecordedTrial(this, ctx, {
      label: `Digit span ${direction}`,
      announcement: forward ? FORWARD_INTRO : BACKWARD_INTRO,
      stimuli: { items: digits.map(String), pauseMs: DIGIT_PAUSE_MS, kind: "stimulus" },
      prompt: forward ? FORWARD_PROMPT : BACKWARD_PROMPT,
      durationMs: SPAN_RESPONSE_MS,
      transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
      scorer: { kind: "digitSpan", digits, direction },
      recall: false,
    });
    return !result.cancelled;
  }

  private async letterTapping(ctx: TaskContext): Promise<boolean> {
    const { runner, signal, timing } = ctx;
    const letters = generateLetterSequence(this.random);
    const pause = scaled(LETTER_PAUSE_MS, timing);

    await say(ctx, TAPPING_INTRO, "instruction");
    if (signal.aborted) return false;
    await runner.transition("presenting");

    const starts: number[] = [];
    this.taps = [];
    try {
      for (const letter of letters) {
        starts.push(this.now());
        runner.setPrompt(letter);
        await say(ctx, `${letter}.`, "letter");
        if ((await sleep(pause, signal)) === "cancelled") return false;
      }

      // Late taps on the last letter still count
      const lastWindowMs = pause + scaled(LAST_LETTER_GRACE_MS, timing);
      const remaining = starts[starts.length - 1] + lastWindowMs - this.now();
      if ((await sleep(Math.max(0, remaining), signal)) === "cancelled") return false;

      const attribution = attributeTaps(letters, starts, this.taps, lastWindowMs, TARGET_LETTER);
      const score = attribution.errors <= LETTER_TAPPING_MAX_ERRORS ? 1 : 0;
      const tapped = [...new Set(attribution.tappedIndices)].sort((a, b) => a - b);
      this.lastTapping = { letters, tappedIndices: tapped, errors: attribution.errors, score };

      logger.info("attention", `Letter tapping: ${attribution.errors} errors, score ${score}`, {
        missed: attribution.missedTargets,
        falseTaps: attribution.falseTaps,
      });

      await createScoredResponse(this, ctx, {
        score,
        responseText: "Letter tapping phase",
        correctWords: tapped.map(String),
        expectedWords: letters,
      });
      return true;
    } finally {
      this.taps = undefined;
    }
  }

  private async serialSevens(ctx: TaskContext): Promise<boolean> {
    const targets = serialSevensTargets();
    const result = await runRecordedTrial(this, ctx, {
      label: "Serial sevens",
      announcement: SERIAL_INTRO,
      prompt: SERIAL_PROMPT,
      promptKind: "calculationPrompt",
      durationMs: SERIAL_SEVENS_MS,
      transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
      scorer: { kind: "serialSevens", targets },
      recall: false,
    });
    return !result.cancelled;
  }
}

