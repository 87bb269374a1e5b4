/**
 * Abstraction
 *
 * Two word pairs; the participant names the category that unites them.
 */

import { randomUUID } from "node:crypto";
import type { Task, TaskContext } from "../types/task";
import { finishTask, runRecordedTrial, say } from "./trial";

export interface AbstractionPair {
  words: [string, string];
  /** Accepted answers; the first is stored as the expected answer. */
  categories: string[];
}

export const ABSTRACTION_PAIRS: AbstractionPair[] = [
  {
    words: ["train", "bicycle"],
    categories: ["vehicles", "vehicle", "transportation", "transport", "transportation vehicles", "modes of transportation"],
  },
  {
    words: ["banana", "orange"],
    categories: ["fruits", "fruit", "food", "foods"],
  },
];

const RESPONSE_MS = 15_000;
const TRANSCRIPT_TIMEOUT_MS = 30_000;

const INTRO =
  "Welcome to the abstraction task. I will read you two words, and you need to tell me the category " +
  "that unites them. For example, if I say 'apple and orange', you might say 'fruits'. " +
  "You will have 15 seconds to respond for each pair. Let's begin.";
const PROMPT = "What category unites these two words? You have 15 seconds. I'm listening.";
const DONE = "Excellent work. You have completed the abstraction task. Thank you for your participation.";

export class AbstractionTask implements Task {
  readonly kind = "abstraction";
  readonly title = "Abstraction";
  readonly instructions =
    "I will read you two words, and you need to respond with the category that unites them.";
  readonly expectedInputType = "audio";

  constructor(
    readonly pairs: AbstractionPair[] = ABSTRACTION_PAIRS,
    readonly id: string = randomUUID()
  ) {}

  async run(ctx: TaskContext): Promise<void> {
    await say(ctx, INTRO, "instruction");

    for (let i = 0; i < this.pairs.length; i++) {
      const pair = this.pairs[i];
      const result = await runRecordedTrial(this, ctx, {
        label: `Abstraction trial ${i + 1}`,
        announcement: `Trial ${i + 1}.`,
        stimuli: { items: [`${pair.words[0]} and ${pair.words[1]}`], pauseMs: 0, kind: "stimulus" },
        prompt: PROMPT,
        durationMs: RESPONSE_MS,
        transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
        scorer: { kind: "abstraction", categories: pair.categories },
        recall: false,
      });
      if (result.cancelled) return;
    }

    await finishTask(ctx, DONE);
  }
}
