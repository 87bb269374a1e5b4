/**
 * Working Memory
 *
 * Two trials: read five words with a one second pause after each, then the
 * participant repeats them in order. Scored by positional exact match.
 */

import { randomUUID } from "node:crypto";
import type { Task, TaskContext } from "../types/task";
import { finishTask, runRecordedTrial, say } from "./trial";

export const WORKING_MEMORY_WORDS = ["chair", "book", "hand", "road", "cloud"];

const TRIALS = 2;
const WORD_PAUSE_MS = 1000;
const RESPONSE_MS = 10_000;
const TRANSCRIPT_TIMEOUT_MS = 3000;

const INTRO =
  "Hi! I'm going to read you 5 words. After I finish, please repeat them back to me in the same order. " +
  "You'll have 10 seconds to respond. We'll do this two times.";
const SECOND_ROUND = "Great! Let's do the second round now.";
const PROMPT = "Now it's your turn! Please repeat those words back to me. You have 10 seconds.";
const DONE = "Great job! You've completed the working memory task.";

export class WorkingMemoryTask implements Task {
  readonly kind = "workingMemory";
  readonly title = "Working Memory";
  readonly instructions =
    "You will hear 5 words. After hearing all words, repeat them back in the same order. You have 10 seconds to respond.";
  readonly expectedInputType = "audio";

  constructor(
    readonly words: string[] = WORKING_MEMORY_WORDS,
    readonly id: string = randomUUID()
  ) {}

  async run(ctx: TaskContext): Promise<void> {
    await say(ctx, INTRO, "instruction");

    for (let trial = 1; trial <= TRIALS; trial++) {
      const result = await runRecordedTrial(this, ctx, {
        label: `Working memory trial ${trial}`,
        announcement: trial > 1 ? SECOND_ROUND : undefined,
        stimuli: { items: this.words, pauseMs: WORD_PAUSE_MS, kind: "stimulus" },
        prompt: PROMPT,
        durationMs: RESPONSE_MS,
        transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
        scorer: { kind: "orderedRecall", words: this.words },
        recall: true,
      });
      if (result.cancelled) return;
    }

    await finishTask(ctx, DONE);
  }
}
