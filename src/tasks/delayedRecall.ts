/**
 * Delayed Recall
 *
 * One 15 second trial recalling the working memory words without hearing
 * them again. Order does not matter and inflected forms are accepted.
 */

import { randomUUID } from "node:crypto";
import type { Task, TaskContext } from "../types/task";
import { WORKING_MEMORY_WORDS } from "./workingMemory";
import { finishTask, runRecordedTrial, say } from "./trial";

const RESPONSE_MS = 15_000;
const TRANSCRIPT_TIMEOUT_MS = 3000;

const INTRO =
  "Hi! I'm going to ask you to recall the 5 words from the first activity. You won't hear them again, " +
  "just try to remember them. You'll have 15 seconds to say as many as you can remember.";
const PROMPT = "Now, please tell me the words you remember from the first activity. You have 15 seconds.";
const DONE = "Great job! You've completed the delayed recall task.";

export class DelayedRecallTask implements Task {
  readonly kind = "delayedRecall";
  readonly title = "Delayed Recall";
  readonly instructions =
    "Recall the 5 words from the first activity. You won't hear them again. You have 15 seconds to respond.";
  readonly expectedInputType = "audio";

  constructor(
    readonly words: string[] = WORKING_MEMORY_WORDS,
    readonly id: string = randomUUID()
  ) {}

  async run(ctx: TaskContext): Promise<void> {
    const result = await runRecordedTrial(this, ctx, {
      label: "Delayed recall",
      announcement: INTRO,
      prompt: PROMPT,
      durationMs: RESPONSE_MS,
      transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
      scorer: { kind: "freeRecall", words: this.words },
      recall: true,
    });
    if (result.cancelled) return;

    await finishTask(ctx, DONE);
  }
}
