/**
 * Language
 *
 * Sentence repetition (two sentences, verbatim) followed by letter fluency
 * (as many words starting with F as possible in 30 seconds).
 */

import { randomUUID } from "node:crypto";
import { FLUENCY_THRESHOLD } from "../scoring/scorers";
import type { Task, TaskContext } from "../types/task";
import { finishTask, runRecordedTrial, say } from "./trial";

export const REPETITION_SENTENCES = [
  "I only know that John is the one to help today.",
  "The cat always hid under the couch when dogs were in the room.",
];

const SENTENCE_RESPONSE_MS = 10_000;
const FLUENCY_MS = 30_000;
const TRANSCRIPT_TIMEOUT_MS = 30_000;
const FLUENCY_LETTER = "f";

const INTRO =
  "Welcome to the language task. This test has two parts. I will guide you through each part with " +
  "spoken instructions. Please listen carefully and follow the directions. Let's begin.";
const REPETITION_INTRO = "First, I will read you a sentence. Please repeat it back exactly as you hear it.";
const REPETITION_PROMPT = "Now please repeat the sentence back to me exactly. You have 10 seconds. I'm listening.";
const NEXT_PART = "Good. Now moving to the second part.";
const FLUENCY_PROMPT =
  "For this part, I want you to name as many words as you can that begin with the letter F. " +
  "You have 30 seconds. Ready? Begin.";
const DONE = "Excellent work. You have completed the language task. Thank you for your participation.";

export class LanguageTask implements Task {
  readonly kind = "language";
  readonly title = "Language";
  readonly instructions = "This is a language task with two parts. Please follow the instructions carefully.";
  readonly expectedInputType = "audio";

  constructor(
    readonly sentences: string[] = REPETITION_SENTENCES,
    readonly id: string = randomUUID()
  ) {}

  async run(ctx: TaskContext): Promise<void> {
    await say(ctx, INTRO, "instruction");

    for (let i = 0; i < this.sentences.length; i++) {
      const sentence = this.sentences[i];
      const result = await runRecordedTrial(this, ctx, {
        label: `Sentence ${i + 1}`,
        announcement: i === 0 ? REPETITION_INTRO : undefined,
        stimuli: { items: [sentence], pauseMs: 0, kind: "stimulus" },
        prompt: REPETITION_PROMPT,
        durationMs: SENTENCE_RESPONSE_MS,
        transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
        scorer: { kind: "sentence", sentence },
        recall: false,
      });
      if (result.cancelled) return;
    }

    if (ctx.signal.aborted) return;
    await say(ctx, NEXT_PART, "instruction");

    const fluency = await runRecordedTrial(this, ctx, {
      label: "Letter fluency",
      prompt: FLUENCY_PROMPT,
      promptKind: "fluencyPrompt",
      durationMs: FLUENCY_MS,
      transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
      scorer: { kind: "fluency", letter: FLUENCY_LETTER, threshold: FLUENCY_THRESHOLD },
      recall: false,
    });
    if (fluency.cancelled) return;

    await finishTask(ctx, DONE);
  }
}
