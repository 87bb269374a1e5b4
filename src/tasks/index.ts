/**
 * Task Registry
 *
 * Central export for all task implementations and the battery order.
 */

export { WorkingMemoryTask, WORKING_MEMORY_WORDS } from "./workingMemory";
export { DelayedRecallTask } from "./delayedRecall";
export { AttentionTask, generateDigitSequence, generateLetterSequence, type AttentionOptions } from "./attention";
export { LanguageTask, REPETITION_SENTENCES } from "./language";
export { AbstractionTask, ABSTRACTION_PAIRS, type AbstractionPair } from "./abstraction";
export { OrientationTask, buildOrientationQuestions, type OrientationQuestion } from "./orientation";
export { runRecordedTrial, type TrialConfig, type TrialResult } from "./trial";

import type { Task, TaskKind } from "../types/task";
import { AbstractionTask } from "./abstraction";
import { AttentionTask, type AttentionOptions } from "./attention";
import { DelayedRecallTask } from "./delayedRecall";
import { LanguageTask } from "./language";
import { OrientationTask } from "./orientation";
import { WORKING_MEMORY_WORDS, WorkingMemoryTask } from "./workingMemory";

/** Administration order. Delayed recall follows the tasks that separate it from working memory. */
export const BATTERY_ORDER: TaskKind[] = [
  "workingMemory",
  "attention",
  "language",
  "abstraction",
  "delayedRecall",
  "orientation",
];

export interface TaskFactoryOptions {
  /** Word list shared by working memory and delayed recall. */
  words?: string[];
  place: string;
  city: string;
  date?: Date;
  attention?: AttentionOptions;
}

/**
 * Build a task by kind
 */
export function createTask(kind: TaskKind, options: TaskFactoryOptions): Task {
  const words = options.words ?? WORKING_MEMORY_WORDS;
  switch (kind) {
    case "workingMemory":
      return new WorkingMemoryTask(words);
    case "delayedRecall":
      return new DelayedRecallTask(words);
    case "attention":
      return new AttentionTask(options.attention);
    case "language":
      return new LanguageTask();
    case "abstraction":
      return new AbstractionTask();
    case "orientation":
      return new OrientationTask({ place: options.place, city: options.city, date: options.date });
  }
}
