/**
 * Orientation
 *
 * Six questions: date, month, year, day of the week, place and city. Date
 * answers come from the clock when the task is constructed; place and city
 * from configuration.
 */

import { randomUUID } from "node:crypto";
import { cityVariants, dayAlternatives, yearAlternatives, type OrientationAnswer } from "../scoring/scorers";
import type { Task, TaskContext } from "../types/task";
import { finishTask, runRecordedTrial, say } from "./trial";

export interface OrientationQuestion extends OrientationAnswer {
  text: string;
}

export interface OrientationOptions {
  place: string;
  city: string;
  /** Defaults to the current date. */
  date?: Date;
  id?: string;
}

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];
const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const RESPONSE_MS = 5000;
const TRANSCRIPT_TIMEOUT_MS = 3000;

const INTRO =
  "Welcome to the orientation task. I will ask you 6 questions about the current date, month, year, " +
  "day of the week, place, and city. Please answer each question clearly. " +
  "You will have 5 seconds to answer each question. Let's begin.";
const PROMPT = "You have 5 seconds to answer. I'm listening.";
const DONE = "Excellent work. You have completed all 6 orientation questions. Thank you for your participation.";

/** Questions and accepted answers for the given local date. */
export function buildOrientationQuestions(date: Date, place: string, city: string): OrientationQuestion[] {
  const day = date.getDate();
  const month = MONTHS[date.getMonth()];
  const year = date.getFullYear();
  const weekday = WEEKDAYS[date.getDay()];

  return [
    {
      field: "date",
      text: "What is the current date?",
      answer: String(day),
      alternatives: dayAlternatives(day),
      numeric: day,
    },
    {
      field: "month",
      text: "What month is it?",
      answer: month,
      alternatives: [month.slice(0, 3)],
    },
    {
      field: "year",
      text: "What year is it?",
      answer: String(year),
      alternatives: yearAlternatives(year),
      numeric: year,
    },
    {
      field: "weekday",
      text: "What day of the week is it?",
      answer: weekday,
      alternatives: [weekday.slice(0, 3)],
    },
    {
      field: "place",
      text: "What place are you in?",
      answer: place,
      alternatives: [],
    },
    {
      field: "city",
      text: "What city are you in?",
      answer: city,
      alternatives: cityVariants(city),
    },
  ];
}

export class OrientationTask implements Task {
  readonly kind = "orientation";
  readonly title = "Orientation";
  readonly instructions =
    "I will ask you 6 questions about the current date, time, and location. Please answer each question clearly.";
  readonly expectedInputType = "audio";
  readonly id: string;
  readonly questions: OrientationQuestion[];

  constructor(options: OrientationOptions) {
    this.id = options.id ?? randomUUID();
    this.questions = buildOrientationQuestions(options.date ?? new Date(), options.place, options.city);
  }

  async run(ctx: TaskContext): Promise<void> {
    await say(ctx, INTRO, "instruction");

    for (const question of this.questions) {
      const { text, ...answer } = question;
      const result = await runRecordedTrial(this, ctx, {
        label: `Orientation ${question.field}`,
        stimuli: { items: [text], pauseMs: 0, kind: "prompt" },
        prompt: PROMPT,
        durationMs: RESPONSE_MS,
        transcriptTimeoutMs: TRANSCRIPT_TIMEOUT_MS,
        scorer: { kind: "orientation", question: answer },
        recall: false,
      });
      if (result.cancelled) return;
    }

    await finishTask(ctx, DONE);
  }
}
