/**
 * Scoring Engine
 *
 * One pure function per scoring rule, plus scoreTranscript() which dispatches
 * on a tagged ScorerSpec. Every scorer returns the fields written back onto
 * an ItemResponse.
 */

import { containsEitherWay, fuzzyWordMatch } from "./matching";
import { normalizeText, stripArticles, tokenize } from "./normalize";
import { extractDigits, extractNumbers, spellNumber, spellOrdinal, spellYear } from "./numbers";

export interface ScoreOutcome {
  score: number;
  responseText: string;
  correctWords: string[];
  expectedWords: string[];
}

// ============================================================================
// Recall
// ============================================================================

/** Positional exact match; score = matched / expected.length. */
export function scoreOrderedRecall(transcript: string, expected: string[]): ScoreOutcome {
  const spoken = tokenize(transcript);
  const correctWords = expected.filter((word, i) => spoken[i] === word.toLowerCase());
  return {
    score: expected.length === 0 ? 0 : correctWords.length / expected.length,
    responseText: transcript,
    correctWords,
    expectedWords: [...expected],
  };
}

/** Order-independent presence; exact match first, then fuzzyWordMatch. */
export function scoreFreeRecall(transcript: string, expected: string[]): ScoreOutcome {
  const spoken = tokenize(transcript);
  const correctWords = expected.filter((word) => {
    const target = word.toLowerCase();
    return spoken.includes(target) || spoken.some((s) => fuzzyWordMatch(s, target));
  });
  return {
    score: expected.length === 0 ? 0 : correctWords.length / expected.length,
    responseText: transcript,
    correctWords,
    expectedWords: [...expected],
  };
}

// ============================================================================
// Attention
// ============================================================================

export type SpanDirection = "forward" | "backward";

export function scoreDigitSpan(
  transcript: string,
  presented: number[],
  direction: SpanDirection
): ScoreOutcome {
  const spoken = extractDigits(transcript);
  const target = direction === "backward" ? [...presented].reverse() : presented;
  const correct = spoken.length === target.length && spoken.every((d, i) => d === target[i]);
  const expectedWords = target.map(String);
  return {
    score: correct ? 1 : 0,
    responseText: spoken.length > 0 ? spoken.join(" ") : transcript,
    correctWords: correct ? expectedWords : [],
    expectedWords,
  };
}

export const SERIAL_SEVENS_START = 100;
export const SERIAL_SEVENS_STEP = 7;
export const SERIAL_SEVENS_COUNT = 5;

export function serialSevensTargets(
  start = SERIAL_SEVENS_START,
  step = SERIAL_SEVENS_STEP,
  count = SERIAL_SEVENS_COUNT
): number[] {
  return Array.from({ length: count }, (_, i) => start - step * (i + 1));
}

/** Points for positional matches against the target list: 4+ -> 3, 2-3 -> 2, 1 -> 1. */
export function serialSevensPoints(correctCount: number): number {
  if (correctCount >= 4) return 3;
  if (correctCount >= 2) return 2;
  if (correctCount === 1) return 1;
  return 0;
}

export function scoreSerialSevens(transcript: string, targets = serialSevensTargets()): ScoreOutcome {
  const spoken = extractNumbers(transcript);
  const correct = targets.filter((t, i) => spoken[i] === t);
  return {
    score: serialSevensPoints(correct.length),
    responseText: transcript,
    correctWords: correct.map(String),
    expectedWords: targets.map(String),
  };
}

export interface TapAttribution {
  /** Letter index per tap, in tap order; taps outside every window are dropped. */
  tappedIndices: number[];
  errors: number;
  missedTargets: number[];
  falseTaps: number[];
}

/**
 * Attribute each tap to the letter whose window contains it. Window i is
 * [starts[i], starts[i+1]); the last window is [starts[n-1], starts[n-1] + lastWindowMs).
 * Timestamps are milliseconds on any shared clock.
 */
export function attributeTaps(
  letters: string[],
  starts: number[],
  taps: number[],
  lastWindowMs: number,
  target = "A"
): TapAttribution {
  const tapped = new Set<number>();
  const tappedIndices: number[] = [];
  for (const t of taps) {
    for (let i = 0; i < starts.length; i++) {
      const end = i + 1 < starts.length ? starts[i + 1] : starts[i] + lastWindowMs;
      if (t >= starts[i] && t < end) {
        tappedIndices.push(i);
        tapped.add(i);
        break;
      }
    }
  }

  const missedTargets: number[] = [];
  letters.forEach((letter, i) => {
    if (letter === target && !tapped.has(i)) missedTargets.push(i);
  });
  const falseTaps = [...tapped].filter((i) => letters[i] !== target).sort((a, b) => a - b);

  return {
    tappedIndices,
    errors: missedTargets.length + falseTaps.length,
    missedTargets,
    falseTaps,
  };
}

export const LETTER_TAPPING_MAX_ERRORS = 2;

/** 1 if the distinct tapped positions give at most two errors against the "A" positions. */
export function scoreLetterTapping(letters: string[], tappedPositions: Iterable<number>, target = "A"): number {
  const tapped = new Set(tappedPositions);
  let errors = 0;
  letters.forEach((letter, i) => {
    if (letter === target && !tapped.has(i)) errors++;
  });
  for (const i of tapped) {
    if (letters[i] !== target) errors++;
  }
  return errors <= LETTER_TAPPING_MAX_ERRORS ? 1 : 0;
}

// ============================================================================
// Language
// ============================================================================

export function scoreSentenceRepetition(transcript: string, sentence: string): ScoreOutcome {
  const spoken = tokenize(transcript);
  const expected = tokenize(sentence);
  const correct = spoken.length === expected.length && spoken.every((w, i) => w === expected[i]);
  const expectedWords = sentence.split(" ");
  return {
    score: correct ? 1 : 0,
    responseText: transcript,
    correctWords: correct ? expectedWords : [],
    expectedWords,
  };
}

export const FLUENCY_THRESHOLD = 10;

/** Unique tokens starting with the letter, in first-spoken order. */
export function fluencyWords(transcript: string, letter: string): string[] {
  const prefix = letter.toLowerCase();
  return [...new Set(tokenize(transcript).filter((w) => w.startsWith(prefix)))];
}

export function scoreLetterFluency(
  transcript: string,
  letter = "f",
  threshold = FLUENCY_THRESHOLD
): ScoreOutcome {
  const words = fluencyWords(transcript, letter);
  return {
    score: words.length > threshold ? 1 : 0,
    responseText: transcript,
    correctWords: words,
    expectedWords: [`threshold: >${threshold} words`],
  };
}

// ============================================================================
// Abstraction & orientation
// ============================================================================

export function scoreAbstraction(transcript: string, categories: string[]): ScoreOutcome {
  const spoken = normalizeText(transcript);
  const correct = categories.some((c) => containsEitherWay(spoken, normalizeText(c)));
  const expectedWords = categories.slice(0, 1);
  return {
    score: correct ? 1 : 0,
    responseText: transcript,
    correctWords: correct ? expectedWords : [],
    expectedWords,
  };
}

export type OrientationField = "date" | "month" | "year" | "weekday" | "place" | "city";

export interface OrientationAnswer {
  field: OrientationField;
  answer: string;
  /** Additional accepted phrasings, matched by containment. */
  alternatives: string[];
  /** Date and year questions also accept the number anywhere in the digits. */
  numeric?: number;
}

function digitRun(text: string): string {
  return text.replace(/\D/g, "");
}

/** Spelling variants for city names: "st. louis", "st louis", "saint louis", "stlouis", ... */
export function cityVariants(city: string): string[] {
  const base = normalizeText(city, { keepPeriods: true });
  const forms = new Set<string>([base, base.replace(/\./g, "").replace(/\s+/g, " ").trim()]);
  for (const form of [...forms]) {
    if (/^st\.? /.test(form)) {
      const rest = form.replace(/^st\.? /, "");
      forms.add(`saint ${rest}`);
      forms.add(`st ${rest}`);
      forms.add(`st. ${rest}`);
    } else if (form.startsWith("saint ")) {
      const rest = form.slice("saint ".length);
      forms.add(`st ${rest}`);
      forms.add(`st. ${rest}`);
    }
  }
  for (const form of [...forms]) {
    forms.add(form.replace(/[\s.]/g, ""));
  }
  return [...forms].filter((f) => f !== "");
}

/** Spelled forms for a day of month: 14 -> ["fourteen", "fourteenth", "14th"]. */
export function dayAlternatives(day: number): string[] {
  const mod100 = day % 100;
  const mod10 = day % 10;
  const suffix =
    mod100 >= 11 && mod100 <= 13 ? "th" : mod10 === 1 ? "st" : mod10 === 2 ? "nd" : mod10 === 3 ? "rd" : "th";
  return [spellNumber(day), spellOrdinal(day), `${day}${suffix}`];
}

export function yearAlternatives(year: number): string[] {
  return spellYear(year);
}

export function scoreOrientation(transcript: string, question: OrientationAnswer): ScoreOutcome {
  const normalized = normalizeText(transcript, { keepPeriods: true });
  const accepted = [question.answer, ...question.alternatives]
    .map((a) => normalizeText(a, { keepPeriods: true }))
    .filter((a) => a !== "");

  let correct = false;
  if (normalized !== "") {
    if (question.numeric !== undefined && digitRun(normalized).includes(String(question.numeric))) {
      correct = true;
    } else {
      const cleaned = stripArticles(normalized);
      correct = accepted.some((a) => cleaned.includes(a) || normalized.includes(a));
      if (!correct && question.field === "city") {
        correct = cityVariants(question.answer).some((v) => cleaned.includes(v) || normalized.includes(v));
      }
    }
  }

  const expectedWords = [question.answer];
  return {
    score: correct ? 1 : 0,
    responseText: transcript,
    correctWords: correct ? expectedWords : [],
    expectedWords,
  };
}

// ============================================================================
// Dispatch
// ============================================================================

export type ScorerSpec =
  | { kind: "orderedRecall"; words: string[] }
  | { kind: "freeRecall"; words: string[] }
  | { kind: "digitSpan"; digits: number[]; direction: SpanDirection }
  | { kind: "serialSevens"; targets: number[] }
  | { kind: "sentence"; sentence: string }
  | { kind: "fluency"; letter: string; threshold: number }
  | { kind: "abstraction"; categories: string[] }
  | { kind: "orientation"; question: OrientationAnswer };

export function scoreTranscript(spec: ScorerSpec, transcript: string): ScoreOutcome {
  switch (spec.kind) {
    case "orderedRecall":
      return scoreOrderedRecall(transcript, spec.words);
    case "freeRecall":
      return scoreFreeRecall(transcript, spec.words);
    case "digitSpan":
      return scoreDigitSpan(transcript, spec.digits, spec.direction);
    case "serialSevens":
      return scoreSerialSevens(transcript, spec.targets);
    case "sentence":
      return scoreSentenceRepetition(transcript, spec.sentence);
    case "fluency":
      return scoreLetterFluency(transcript, spec.letter, spec.threshold);
    case "abstraction":
      return scoreAbstraction(transcript, spec.categories);
    case "orientation":
      return scoreOrientation(transcript, spec.question);
  }
}
