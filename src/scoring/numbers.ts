/**
 * Spoken number parsing and spelling.
 *
 * "4 7 2" or "four seven two" -> [4, 7, 2]
 * "ninety three eighty-six" -> [93, 86]
 */

import { normalizeText } from "./normalize";

const UNITS: Record<string, number> = {
  zero: 0,
  oh: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
};

const TEENS: Record<string, number> = {
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
};

const TENS: Record<string, number> = {
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90,
};

const DIGIT_WORDS = ["zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine"];

function lookup(table: Record<string, number>, word: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(table, word) ? table[word] : undefined;
}

/** Value of a single number word below one hundred, or undefined. */
export function parseNumberWord(word: string): number | undefined {
  const w = word.toLowerCase();
  return lookup(UNITS, w) ?? lookup(TEENS, w) ?? lookup(TENS, w) ?? (w === "hundred" ? 100 : undefined);
}

/**
 * Single digits in order of appearance. A token counts if it is a digit word
 * (zero-nine) or parses as an integer 0-9. Multi-digit numerals are read
 * digit by digit, so "4729" gives [4, 7, 2, 9].
 */
export function extractDigits(text: string): number[] {
  const digits: number[] = [];
  for (const token of normalizeText(text).split(" ")) {
    if (token === "") continue;
    const word = DIGIT_WORDS.indexOf(token);
    if (word >= 0) {
      digits.push(word);
    } else if (/^\d+$/.test(token)) {
      for (const ch of token) digits.push(Number(ch));
    }
  }
  return digits;
}

/**
 * Whole numbers in order of appearance. Handles numerals, single number words,
 * "one hundred", and tens followed by a unit ("seventy nine", "seventy-nine").
 */
export function extractNumbers(text: string): number[] {
  const tokens = text
    .toLowerCase()
    .replace(/(\d)[,.](?=\d{3}\b)/g, "$1")
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter((t) => t !== "");
  const numbers: number[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (/^\d+$/.test(token)) {
      numbers.push(Number(token));
      continue;
    }

    const tens = lookup(TENS, token);
    if (tens !== undefined) {
      const next = i + 1 < tokens.length ? lookup(UNITS, tokens[i + 1]) : undefined;
      if (next !== undefined && next > 0) {
        numbers.push(tens + next);
        i++;
      } else {
        numbers.push(tens);
      }
      continue;
    }

    if (token === "hundred") {
      // "one hundred" was pushed as 1 on the previous token
      if (numbers.length > 0 && i > 0 && lookup(UNITS, tokens[i - 1]) !== undefined) {
        numbers[numbers.length - 1] *= 100;
      } else {
        numbers.push(100);
      }
      continue;
    }

    const small = lookup(UNITS, token) ?? lookup(TEENS, token);
    if (small !== undefined && token !== "oh") {
      numbers.push(small);
    }
  }

  return numbers;
}

const CARDINAL_SMALL = [
  "zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine",
  "ten", "eleven", "twelve", "thirteen", "fourteen", "fifteen", "sixteen",
  "seventeen", "eighteen", "nineteen",
];
const CARDINAL_TENS = ["", "", "twenty", "thirty", "forty", "fifty", "sixty", "seventy", "eighty", "ninety"];

/** English words for 0-9999 without hyphens: 47 -> "forty seven". */
export function spellNumber(n: number): string {
  if (!Number.isInteger(n) || n < 0 || n > 9999) {
    throw new RangeError(`spellNumber supports integers 0-9999, got ${n}`);
  }
  if (n < 20) return CARDINAL_SMALL[n];
  if (n < 100) {
    const unit = n % 10;
    return unit === 0 ? CARDINAL_TENS[n / 10] : `${CARDINAL_TENS[Math.floor(n / 10)]} ${CARDINAL_SMALL[unit]}`;
  }
  if (n < 1000) {
    const rest = n % 100;
    const head = `${CARDINAL_SMALL[Math.floor(n / 100)]} hundred`;
    return rest === 0 ? head : `${head} ${spellNumber(rest)}`;
  }
  const rest = n % 1000;
  const head = `${CARDINAL_SMALL[Math.floor(n / 1000)]} thousand`;
  return rest === 0 ? head : `${head} ${spellNumber(rest)}`;
}

const ORDINAL_IRREGULAR: Record<string, string> = {
  one: "first",
  two: "second",
  three: "third",
  five: "fifth",
  eight: "eighth",
  nine: "ninth",
  twelve: "twelfth",
};

/** 14 -> "fourteenth", 21 -> "twenty first", 30 -> "thirtieth". */
export function spellOrdinal(n: number): string {
  const words = spellNumber(n).split(" ");
  const last = words[words.length - 1];
  let ordinal: string;
  if (Object.prototype.hasOwnProperty.call(ORDINAL_IRREGULAR, last)) {
    ordinal = ORDINAL_IRREGULAR[last];
  } else if (last.endsWith("y")) {
    ordinal = `${last.slice(0, -1)}ieth`;
  } else {
    ordinal = `${last}th`;
  }
  return [...words.slice(0, -1), ordinal].join(" ");
}

/**
 * Ways a year is commonly spoken. 2025 gives "twenty twenty five",
 * "two thousand twenty five" and "two thousand and twenty five".
 */
export function spellYear(year: number): string[] {
  const forms = new Set<string>();
  const century = Math.floor(year / 100);
  const rest = year % 100;
  if (year >= 1100 && year <= 9999 && century % 10 !== 0) {
    forms.add(rest === 0 ? `${spellNumber(century)} hundred` : `${spellNumber(century)} ${rest < 10 ? `oh ${spellNumber(rest)}` : spellNumber(rest)}`);
  }
  if (year >= 2000 && year <= 9999 && century % 10 === 0 && rest >= 10) {
    forms.add(`${spellNumber(century)} ${spellNumber(rest)}`);
  }
  const full = spellNumber(year);
  forms.add(full);
  const thousands = full.match(/^(.* thousand) (.+)$/);
  if (thousands && !thousands[2].includes("hundred")) {
    forms.add(`${thousands[1]} and ${thousands[2]}`);
  }
  return [...forms];
}
