// ---------------------------------------------------------------------------
// Display-name checks
// ---------------------------------------------------------------------------

const LATIN_OR_CYRILLIC_RE = /[A-Za-zА-Яа-яЁё]/u;

/** Scripts rarely seen in legitimate joiners of the communities we protect. */
const EXOTIC_SCRIPT_RE = new RegExp(
  [
    "[",
    "\\u0600-\\u06FF", // Arabic
    "\\u4E00-\\u9FFF", // CJK Unified Ideographs
    "\\u3040-\\u309F", // Hiragana
    "\\u30A0-\\u30FF", // Katakana
    "\\uAC00-\\uD7AF", // Hangul syllables
    "\\u1100-\\u11FF", // Hangul Jamo
    "\\u1200-\\u137F", // Ethiopic
    "\\u0E00-\\u0E7F", // Thai
    "\\u0980-\\u09FF", // Bengali
    "\\u0A00-\\u0A7F", // Gurmukhi
    "\\u0D00-\\u0D7F", // Malayalam
    "\\u0C80-\\u0CFF", // Kannada
    "\\u0B00-\\u0B7F", // Oriya
    "\\u0780-\\u07BF", // Thaana
    "]",
  ].join(""),
  "u",
);

const SPECIAL_CHARS_RE = /[<>«»@#$%^&*+=[\]{}|\\`~]/u;

export const REPEATING_CHARS_MIN_RUN = 5;

export interface NameCheckResult {
  /** No Latin or Cyrillic letter anywhere in the name. */
  weirdName: boolean;
  exoticScript: boolean;
  specialChars: boolean;
  repeatingChars: boolean;
}

export function fullDisplayName(firstName: string, lastName: string | null): string {
  return `${firstName} ${lastName ?? ""}`.trim();
}

export function hasLatinOrCyrillic(name: string): boolean {
  return LATIN_OR_CYRILLIC_RE.test(name);
}

export function hasExoticScript(name: string): boolean {
  return EXOTIC_SCRIPT_RE.test(name);
}

export function hasSpecialChars(name: string): boolean {
  return SPECIAL_CHARS_RE.test(name);
}

/** Longest run of one identical character (case-sensitive). */
export function longestRun(name: string): number {
  let best = 0;
  let current = 0;
  let prev: string | undefined;
  for (const ch of name) {
    current = ch === prev ? current + 1 : 1;
    best = Math.max(best, current);
    prev = ch;
  }
  return best;
}

export function checkName(name: string): NameCheckResult {
  return {
    weirdName: !hasLatinOrCyrillic(name),
    exoticScript: hasExoticScript(name),
    specialChars: hasSpecialChars(name),
    repeatingChars: longestRun(name) >= REPEATING_CHARS_MIN_RUN,
  };
}
