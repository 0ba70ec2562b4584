// ---------------------------------------------------------------------------
// Username randomness heuristic
// ---------------------------------------------------------------------------
// Generated handles ("Mpib3SFLNYzEzyV") switch character class constantly and
// carry few vowels; human handles ("alexander", "john_doe") do not. Long runs
// or one dominant character look like a pattern rather than noise and pull
// the score back down.
// ---------------------------------------------------------------------------

export const RANDOM_USERNAME_THRESHOLD = 0.6;

const VOWELS = new Set(["a", "e", "i", "o", "u"]);
const LETTER_RE = /\p{L}/u;
const DIGIT_RE = /\p{Nd}/u;

type CharClass = "digit" | "upper" | "lower" | "underscore" | "other";

export interface UsernameFeatures {
  length: number;
  transitionRate: number;
  vowelRatio: number;
  maxConsecutiveVowels: number;
  maxSameRun: number;
  dominantCharRatio: number;
  repeatPenalty: number;
  dominantPenalty: number;
}

export interface UsernameRandomness {
  /** 0..1, higher is more random-looking. */
  score: number;
  isRandom: boolean;
  features: UsernameFeatures | null;
}

export interface UsernameRandomnessOptions {
  threshold?: number;
  underscoreAsOwnClass?: boolean;
}

function isLetter(ch: string): boolean {
  return LETTER_RE.test(ch);
}

function classify(ch: string, underscoreAsOwnClass: boolean): CharClass {
  if (DIGIT_RE.test(ch)) return "digit";
  if (isLetter(ch)) {
    // Caseless scripts count as lower
    return ch === ch.toUpperCase() && ch !== ch.toLowerCase() ? "upper" : "lower";
  }
  if (underscoreAsOwnClass && ch === "_") return "underscore";
  return "other";
}

/** Share of adjacent pairs whose character class differs. */
export function transitionRate(chars: string[], underscoreAsOwnClass = false): number {
  if (chars.length <= 1) return 0;
  let transitions = 0;
  let prev = classify(chars[0] ?? "", underscoreAsOwnClass);
  for (const ch of chars.slice(1)) {
    const cur = classify(ch, underscoreAsOwnClass);
    if (cur !== prev) transitions++;
    prev = cur;
  }
  return transitions / (chars.length - 1);
}

/** Longest run of the same character, case-insensitive. */
export function maxSameRun(chars: string[]): number {
  if (chars.length === 0) return 0;
  let best = 1;
  let current = 1;
  for (let i = 1; i < chars.length; i++) {
    if (chars[i]?.toLowerCase() === chars[i - 1]?.toLowerCase()) {
      current++;
      best = Math.max(best, current);
    } else {
      current = 1;
    }
  }
  return best;
}

export function dominantCharRatio(chars: string[]): number {
  if (chars.length === 0) return 0;
  const counts = new Map<string, number>();
  for (const ch of chars) {
    const key = ch.toLowerCase();
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Math.max(...counts.values()) / chars.length;
}

export function vowelRatio(chars: string[]): number {
  const letters = chars.filter(isLetter).map((ch) => ch.toLowerCase());
  if (letters.length === 0) return 0;
  return letters.filter((ch) => VOWELS.has(ch)).length / letters.length;
}

export function maxConsecutiveVowels(chars: string[]): number {
  let best = 0;
  let current = 0;
  for (const ch of chars) {
    if (VOWELS.has(ch.toLowerCase())) {
      current++;
      best = Math.max(best, current);
    } else {
      current = 0;
    }
  }
  return best;
}

function repeatPenaltyFor(run: number): number {
  if (run <= 2) return 0;
  if (run === 3) return 0.1;
  if (run === 4) return 0.2;
  if (run === 5) return 0.3;
  return 0.45;
}

function dominantPenaltyFor(ratio: number): number {
  if (ratio > 0.5) return 0.2;
  if (ratio > 0.45) return 0.12;
  if (ratio > 0.4) return 0.08;
  return 0;
}

export function usernameRandomness(
  username: string | null,
  options: UsernameRandomnessOptions = {},
): UsernameRandomness {
  const threshold = options.threshold ?? RANDOM_USERNAME_THRESHOLD;
  const chars = Array.from((username ?? "").trim());
  const n = chars.length;
  if (n === 0) {
    return { score: 0, isRandom: false, features: null };
  }

  const tr = transitionRate(chars, options.underscoreAsOwnClass ?? false);
  const vr = vowelRatio(chars);
  const run = maxSameRun(chars);
  const dom = dominantCharRatio(chars);
  const consecutiveVowels = maxConsecutiveVowels(chars);

  // Amplify: low transition rates go lower, high ones higher
  const trComponent = tr ** 0.65;

  let vowelLack = 1 - vr;
  if (vr < 0.15) {
    vowelLack *= 1.5;
  } else if (vr > 0.4) {
    vowelLack *= 0.85;
  }
  if (consecutiveVowels >= 3) {
    vowelLack += 0.25;
  }
  const vowelComponent = Math.min(Math.max(vowelLack, 0), 1.5);

  const repeatPenalty = repeatPenaltyFor(run);
  const dominantPenalty = dominantPenaltyFor(dom);

  let score = 0.5 * trComponent + 0.5 * vowelComponent - repeatPenalty - dominantPenalty;

  // Short strings are hard to judge
  if (n <= 6) {
    score *= 0.75;
  } else if (n <= 9) {
    score *= 0.9;
  }

  score = Math.max(0, Math.min(score, 1));

  return {
    score,
    isRandom: score >= threshold,
    features: {
      length: n,
      transitionRate: tr,
      vowelRatio: vr,
      maxConsecutiveVowels: consecutiveVowels,
      maxSameRun: run,
      dominantCharRatio: dom,
      repeatPenalty,
      dominantPenalty,
    },
  };
}
