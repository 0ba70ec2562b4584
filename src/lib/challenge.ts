// ---------------------------------------------------------------------------
// Arithmetic challenge generator
// ---------------------------------------------------------------------------

export type Operator = "+" | "-" | "×" | "÷";

export interface Challenge {
  question: string;
  /** Exact expected answer, digits only. */
  answer: string;
  /** Correct answer plus distractors, shuffled, for one-tap buttons. */
  choices: string[];
}

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

const OPERATORS: readonly Operator[] = ["+", "-", "×", "÷"];
const DISTRACTOR_OFFSETS: readonly number[] = [-2, -1, 1, 2, 3];
const DISTRACTOR_COUNT = 3;

function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: RandomSource, items: readonly T[]): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error("Cannot pick from an empty list");
  }
  return item;
}

function shuffle<T>(random: RandomSource, items: T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

function operands(random: RandomSource, op: Operator): { left: number; right: number; result: number } {
  switch (op) {
    case "+": {
      const left = randomInt(random, 1, 5);
      const right = randomInt(random, 1, 5);
      return { left, right, result: left + right };
    }
    case "-": {
      const left = randomInt(random, 5, 9);
      const right = randomInt(random, 1, left - 1);
      return { left, right, result: left - right };
    }
    case "×": {
      const left = randomInt(random, 2, 5);
      const right = randomInt(random, 2, 5);
      return { left, right, result: left * right };
    }
    case "÷": {
      const quotient = randomInt(random, 1, 9);
      const divisor = randomInt(random, 2, 9);
      return { left: quotient * divisor, right: divisor, result: quotient };
    }
  }
}

/** Distinct positive wrong answers near the correct one. */
export function distractors(random: RandomSource, answer: number): number[] {
  const candidates = DISTRACTOR_OFFSETS.map((offset) => answer + offset).filter((n) => n > 0 && n !== answer);
  return shuffle(random, [...new Set(candidates)]).slice(0, DISTRACTOR_COUNT);
}

export function generateChallenge(random: RandomSource = Math.random): Challenge {
  const op = pick(random, OPERATORS);
  const { left, right, result } = operands(random, op);
  const choices = shuffle(random, [result, ...distractors(random, result)]).map(String);
  return {
    question: `${String(left)} ${op} ${String(right)} = ?`,
    answer: String(result),
    choices,
  };
}

/** Strip an answer to its digits; an empty result is not an answer. */
export function normalizeAnswer(text: string): string {
  return text.replace(/\D/g, "");
}
