import { describe, it, expect } from "vitest";
import { distractors, generateChallenge, normalizeAnswer } from "../../../src/lib/challenge.js";

function evaluate(question: string): number {
  const match = /^(\d+) ([+\-×÷]) (\d+) = \?$/.exec(question);
  if (!match) throw new Error(`Unexpected question: ${question}`);
  const left = Number(match[1]);
  const right = Number(match[3]);
  switch (match[2]) {
    case "+":
      return left + right;
    case "-":
      return left - right;
    case "×":
      return left * right;
    default:
      return left / right;
  }
}

describe("generateChallenge", () => {
  it("is deterministic for a fixed random source", () => {
    const challenge = generateChallenge(() => 0);
    expect(challenge).toEqual({
      question: "1 + 1 = ?",
      answer: "2",
      choices: ["3", "4", "5", "2"],
    });
  });

  it("always produces a solvable question with four distinct positive choices", () => {
    for (let i = 0; i < 500; i++) {
      const challenge = generateChallenge();
      const expected = evaluate(challenge.question);

      expect(Number.isInteger(expected)).toBe(true);
      expect(expected).toBeGreaterThan(0);
      expect(challenge.answer).toBe(String(expected));
      expect(challenge.choices).toHaveLength(4);
      expect(new Set(challenge.choices).size).toBe(4);
      expect(challenge.choices).toContain(challenge.answer);
      for (const choice of challenge.choices) {
        expect(Number(choice)).toBeGreaterThan(0);
      }
    }
  });
});

describe("distractors", () => {
  it("never offers zero, negatives or the answer itself", () => {
    const result = distractors(Math.random, 1);
    expect([...result].sort((a, b) => a - b)).toEqual([2, 3, 4]);
  });

  it("returns three values near the answer", () => {
    const result = distractors(Math.random, 10);
    expect(result).toHaveLength(3);
    for (const n of result) {
      expect([8, 9, 11, 12, 13]).toContain(n);
    }
  });
});

describe("normalizeAnswer", () => {
  it("keeps only digits", () => {
    expect(normalizeAnswer(" 1 2 ")).toBe("12");
    expect(normalizeAnswer("answer: 7!")).toBe("7");
  });

  it("returns an empty string for non-numeric text", () => {
    expect(normalizeAnswer("hello")).toBe("");
  });
});
