import { difficultiesByDistance, displayCorrectAnswer, stepDifficulty, toPublicQuestion, Question } from "./question";
import { normalizeText, tokenSimilarity } from "./textNormalization";

describe("question", () => {
  const planet: Question = {
    id: "mc-1",
    question: "Which planet is known as the Red Planet?",
    type: "text_multichoice",
    possibleAnswers: { a: "Venus", b: "Mars", c: "Jupiter", d: "Saturn" },
    correctAnswer: "b",
    alternativeAnswers: [],
    difficulty: "easy",
    topic: "space",
    category: "science",
    explanation: "Iron oxide gives Mars its colour.",
  };

  it("steps difficulty by one and clamps at the ends", () => {
    expect(stepDifficulty("medium", 1)).toBe("hard");
    expect(stepDifficulty("hard", 1)).toBe("hard");
    expect(stepDifficulty("easy", -1)).toBe("easy");
  });

  it("orders difficulties by distance, easier first on ties", () => {
    expect(difficultiesByDistance("medium")).toEqual(["medium", "easy", "hard"]);
    expect(difficultiesByDistance("hard")).toEqual(["hard", "medium", "easy"]);
  });

  it("shows the letter and text of a multiple-choice answer", () => {
    expect(displayCorrectAnswer(planet)).toBe("b) Mars");
  });

  it("strips answers from the public view", () => {
    const view = toPublicQuestion(planet);

    expect(view).not.toHaveProperty("correctAnswer");
    expect(view).not.toHaveProperty("explanation");
    expect(view.possibleAnswers?.b).toBe("Mars");
  });
});

describe("textNormalization", () => {
  it("normalizes case, punctuation and spacing", () => {
    expect(normalizeText("  Paris, France! ")).toBe("paris france");
    expect(normalizeText("St. John's (Canada)")).toBe("st johns canada");
  });

  it("measures token overlap", () => {
    expect(tokenSimilarity("the river Nile", "Nile river")).toBeCloseTo(2 / 3);
    expect(tokenSimilarity("", "Nile")).toBe(0);
  });
});
