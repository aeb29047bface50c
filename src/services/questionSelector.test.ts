import { QuestionSelector, SelectionCriteria, relaxationLadder } from "./questionSelector";
import { InMemoryQuestionStore, QuestionStore } from "../stores/questionStore";
import { Question } from "../domain/question";

const createQuestion = (overrides: Partial<Question> = {}): Question => ({
  id: "q1",
  question: "What is the boiling point of water in Celsius?",
  type: "text",
  correctAnswer: "100",
  alternativeAnswers: [],
  difficulty: "medium",
  topic: "physics",
  category: "science",
  ...overrides,
});

const criteria = (overrides: Partial<SelectionCriteria> = {}): SelectionCriteria => ({
  excludeIds: [],
  difficulty: "medium",
  excludedTopics: [],
  preferredTopics: [],
  ...overrides,
});

describe("relaxationLadder", () => {
  it("drops topics, then difficulty nearest first, then category", () => {
    const ladder = relaxationLadder(criteria({ category: "science", excludedTopics: ["space"] }));

    expect(ladder.map((a) => [a.relaxed, a.filters.difficulty, a.filters.category])).toEqual([
      ["none", "medium", "science"],
      ["topics", "medium", "science"],
      ["difficulty", "easy", "science"],
      ["difficulty", "hard", "science"],
      ["category", undefined, undefined],
    ]);
    expect(ladder[1].filters.excludedTopics).toBeUndefined();
  });

  it("skips steps that would change nothing", () => {
    const ladder = relaxationLadder(criteria({ difficulty: "easy" }));

    expect(ladder.map((a) => [a.relaxed, a.filters.difficulty])).toEqual([
      ["none", "easy"],
      ["difficulty", "medium"],
      ["difficulty", "hard"],
    ]);
  });

  it("never relaxes excluded ids", () => {
    const ladder = relaxationLadder(criteria({ excludeIds: ["q1"], category: "science" }));

    expect(ladder.every((a) => a.filters.excludeIds.includes("q1"))).toBe(true);
  });
});

describe("QuestionSelector", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns an exact match without relaxing", async () => {
    const selector = new QuestionSelector(new InMemoryQuestionStore([createQuestion()]));

    const selection = await selector.select(criteria({ category: "science" }));

    expect(selection).toEqual({ question: createQuestion(), relaxed: "none" });
  });

  it("relaxes excluded topics before difficulty", async () => {
    const store = new InMemoryQuestionStore([
      createQuestion({ id: "space-1", topic: "space" }),
      createQuestion({ id: "hard-1", difficulty: "hard" }),
    ]);

    const selection = await new QuestionSelector(store).select(criteria({ excludedTopics: ["space"] }));

    expect(selection?.question.id).toBe("space-1");
    expect(selection?.relaxed).toBe("topics");
  });

  it("falls back to other categories last", async () => {
    const store = new InMemoryQuestionStore([createQuestion({ id: "his-1", category: "history" })]);

    const selection = await new QuestionSelector(store).select(criteria({ category: "science" }));

    expect(selection).toMatchObject({ question: { id: "his-1" }, relaxed: "category" });
  });

  it("returns null when everything was asked", async () => {
    const selector = new QuestionSelector(new InMemoryQuestionStore([createQuestion()]));

    expect(await selector.select(criteria({ excludeIds: ["q1"] }))).toBeNull();
  });

  describe("when the store fails", () => {
    const failing = (query: QuestionStore["query"]): QuestionStore => ({
      query,
      getById: async () => undefined,
      count: async () => 0,
    });

    it("raises QUESTION_UNAVAILABLE in strict mode", async () => {
      const selector = new QuestionSelector(failing(() => Promise.reject(new Error("index offline"))));

      await expect(selector.select(criteria(), { strict: true })).rejects.toMatchObject({
        code: "QUESTION_UNAVAILABLE",
        details: { reason: "index offline" },
      });
    });

    it("treats a failing step as empty otherwise", async () => {
      const query = jest
        .fn<ReturnType<QuestionStore["query"]>, Parameters<QuestionStore["query"]>>()
        .mockRejectedValueOnce(new Error("index offline"))
        .mockResolvedValue([createQuestion({ id: "easy-1", difficulty: "easy" })]);

      const selection = await new QuestionSelector(failing(query)).select(criteria());

      expect(selection).toMatchObject({ question: { id: "easy-1" }, relaxed: "difficulty" });
      expect(query).toHaveBeenCalledTimes(2);
    });

    it("bounds each call with a timeout", async () => {
      const selector = new QuestionSelector(failing(() => new Promise(() => {})), 20);

      await expect(selector.select(criteria(), { strict: true })).rejects.toMatchObject({
        code: "QUESTION_UNAVAILABLE",
        details: { reason: "timed out" },
      });
    });
  });
});
