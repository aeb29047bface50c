import {
  QuizSession,
  addTopic,
  canTransition,
  createParticipant,
  findParticipant,
  markAsked,
  recordResult,
  totalScore,
  transition,
} from "./session";

describe("session", () => {
  const createSession = (overrides: Partial<QuizSession> = {}): QuizSession => ({
    id: "sess_1",
    mode: "single",
    language: "en",
    participants: [],
    maxQuestions: 10,
    currentDifficulty: "medium",
    preferredTopics: [],
    excludedTopics: [],
    phase: "idle",
    questionsAnswered: 0,
    askedQuestionIds: [],
    clientExcludedIds: [],
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    expiresAt: "2026-01-01T00:30:00.000Z",
    ttlSeconds: 1800,
    ...overrides,
  });

  describe("transition", () => {
    it("moves forward through the quiz", () => {
      const session = createSession();

      transition(session, "asking");
      transition(session, "awaiting_answer");
      transition(session, "asking");
      transition(session, "finished");

      expect(session.phase).toBe("finished");
    });

    it("never leaves finished or goes back to idle", () => {
      expect(canTransition("finished", "asking")).toBe(false);
      expect(canTransition("asking", "idle")).toBe(false);
      expect(() => transition(createSession({ phase: "finished" }), "asking")).toThrow(
        "Illegal phase transition finished -> asking for sess_1"
      );
    });
  });

  describe("participants", () => {
    it("finds the named participant or falls back to the host", () => {
      const guest = createParticipant("Ben");
      const host = createParticipant("Ana", { isHost: true });
      const session = createSession({ participants: [guest, host] });

      expect(findParticipant(session)).toBe(host);
      expect(findParticipant(session, guest.id)).toBe(guest);
      expect(findParticipant(session, "p_missing")).toBeUndefined();
    });

    it("adds points and counts graded answers only", () => {
      const player = createParticipant("Ana");

      recordResult(player, { kind: "partially_correct", points: 0.5, userAnswer: "Rome", correctAnswer: "Rome, Italy", tier: "judge" });
      recordResult(player, { kind: "skipped", points: 0, userAnswer: "", correctAnswer: "Nile", tier: "none" });
      recordResult(player, { kind: "correct", points: 1, userAnswer: "Au", correctAnswer: "Au", tier: "exact" });

      expect(player).toMatchObject({ score: 1.5, answeredCount: 2, correctCount: 1, lastResult: "correct" });
      expect(totalScore(createSession({ participants: [player] }))).toBe(1.5);
    });
  });

  it("records each asked question once", () => {
    const session = createSession();

    markAsked(session, "geo-1");
    markAsked(session, "geo-1");

    expect(session.askedQuestionIds).toEqual(["geo-1"]);
  });

  it("stores topics lowercased without duplicates", () => {
    const topics: string[] = [];

    expect(addTopic(topics, " Geography ")).toBe(true);
    expect(addTopic(topics, "geography")).toBe(false);
    expect(addTopic(topics, "  ")).toBe(false);
    expect(topics).toEqual(["geography"]);
  });
});
