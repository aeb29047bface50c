import { SessionStore } from "./sessionStore";
import { QuizSession } from "../domain/session";

describe("SessionStore", () => {
  const T0 = new Date("2026-01-01T00:00:00.000Z");
  let now: Date;
  let store: SessionStore;

  const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

  const createSession = (overrides: Partial<QuizSession> = {}): QuizSession => ({
    id: "s1",
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
    createdAt: T0.toISOString(),
    updatedAt: T0.toISOString(),
    expiresAt: at(60).toISOString(),
    ttlSeconds: 60,
    ...overrides,
  });

  const thrown = (fn: () => unknown): unknown => {
    try {
      fn();
    } catch (error) {
      return error;
    }
    return undefined;
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    now = T0;
    store = new SessionStore({ now: () => now });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("get / require", () => {
    it("returns stored sessions", () => {
      store.put(createSession());

      expect(store.get("s1")?.id).toBe("s1");
      expect(store.get("missing")).toBeUndefined();
    });

    it("expires a session exactly at its deadline", () => {
      store.put(createSession());
      now = at(59);
      expect(store.require("s1").id).toBe("s1");

      now = at(60);
      expect(thrown(() => store.require("s1"))).toMatchObject({ code: "SESSION_EXPIRED" });
      expect(thrown(() => store.require("s1"))).toMatchObject({ code: "SESSION_NOT_FOUND" });
      expect(store.size()).toBe(0);
    });
  });

  describe("withLock", () => {
    it("commits the draft and slides the expiry", async () => {
      store.put(createSession());
      now = at(30);

      const result = await store.withLock("s1", (draft) => {
        draft.questionsAnswered = 3;
        return "done";
      });

      expect(result).toBe("done");
      const stored = store.get("s1");
      expect(stored?.questionsAnswered).toBe(3);
      expect(stored?.updatedAt).toBe("2026-01-01T00:00:30.000Z");
      expect(stored?.expiresAt).toBe("2026-01-01T00:01:30.000Z");
    });

    it("never slides an extended expiry backwards", async () => {
      store.put(createSession({ expiresAt: at(600).toISOString() }));
      now = at(30);

      await store.withLock("s1", (draft) => {
        draft.questionsAnswered = 1;
      });

      expect(store.get("s1")?.expiresAt).toBe("2026-01-01T00:10:00.000Z");
    });

    it("keeps the expiry in fixed mode", async () => {
      store = new SessionStore({ ttlMode: "fixed", now: () => now });
      store.put(createSession());
      now = at(30);

      await store.withLock("s1", (draft) => {
        draft.questionsAnswered = 1;
      });

      expect(store.get("s1")?.expiresAt).toBe("2026-01-01T00:01:00.000Z");
    });

    it("discards the draft when the work throws", async () => {
      store.put(createSession());

      await expect(
        store.withLock("s1", (draft) => {
          draft.questionsAnswered = 7;
          throw new Error("boom");
        })
      ).rejects.toThrow("boom");

      expect(store.get("s1")?.questionsAnswered).toBe(0);
      await expect(store.withLock("s1", (draft) => draft.questionsAnswered)).resolves.toBe(0);
    });

    it("abandons work that passes the ceiling", async () => {
      store.put(createSession());

      await expect(
        store.withLock(
          "s1",
          async (draft) => {
            draft.questionsAnswered = 9;
            await new Promise<void>(() => {});
          },
          { ceilingMs: 20 }
        )
      ).rejects.toMatchObject({ code: "OPERATION_TIMEOUT" });

      expect(store.get("s1")?.questionsAnswered).toBe(0);
    });

    it("aborts the signal of abandoned work", async () => {
      store.put(createSession());
      let received: AbortSignal | undefined;

      await expect(
        store.withLock(
          "s1",
          (draft, signal) => {
            received = signal;
            return new Promise<void>((_, reject) => {
              signal.addEventListener("abort", () => reject(new Error("cancelled")));
            });
          },
          { ceilingMs: 20 }
        )
      ).rejects.toMatchObject({ code: "OPERATION_TIMEOUT" });

      expect(received?.aborted).toBe(true);
    });

    it("reports a busy session when the wait bound passes", async () => {
      store.put(createSession());
      let finish: () => void = () => {};
      const holding = store.withLock(
        "s1",
        () =>
          new Promise<void>((resolve) => {
            finish = () => resolve();
          })
      );

      await expect(store.withLock("s1", () => undefined, { waitMs: 20 })).rejects.toMatchObject({
        code: "SESSION_BUSY",
      });
      expect(console.log).toHaveBeenCalledWith("[SessionStore] s1 is busy, queueing behind 1 request(s)");

      finish();
      await holding;
    });

    it("serializes concurrent updates", async () => {
      store.put(createSession());

      await Promise.all(
        Array.from({ length: 10 }, () =>
          store.withLock("s1", async (draft) => {
            const seen = draft.questionsAnswered;
            await Promise.resolve();
            draft.questionsAnswered = seen + 1;
          })
        )
      );

      expect(store.get("s1")?.questionsAnswered).toBe(10);
    });

    it("does not resurrect a session deleted during the work", async () => {
      store.put(createSession());

      await store.withLock("s1", (draft) => {
        draft.questionsAnswered = 5;
        store.delete("s1");
      });

      expect(store.get("s1")).toBeUndefined();
    });

    it("rejects unknown sessions before locking", async () => {
      await expect(store.withLock("missing", () => undefined)).rejects.toMatchObject({
        code: "SESSION_NOT_FOUND",
      });
    });
  });

  describe("applyTtl", () => {
    it("sets a new window counted from now", () => {
      const session = createSession();
      now = at(10);

      store.applyTtl(session, 120);

      expect(session.ttlSeconds).toBe(120);
      expect(session.expiresAt).toBe("2026-01-01T00:02:10.000Z");
    });
  });

  describe("extend", () => {
    it("moves the expiry forward without changing the idle window", () => {
      const session = createSession();
      now = at(10);

      store.extend(session, 120);

      expect(session.expiresAt).toBe("2026-01-01T00:02:10.000Z");
      expect(session.ttlSeconds).toBe(60);
    });

    it("never shortens the expiry", () => {
      const session = createSession();
      now = at(10);

      store.extend(session, 5);

      expect(session.expiresAt).toBe("2026-01-01T00:01:00.000Z");
    });
  });

  describe("sweep", () => {
    it("evicts only expired sessions", () => {
      store.put(createSession({ id: "old" }));
      store.put(createSession({ id: "fresh", expiresAt: at(600).toISOString() }));
      now = at(61);

      expect(store.sweep()).toBe(1);
      expect(store.get("fresh")?.id).toBe("fresh");
      expect(store.size()).toBe(1);
    });

    it("runs periodically once started", () => {
      jest.useFakeTimers();
      try {
        store.put(createSession());
        store.startSweeper(1000);
        now = at(120);

        jest.advanceTimersByTime(1000);

        expect(store.size()).toBe(0);
      } finally {
        store.stopSweeper();
        jest.useRealTimers();
      }
    });
  });
});
