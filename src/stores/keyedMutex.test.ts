import { KeyedMutex, LockWaitTimeoutError } from "./keyedMutex";

describe("KeyedMutex", () => {
  let mutex: KeyedMutex;

  beforeEach(() => {
    mutex = new KeyedMutex();
  });

  it("grants waiters in arrival order", async () => {
    const order: string[] = [];
    const releaseFirst = await mutex.acquire("s1", 1000);

    const second = mutex.acquire("s1", 1000).then((release) => {
      order.push("second");
      return release;
    });
    const third = mutex.acquire("s1", 1000).then((release) => {
      order.push("third");
      return release;
    });
    expect(mutex.waiting("s1")).toBe(2);

    releaseFirst();
    const releaseSecond = await second;
    expect(order).toEqual(["second"]);

    releaseSecond();
    const releaseThird = await third;
    expect(order).toEqual(["second", "third"]);

    releaseThird();
    expect(mutex.isLocked("s1")).toBe(false);
  });

  it("gives up after the wait bound and leaves the queue", async () => {
    const release = await mutex.acquire("s1", 1000);

    await expect(mutex.acquire("s1", 20)).rejects.toBeInstanceOf(LockWaitTimeoutError);

    expect(mutex.waiting("s1")).toBe(0);
    expect(mutex.isLocked("s1")).toBe(true);
    release();
    expect(mutex.isLocked("s1")).toBe(false);
  });

  it("keeps keys independent", async () => {
    const releaseA = await mutex.acquire("a", 1000);
    const releaseB = await mutex.acquire("b", 1000);

    expect(mutex.isLocked("a")).toBe(true);
    expect(mutex.isLocked("b")).toBe(true);

    releaseA();
    releaseB();
  });

  it("ignores a second release of the same grant", async () => {
    const releaseFirst = await mutex.acquire("s1", 1000);
    const second = mutex.acquire("s1", 1000);

    releaseFirst();
    releaseFirst();
    const releaseSecond = await second;

    expect(mutex.isLocked("s1")).toBe(true);
    releaseSecond();
    expect(mutex.isLocked("s1")).toBe(false);
  });
});
