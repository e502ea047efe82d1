import { describe, it } from "node:test";
import assert from "node:assert";
import { ResetEvent, Semaphore, raceTimeout, TIMED_OUT } from "./sync.ts";

describe("ResetEvent", () => {
  it("should release every waiter on set", async () => {
    const event = new ResetEvent();
    const order: string[] = [];

    const first = event.wait().then(() => order.push("first"));
    const second = event.wait().then(() => order.push("second"));
    event.set();
    await Promise.all([first, second]);

    assert.deepStrictEqual(order, ["first", "second"]);
    assert.strictEqual(event.isSet(), true);
  });

  it("should resolve at once when already set", async () => {
    const event = new ResetEvent();
    event.set();
    event.set();

    await event.wait();
    assert.strictEqual(event.isSet(), true);
  });
});

describe("Semaphore", () => {
  it("should keep posts made before anyone waits", async () => {
    const semaphore = new Semaphore();
    semaphore.post();
    semaphore.post();

    assert.strictEqual(semaphore.available, 2);
    await semaphore.wait();
    await semaphore.wait();
    assert.strictEqual(semaphore.available, 0);
  });

  it("should let one waiter through per post", async () => {
    const semaphore = new Semaphore();
    let passed = 0;

    const first = semaphore.wait().then(() => passed++);
    const second = semaphore.wait().then(() => passed++);
    semaphore.post();
    await first;

    assert.strictEqual(passed, 1);
    semaphore.post();
    await second;
    assert.strictEqual(passed, 2);
    assert.strictEqual(semaphore.available, 0);
  });
});

describe("raceTimeout", () => {
  it("should return the value when the promise wins", async () => {
    const result = await raceTimeout(Promise.resolve("frame"), 50);
    assert.strictEqual(result, "frame");
  });

  it("should return TIMED_OUT and leave the promise usable", async () => {
    const event = new ResetEvent();
    const waiting = event.wait().then(() => "set");

    assert.strictEqual(await raceTimeout(waiting, 5), TIMED_OUT);
    event.set();
    assert.strictEqual(await raceTimeout(waiting, 5), "set");
  });
});
