import { assert, describe, test } from "@trellis-ui/testkit";
import { isTrellisError } from "../../errors.js";
import { createMemoryLogger } from "../../logging.js";
import { runOffUiTurn } from "../../runtime/uiAffinity.js";
import { createBackgroundExecutor, createCancellationToken } from "../executor.js";
import { createOperationQueue } from "../operationQueue.js";

describe("createOperationQueue", () => {
  test("high priority first, then FIFO; the root op is the result", () => {
    const q = createOperationQueue<string>();
    const order: string[] = [];
    q.enqueue(() => {
      order.push("a");
      return undefined;
    });
    q.enqueue(
      () => {
        order.push("b");
        return "b";
      },
      { priority: "high" },
    );
    q.enqueue(
      () => {
        order.push("c");
        return "c";
      },
      { tag: "root" },
    );
    assert.equal(q.forceFlush(), "c");
    assert.deepEqual(order, ["b", "a", "c"]);
    assert.equal(q.state(), "idle");
    assert.equal(q.size(), 0);
  });

  test("ops enqueued during a flush run in the same flush", () => {
    const q = createOperationQueue<string>();
    const order: string[] = [];
    q.enqueue(() => {
      order.push("first");
      q.enqueue(() => {
        order.push("second");
        return undefined;
      });
      return undefined;
    });
    q.forceFlush();
    assert.deepEqual(order, ["first", "second"]);
  });

  test("syncFlush waits for ready", async () => {
    const q = createOperationQueue<string>();
    q.markPreparing();
    assert.equal(q.state(), "preparing");
    q.enqueue(() => "view", { tag: "root" });
    setTimeout(() => q.markReady(), 0);
    assert.equal(await q.syncFlush(1000), "view");
    assert.equal(q.state(), "idle");
  });

  test("syncFlush on timeout warns and flushes what is queued", async () => {
    const logger = createMemoryLogger();
    const q = createOperationQueue<string>({ logger });
    q.markPreparing();
    q.enqueue(() => "partial", { tag: "root" });
    assert.equal(await q.syncFlush(10), "partial");
    assert.deepEqual(logger.entries, [
      {
        level: "warn",
        message:
          "[trellis][queue] TRELLIS_FLUSH_TIMEOUT: background work not ready after 10ms; flushing 1 queued op(s)",
      },
    ]);
  });

  test("a throwing op fails the flush and empties the queue", () => {
    const q = createOperationQueue<string>();
    q.enqueue(() => {
      throw new Error("boom");
    });
    q.enqueue(() => "never");
    assert.throws(
      () => q.forceFlush(),
      (e: unknown) =>
        isTrellisError(e, "TRELLIS_FLUSH_FAILED") &&
        e.message === "queued operation threw: Error: boom" &&
        e.cause instanceof Error,
    );
    assert.equal(q.state(), "idle");
    assert.equal(q.size(), 0);
  });

  test("reset drops queued ops", () => {
    const q = createOperationQueue<string>();
    q.markPreparing();
    q.enqueue(() => "x", { tag: "root" });
    q.reset();
    assert.equal(q.state(), "idle");
    assert.equal(q.forceFlush(), undefined);
  });

  test("flushing from background work is rejected in development", () => {
    const q = createOperationQueue<string>({ devMode: true });
    assert.throws(
      () => runOffUiTurn(() => q.forceFlush()),
      (e: unknown) => isTrellisError(e, "TRELLIS_WRONG_THREAD"),
    );
  });
});

describe("createBackgroundExecutor", () => {
  test("runs work later, off the UI turn", async () => {
    const scheduled: Array<() => void> = [];
    const executor = createBackgroundExecutor((cb) => {
      scheduled.push(cb);
    });
    const result = executor.submit(() => 21 * 2);
    assert.equal(executor.pending(), 1);
    assert.equal(scheduled.length, 1);
    scheduled[0]?.();
    assert.equal(await result, 42);
    assert.equal(executor.pending(), 0);
  });

  test("a throwing step rejects its promise", async () => {
    const executor = createBackgroundExecutor();
    await assert.rejects(
      executor.submit(() => {
        throw new Error("nope");
      }),
      { message: "nope" },
    );
  });
});

describe("createCancellationToken", () => {
  test("throws once cancelled", () => {
    const token = createCancellationToken();
    token.throwIfCancelled("parse");
    token.cancel();
    assert.equal(token.isCancelled(), true);
    assert.throws(
      () => token.throwIfCancelled("layout"),
      (e: unknown) => isTrellisError(e, "TRELLIS_CANCELLED") && e.message === "cancelled before layout",
    );
  });
});
