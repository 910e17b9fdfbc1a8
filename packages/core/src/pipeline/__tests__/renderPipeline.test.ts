import { assert, describe, test } from "@trellis-ui/testkit";
import { isTrellisError } from "../../errors.js";
import { createLayoutEngine } from "../../layout/engine/layoutEngine.js";
import { type MemoryLogger, createMemoryLogger } from "../../logging.js";
import { createMaterializer } from "../../runtime/materialize.js";
import { type JsonTemplate, createJsonTemplateParser } from "../../testing/jsonTemplate.js";
import { type MemoryHost, type MemoryView, createMemoryHost } from "../../testing/memoryHost.js";
import { createPathBinder } from "../../testing/pathBinder.js";
import { createBackgroundExecutor } from "../executor.js";
import { createPipelinePool } from "../pipelinePool.js";
import { type ListPreloader, type RenderPipeline, createRenderPipeline } from "../renderPipeline.js";

const CARD: JsonTemplate = {
  type: "view",
  id: "card",
  children: [
    { type: "text", id: "title", text: "${title}" },
    { type: "text", id: "sub", text: "by ${author}" },
  ],
};

const DATA = { title: "Hello", author: "Ada" };
const SIZE = { width: 200, height: Number.NaN };

type Fixture = Readonly<{
  pipeline: RenderPipeline<JsonTemplate, MemoryView>;
  mem: MemoryHost;
  logger: MemoryLogger;
}>;

function setup(preloadLists?: ListPreloader<MemoryView>): Fixture {
  const mem = createMemoryHost();
  const logger = createMemoryLogger();
  const pipeline = createRenderPipeline<JsonTemplate, MemoryView>({
    parser: createJsonTemplateParser(),
    binder: createPathBinder(),
    layout: createLayoutEngine({ logger }),
    materializer: createMaterializer({ host: mem.host, devMode: true, logger }),
    executor: createBackgroundExecutor(),
    logger,
    devMode: true,
    flushTimeoutMs: 1000,
    preloadLists,
  });
  return { pipeline, mem, logger };
}

describe("createRenderPipeline", () => {
  test("background phases then a UI-side flush produce the view", async () => {
    const { pipeline, mem } = setup();
    const task = pipeline.start(CARD, DATA, SIZE);
    assert.equal(pipeline.state(), "preparing");
    assert.equal(mem.calls.length, 0);

    const outcome = await task.done;
    assert.equal(outcome.status, "ready");
    assert.equal(pipeline.state(), "ready");
    assert.equal(mem.calls.length, 0);

    const view = await pipeline.syncFlush();
    assert.equal(view?.nodeId, "card");
    assert.deepEqual(
      view?.children.map((c) => c.content),
      [{ text: "Hello" }, { text: "by Ada" }],
    );
    assert.deepEqual(view?.frame, { x: 0, y: 0, width: 200, height: 40 });
    assert.equal(pipeline.state(), "idle");
    assert.equal(task.root()?.viewHandle, view);
  });

  test("syncFlush before the work finishes waits for it", async () => {
    const { pipeline } = setup();
    pipeline.start(CARD, DATA, SIZE);
    const view = await pipeline.syncFlush();
    assert.equal(view?.children.length, 2);
  });

  test("cancel before ready drops the work", async () => {
    const { pipeline, mem, logger } = setup();
    const task = pipeline.start(CARD, DATA, SIZE);
    task.cancel();
    assert.equal(pipeline.state(), "idle");

    const outcome = await task.done;
    assert.equal(outcome.status, "cancelled");
    assert.equal(await pipeline.syncFlush(), undefined);
    assert.equal(mem.count("create"), 0);
    assert.deepEqual(logger.entries, [
      { level: "debug", message: `[trellis][pipeline] task ${task.id}: cancelled before parse` },
    ]);
  });

  test("cancel after ready leaves the queued mount in place", async () => {
    const { pipeline } = setup();
    const task = pipeline.start(CARD, DATA, SIZE);
    await task.done;
    task.cancel();
    assert.equal(pipeline.state(), "ready");
    assert.equal((await pipeline.syncFlush())?.nodeId, "card");
  });

  test("starting again cancels the previous task", async () => {
    const { pipeline } = setup();
    const first = pipeline.start(CARD, DATA, SIZE);
    const second = pipeline.start(CARD, { title: "Again", author: "Bo" }, SIZE);
    assert.equal(first.token.isCancelled(), true);
    assert.equal((await first.done).status, "cancelled");
    assert.equal((await second.done).status, "ready");
    const view = await pipeline.syncFlush();
    assert.deepEqual(view?.children[0]?.content, { text: "Again" });
    assert.equal(pipeline.current(), second);
  });

  test("a parse failure fails the task and releases a waiting flush", async () => {
    const { pipeline, logger } = setup();
    const task = pipeline.start({ children: [] }, DATA, SIZE);
    const flushed = pipeline.syncFlush();
    const outcome = await task.done;
    assert.equal(outcome.status, "failed");
    if (outcome.status === "failed") {
      assert.equal(isTrellisError(outcome.error, "TRELLIS_PARSE_FAILURE"), true);
    }
    assert.equal(await flushed, undefined);
    assert.deepEqual(logger.entries, [
      {
        level: "error",
        message: `[trellis][pipeline] task ${task.id} failed: TrellisError: template parser returned no tree`,
      },
    ]);
  });

  test("startWithPrototype binds a clone of the given tree", async () => {
    const { pipeline } = setup();
    const prototype = createJsonTemplateParser().parse<MemoryView>(CARD) ?? assert.fail("parse");
    const task = pipeline.startWithPrototype(prototype, DATA, SIZE);
    const view = await pipeline.syncFlush();
    assert.deepEqual(
      view?.children.map((c) => c.content),
      [{ text: "Hello" }, { text: "by Ada" }],
    );
    assert.equal(task.prototype(), prototype);
    assert.notEqual(task.root(), prototype);
    assert.deepEqual(prototype.bindings, {});
    assert.equal(prototype.viewHandle, undefined);
  });

  test("the preload phase runs on the laid-out tree before the mount is queued", async () => {
    const seen: Array<[string, number, boolean]> = [];
    const { pipeline } = setup((root) => {
      seen.push([root.id, root.layoutResult.height, root.viewHandle === undefined]);
      return [{ listId: "feed", templateId: "list_cell_feed", heights: [20] }];
    });
    const task = pipeline.start(CARD, DATA, SIZE);
    const outcome = await task.done;
    assert.deepEqual(seen, [["card", 40, true]]);
    assert.deepEqual(task.lists(), [{ listId: "feed", templateId: "list_cell_feed", heights: [20] }]);
    assert.equal(outcome.status === "ready" ? outcome.lists : undefined, task.lists());
  });

  test("without a preloader no lists are reported", async () => {
    const { pipeline } = setup();
    const task = pipeline.start(CARD, DATA, SIZE);
    await task.done;
    assert.deepEqual(task.lists(), []);
  });

  test("reset cancels the current task and forgets it", async () => {
    const { pipeline } = setup();
    const task = pipeline.start(CARD, DATA, SIZE);
    pipeline.reset();
    assert.equal(pipeline.current(), undefined);
    assert.equal((await task.done).status, "cancelled");
  });
});

describe("createPipelinePool", () => {
  test("reuses released pipelines up to capacity", () => {
    const pool = createPipelinePool(() => setup().pipeline, 1);
    const a = pool.acquire();
    const b = pool.acquire();
    assert.notEqual(a, b);
    pool.release(a);
    pool.release(b);
    pool.release(b);
    assert.deepEqual(pool.stats(), { created: 2, reused: 0, dropped: 1, idle: 1, inUse: 0 });

    const again = pool.acquire({ flushTimeoutMs: 5 });
    assert.equal(again, a);
    assert.deepEqual(pool.stats(), { created: 2, reused: 1, dropped: 1, idle: 0, inUse: 1 });
    assert.equal(pool.capacity, 1);
  });

  test("release resets a pipeline mid-task", async () => {
    const pool = createPipelinePool(() => setup().pipeline);
    const pipeline = pool.acquire();
    const task = pipeline.start(CARD, DATA, SIZE);
    pool.release(pipeline);
    assert.equal((await task.done).status, "cancelled");
    assert.equal(pipeline.state(), "idle");
  });
});
