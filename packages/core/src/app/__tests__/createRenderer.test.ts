import { assert, beforeEach, describe, test } from "@trellis-ui/testkit";
import { isTrellisError } from "../../errors.js";
import { type MemoryLogger, createMemoryLogger } from "../../logging.js";
import { type JsonTemplate, createJsonTemplateParser } from "../../testing/jsonTemplate.js";
import { type MemoryHost, type MemoryView, createMemoryHost } from "../../testing/memoryHost.js";
import { createPathBinder } from "../../testing/pathBinder.js";
import { createRenderer } from "../createRenderer.js";
import type { Renderer } from "../types.js";

const CARD: JsonTemplate = {
  root: {
    type: "view",
    id: "card",
    children: [
      { type: "text", id: "title", text: "${title}" },
      { type: "text", id: "sub", text: "by ${author}" },
    ],
  },
};

const SIZE = { width: 200, height: Number.NaN };

function contents(view: MemoryView): unknown[] {
  return view.children.map((c) => c.content);
}

describe("createRenderer", () => {
  let mem: MemoryHost;
  let logger: MemoryLogger;
  let renderer: Renderer<JsonTemplate, MemoryView>;

  beforeEach(() => {
    mem = createMemoryHost();
    logger = createMemoryLogger();
    renderer = createRenderer<JsonTemplate, MemoryView>({
      parser: createJsonTemplateParser(),
      binder: createPathBinder(),
      host: mem.host,
      logger,
      config: { devMode: true },
    });
  });

  test("render parses, binds, lays out and mounts", () => {
    const view = renderer.render(CARD, { title: "Hello", author: "Ada" }, SIZE);
    assert.equal(view.kind, "view");
    assert.deepEqual(contents(view), [{ text: "Hello" }, { text: "by Ada" }]);
    assert.deepEqual(view.frame, { x: 0, y: 0, width: 200, height: 40 });
    assert.deepEqual(view.children[1]?.frame, { x: 0, y: 20, width: 200, height: 20 });
    assert.equal(renderer.getRecord(view)?.root.id, "card");
  });

  test("render rejects a template the parser cannot read", () => {
    assert.throws(
      () => renderer.render({ nothing: true }, {}, SIZE),
      (e: unknown) => isTrellisError(e, "TRELLIS_PARSE_FAILURE"),
    );
  });

  test("update patches only what the data changed", () => {
    const view = renderer.render(CARD, { title: "Hello", author: "Ada" }, SIZE);
    mem.clearCalls();
    assert.equal(renderer.update(view, { title: "Howdy", author: "Ada" }, SIZE), 1);
    assert.deepEqual(contents(view), [{ text: "Howdy" }, { text: "by Ada" }]);
    assert.equal(mem.count("update"), 1);
    assert.equal(mem.count("create"), 0);
  });

  test("update with unchanged data and size does nothing", () => {
    const data = { title: "Hello", author: "Ada" };
    const view = renderer.render(CARD, data, SIZE);
    mem.clearCalls();
    assert.equal(renderer.update(view, { ...data }, SIZE), 0);
    assert.equal(mem.calls.length, 0);
  });

  test("update with a new size relayouts without ops", () => {
    const data = { title: "Hello", author: "Ada" };
    const view = renderer.render(CARD, data, SIZE);
    assert.equal(renderer.update(view, data, { width: 120, height: Number.NaN }), 0);
    assert.deepEqual(view.frame, { x: 0, y: 0, width: 120, height: 40 });
    assert.equal(renderer.getRecord(view)?.containerSize.width, 120);
  });

  test("update of a foreign view throws", () => {
    const stranger = createMemoryHost().host.widgets.view.create(
      createJsonTemplateParser().parse<MemoryView>({ type: "view" }) ?? assert.fail("parse"),
    );
    assert.throws(
      () => renderer.update(stranger, {}, SIZE),
      (e: unknown) =>
        isTrellisError(e, "TRELLIS_UNKNOWN_VIEW") &&
        e.message === "update: view was not produced by this renderer",
    );
  });

  test("quickUpdate rebinds in place and refreshes every view", () => {
    const view = renderer.render(CARD, { title: "Hello", author: "Ada" }, SIZE);
    mem.clearCalls();
    renderer.quickUpdate(view, { title: "Hi", author: "Bo" }, SIZE);
    assert.deepEqual(contents(view), [{ text: "Hi" }, { text: "by Bo" }]);
    assert.equal(mem.count("update"), 3);
    assert.deepEqual(renderer.getRecord(view)?.data, { title: "Hi", author: "Bo" });
  });

  test("renderWithCache parses a template id once", () => {
    let parses = 0;
    const inner = createJsonTemplateParser();
    const counting = createRenderer<JsonTemplate, MemoryView>({
      parser: {
        parse<V>(raw: JsonTemplate) {
          parses++;
          return inner.parse<V>(raw);
        },
      },
      binder: createPathBinder(),
      host: mem.host,
      logger,
    });
    counting.renderWithCache(CARD, "card", { title: "a", author: "b" }, SIZE);
    const second = counting.renderWithCache(CARD, "card", { title: "c", author: "d" }, SIZE);
    assert.equal(parses, 1);
    assert.deepEqual(contents(second), [{ text: "c" }, { text: "by d" }]);
    counting.clearCaches("card");
    counting.renderWithCache(CARD, "card", { title: "e", author: "f" }, SIZE);
    assert.equal(parses, 2);
  });

  test("calculateHeight lays out headlessly and caches by data id", () => {
    const wrapped = { id: 7, title: "aaaa bbbb cccc", author: "x" };
    assert.equal(renderer.calculateHeight(CARD, "card", wrapped, 80), 60);
    assert.equal(renderer.calculateHeight(CARD, "card", { ...wrapped, title: "a" }, 80), 60);
    assert.equal(renderer.calculateHeight(CARD, "card", { ...wrapped, title: "a" }, 80, { useCache: false }), 40);
    assert.equal(mem.calls.length, 0);

    renderer.clearCaches("card");
    assert.equal(renderer.calculateHeight(CARD, "card", { ...wrapped, title: "a" }, 80), 40);
  });

  test("calculateHeight without a data id never caches", () => {
    assert.equal(renderer.calculateHeight(CARD, "card", { title: "aaaa bbbb cccc", author: "x" }, 80), 60);
    assert.equal(renderer.calculateHeight(CARD, "card", { title: "a", author: "x" }, 80), 40);
  });

  test("calculateHeight returns 0 for a template that does not parse", () => {
    assert.equal(renderer.calculateHeight({ nothing: true }, "broken", { id: 1 }, 80), 0);
    assert.deepEqual(logger.entries, [
      {
        level: "error",
        message: "[trellis][render] calculateHeight: template parser returned no tree (broken)",
      },
    ]);
  });

  test("cleanup detaches views and forgets the record", () => {
    const view = renderer.render(CARD, { title: "Hello", author: "Ada" }, SIZE);
    renderer.cleanup(view);
    assert.equal(renderer.getRecord(view), undefined);
    assert.equal(view.children.length, 0);
    renderer.cleanup(view);
  });

  test("start + syncFlush renders in the background and adopts the view", async () => {
    const task = renderer.start(CARD, { title: "Later", author: "Cy" }, SIZE);
    const view = await task.syncFlush(1000);
    assert.equal(view?.nodeId, "card");
    if (view === undefined) return;
    assert.deepEqual(contents(view), [{ text: "Later" }, { text: "by Cy" }]);
    assert.equal(renderer.getRecord(view)?.data.title, "Later");
    assert.deepEqual(renderer.pipelines.stats(), { created: 1, reused: 0, dropped: 0, idle: 1, inUse: 0 });

    assert.equal(renderer.update(view, { title: "Later", author: "Di" }, SIZE), 1);
    assert.deepEqual(view.children[1]?.content, { text: "by Di" });
  });

  test("a cancelled task returns its pipeline", async () => {
    const task = renderer.start(CARD, { title: "x", author: "y" }, SIZE);
    task.cancel();
    assert.equal((await task.task.done).status, "cancelled");
    assert.equal(renderer.pipelines.stats().inUse, 0);
    const next = renderer.start(CARD, { title: "x", author: "y" }, SIZE);
    await next.syncFlush(1000);
    assert.equal(renderer.pipelines.stats().reused, 1);
  });

  test("renderWithPipelineCache skips the parse phase once the template is cached", async () => {
    let parses = 0;
    const inner = createJsonTemplateParser();
    const counting = createRenderer<JsonTemplate, MemoryView>({
      parser: {
        parse<V>(raw: JsonTemplate) {
          parses++;
          return inner.parse<V>(raw);
        },
      },
      binder: createPathBinder(),
      host: mem.host,
      logger,
    });
    const first = await counting.renderWithPipelineCache(CARD, "card", { title: "a", author: "b" }, SIZE).syncFlush(1000);
    const second = await counting.renderWithPipelineCache(CARD, "card", { title: "c", author: "d" }, SIZE).syncFlush(1000);
    assert.equal(parses, 1);
    if (first === undefined || second === undefined) return assert.fail("no view");
    assert.deepEqual(contents(second), [{ text: "c" }, { text: "by d" }]);
    assert.equal(counting.getRecord(second)?.prototype, counting.getRecord(first)?.prototype);

    counting.renderWithCache(CARD, "card", { title: "e", author: "f" }, SIZE);
    assert.equal(parses, 1);
  });

  test("renderBatch flushes every item in order and reports failures per item", async () => {
    const results = await renderer.renderBatch([
      { id: "a", template: CARD, data: { title: "A", author: "x" }, containerSize: SIZE },
      { id: "bad", template: { nothing: true }, data: {}, containerSize: SIZE },
      { id: "b", template: CARD, templateId: "card", data: { title: "B", author: "y" }, containerSize: SIZE },
    ]);
    assert.deepEqual(
      results.map((r) => r.id),
      ["a", "bad", "b"],
    );
    const [a, bad, b] = results;
    assert.deepEqual(a?.view && contents(a.view), [{ text: "A" }, { text: "by x" }]);
    assert.deepEqual(b?.view && contents(b.view), [{ text: "B" }, { text: "by y" }]);
    assert.equal(bad?.view, undefined);
    assert.ok(isTrellisError(bad?.error, "TRELLIS_PARSE_FAILURE"));
    assert.equal(renderer.pipelines.stats().inUse, 0);
    if (b?.view === undefined) return assert.fail("no view");
    assert.equal(renderer.getRecord(b.view)?.data.title, "B");
  });

  test("calculateHeightsBatch measures each item in order", () => {
    const results = renderer.calculateHeightsBatch([
      { id: "x", template: CARD, templateId: "card", data: { id: 1, title: "aaaa bbbb cccc", author: "x" }, containerWidth: 80 },
      { id: "bad", template: { nothing: true }, templateId: "broken", data: {}, containerWidth: 80 },
      { id: "y", template: CARD, templateId: "card", data: { title: "a", author: "x" }, containerWidth: 80 },
    ]);
    assert.deepEqual(
      results.map((r) => [r.id, r.height]),
      [
        ["x", 60],
        ["bad", 0],
        ["y", 40],
      ],
    );
    assert.ok(isTrellisError(results[1]?.error, "TRELLIS_PARSE_FAILURE"));
    assert.equal(results[0]?.error, undefined);
    assert.deepEqual(logger.entries, [
      {
        level: "error",
        message: "[trellis][render] calculateHeightsBatch: template parser returned no tree (bad)",
      },
    ]);
    assert.equal(mem.calls.length, 0);
  });

  test("pipeline renders preload list item heights with the cell template", async () => {
    const feed: JsonTemplate = {
      type: "view",
      id: "feed",
      children: [
        {
          type: "list",
          id: "rows",
          items: "${rows}",
          style: { width: 80 },
          itemTemplate: { type: "text", id: "row", text: "${label}" },
        },
      ],
    };
    const rows = [
      { id: "r1", label: "a" },
      { id: "r2", label: "aaaa bbbb cccc" },
    ];
    const task = renderer.start(feed, { rows }, SIZE);
    await task.syncFlush(1000);
    assert.deepEqual(task.task.lists(), [{ listId: "rows", templateId: "list_cell_rows", heights: [20, 40] }]);

    // Served from the height cache; the template argument is never parsed.
    assert.equal(renderer.calculateHeight({ nothing: true }, "list_cell_rows", rows[1] ?? {}, 80), 40);
    assert.deepEqual(logger.entries, []);
  });

  test("invalid configuration is rejected up front", () => {
    assert.throws(
      () =>
        createRenderer<JsonTemplate, MemoryView>({
          parser: createJsonTemplateParser(),
          binder: createPathBinder(),
          host: mem.host,
          config: { pipelinePoolCapacity: 0 },
        }),
      (e: unknown) =>
        isTrellisError(e, "TRELLIS_INVALID_CONFIG") &&
        e.message === "pipelinePoolCapacity must be a positive integer",
    );
  });
});
