import { assert, describe, test } from "@trellis-ui/testkit";
import { isTrellisError } from "../../errors.js";
import { createMemoryLogger } from "../../logging.js";
import { TemplateNode } from "../../model/node.js";
import { type MemoryView, createMemoryHost } from "../../testing/memoryHost.js";
import { createViewRecyclePool } from "../../widgets/recyclePool.js";
import { createMaterializer } from "../materialize.js";
import { assertUiTurn, isOnUiTurn, runOffUiTurn } from "../uiAffinity.js";

function tree(child: TemplateNode<MemoryView>): TemplateNode<MemoryView> {
  return new TemplateNode<MemoryView>({ id: "r", kind: "view", children: [child] });
}

describe("placeholders", () => {
  test("development shows a labelled placeholder and warns", () => {
    const mem = createMemoryHost();
    const logger = createMemoryLogger();
    const mat = createMaterializer({ host: mem.host, devMode: true, logger });
    const view = mat.mountTree(tree(new TemplateNode<MemoryView>({ id: "w", kind: "widget" })));

    const ph = view.children[0];
    assert.equal(ph?.kind, "placeholder");
    assert.equal(ph?.hidden, false);
    assert.equal(ph?.label, 'unknown component type "widget"');
    assert.equal(ph?.updates, 0);
    assert.deepEqual(logger.entries, [
      { level: "warn", message: '[trellis][render] placeholder for #w: unknown component type "widget"' },
    ]);
  });

  test("production hides the placeholder silently", () => {
    const mem = createMemoryHost();
    const logger = createMemoryLogger();
    const mat = createMaterializer({ host: mem.host, devMode: false, logger });
    const view = mat.mountTree(tree(new TemplateNode<MemoryView>({ id: "w", kind: "widget" })));
    assert.equal(view.children[0]?.hidden, true);
    assert.equal(view.children[0]?.label, undefined);
    assert.equal(logger.entries.length, 0);
  });

  test("nodes with attribute issues get a placeholder naming them", () => {
    const mem = createMemoryHost();
    const mat = createMaterializer({ host: mem.host, devMode: true, logger: createMemoryLogger() });
    const bad = new TemplateNode<MemoryView>({
      id: "t",
      kind: "text",
      parseIssues: ['opacity: unsupported value "x"'],
    });
    const view = mat.mountTree(tree(bad));
    assert.equal(view.children[0]?.label, 'invalid attributes: opacity: unsupported value "x"');
    assert.equal(bad.placeholder, true);
  });

  test("placeholder views are discarded, not recycled", () => {
    const mem = createMemoryHost();
    const discarded: string[] = [];
    const recycle = createViewRecyclePool<MemoryView>({
      onDiscard: (view) => {
        discarded.push(view.kind);
      },
    });
    const mat = createMaterializer({
      host: mem.host,
      recyclePool: recycle,
      devMode: false,
      logger: createMemoryLogger(),
    });
    const root = tree(new TemplateNode<MemoryView>({ id: "w", kind: "widget" }));
    mat.mountTree(root);
    mat.unmountSubtree(root);
    assert.deepEqual(discarded, ["placeholder"]);
    assert.equal(recycle.size(), 1);
    assert.equal(recycle.sizeOf("view"), 1);
  });
});

describe("UI-turn affinity", () => {
  test("mounting from background work throws in development", () => {
    const mat = createMaterializer({
      host: createMemoryHost().host,
      devMode: true,
      logger: createMemoryLogger(),
    });
    const root = tree(new TemplateNode<MemoryView>({ id: "t", kind: "text" }));
    assert.throws(
      () => runOffUiTurn(() => mat.mountTree(root)),
      (e: unknown) =>
        isTrellisError(e, "TRELLIS_WRONG_THREAD") &&
        e.message === "materialize touches view handles and must not run on the background context",
    );
    assert.equal(isOnUiTurn(), true);
  });

  test("the guard is off in production and outside background work", () => {
    assert.equal(runOffUiTurn(() => isOnUiTurn()), false);
    runOffUiTurn(() => assertUiTurn("anything", false));
    assertUiTurn("anything", true);
  });
});

describe("createViewRecyclePool", () => {
  test("per-kind limit and LIFO reuse", () => {
    const discarded: string[] = [];
    const pool = createViewRecyclePool<string>({
      maxPerKind: 1,
      onDiscard: (view) => {
        discarded.push(view);
      },
    });
    const root = new TemplateNode<string>({
      id: "r",
      kind: "view",
      children: [new TemplateNode<string>({ id: "a", kind: "text" }), new TemplateNode<string>({ id: "b", kind: "text" })],
    });
    root.viewHandle = "v-r";
    const [a, b] = root.children;
    if (a !== undefined) a.viewHandle = "v-a";
    if (b !== undefined) b.viewHandle = "v-b";

    pool.recycle(root);
    assert.deepEqual(discarded, ["v-b"]);
    assert.equal(pool.size(), 2);
    assert.equal(a?.viewHandle, undefined);
    assert.equal(pool.dequeue("text"), "v-a");
    assert.equal(pool.dequeue("text"), undefined);
  });

  test("total limit and clear", () => {
    const discarded: string[] = [];
    const pool = createViewRecyclePool<string>({
      maxTotal: 1,
      onDiscard: (view) => {
        discarded.push(view);
      },
    });
    const a = new TemplateNode<string>({ id: "a", kind: "text" });
    a.viewHandle = "v-a";
    const b = new TemplateNode<string>({ id: "b", kind: "image" });
    b.viewHandle = "v-b";
    pool.recycle(a);
    pool.recycle(b);
    assert.deepEqual(discarded, ["v-b"]);
    pool.clear();
    assert.deepEqual(discarded, ["v-b", "v-a"]);
    assert.equal(pool.size(), 0);
  });
});
