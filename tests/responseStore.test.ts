/**
 * Tests for the response store, current-response selection and result queries
 */
import assert from "node:assert";
import { StoreError } from "../src/errors";
import { fetchTaskResults, summarizeResponses } from "../src/results";
import { MemoryResponseStore } from "../src/store/responseStore";
import { resolveTrialResponse, selectCurrentResponse } from "../src/store/selection";
import type { ItemResponse } from "../src/types/records";

process.env.ASSESS_LOG_LEVEL = process.env.ASSESS_LOG_LEVEL ?? "silent";

let testsPassed = 0;
let testsFailed = 0;

async function runTest(name: string, fn: () => Promise<void> | void) {
  try {
    await fn();
    console.log(`  ✓ ${name}`);
    testsPassed++;
  } catch (error) {
    console.error(`  ✗ ${name}`);
    console.error(`    ${error}`);
    testsFailed++;
  }
}

const T0 = "2025-01-01T10:00:00.000Z";
const T1 = "2025-01-01T10:00:01.000Z";
const T2 = "2025-01-01T10:00:02.000Z";

function response(id: string, createdAt: string, extra: Partial<ItemResponse> = {}): ItemResponse {
  return { id, sessionId: "session-1", taskId: "task-1", createdAt, updatedAt: createdAt, ...extra };
}

function isStoreError(code: StoreError["code"]) {
  return (err: unknown) => err instanceof StoreError && err.code === code;
}

// ============================================================================
// MemoryResponseStore
// ============================================================================

async function testStore() {
  console.log("\nMemoryResponseStore Tests:");

  await runTest("create then fetch returns an equal record", async () => {
    const store = new MemoryResponseStore();
    const created = await store.create("itemResponse", response("r1", T0, { responseText: "book" }));
    assert.deepStrictEqual(await store.fetch("itemResponse", "r1"), created);
  });

  await runTest("fetch of an unknown id returns undefined", async () => {
    const store = new MemoryResponseStore();
    assert.strictEqual(await store.fetch("session", "missing"), undefined);
  });

  await runTest("absent optional fields stay absent", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("r1", T0));
    const fetched = await store.fetch("itemResponse", "r1");
    assert.ok(fetched);
    assert.strictEqual("score" in fetched, false);
    assert.strictEqual("audioClipId" in fetched, false);
  });

  await runTest("score fields survive a write and re-fetch", async () => {
    const store = new MemoryResponseStore();
    const created = await store.create("itemResponse", response("r1", T0));
    await store.update("itemResponse", {
      ...created,
      score: 0.6,
      responseText: "book chair hand road cloud",
      correctWords: ["hand", "road", "cloud"],
      expectedWords: ["chair", "book", "hand", "road", "cloud"],
      updatedAt: T1,
    });
    const fetched = await store.fetch("itemResponse", "r1");
    assert.deepStrictEqual(fetched, {
      ...created,
      score: 0.6,
      responseText: "book chair hand road cloud",
      correctWords: ["hand", "road", "cloud"],
      expectedWords: ["chair", "book", "hand", "road", "cloud"],
      updatedAt: T1,
    });
  });

  await runTest("returned records are copies", async () => {
    const store = new MemoryResponseStore();
    const created = await store.create("itemResponse", response("r1", T0, { correctWords: ["book"] }));
    created.correctWords?.push("road");
    const fetched = await store.fetch("itemResponse", "r1");
    assert.deepStrictEqual(fetched?.correctWords, ["book"]);
  });

  await runTest("duplicate create is rejected", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("r1", T0));
    await assert.rejects(store.create("itemResponse", response("r1", T1)), isStoreError("INVALID_RECORD"));
  });

  await runTest("update of a missing record throws NOT_FOUND", async () => {
    const store = new MemoryResponseStore();
    await assert.rejects(store.update("itemResponse", response("nope", T0)), isStoreError("NOT_FOUND"));
  });

  await runTest("delete removes the record and rejects unknown ids", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("r1", T0));
    await store.delete("itemResponse", "r1");
    assert.strictEqual(await store.fetch("itemResponse", "r1"), undefined);
    await assert.rejects(store.delete("itemResponse", "r1"), isStoreError("NOT_FOUND"));
  });

  await runTest("records failing validation are rejected", async () => {
    const store = new MemoryResponseStore();
    await assert.rejects(
      store.create("itemResponse", response("r1", T0, { score: Number.NaN })),
      isStoreError("INVALID_RECORD")
    );
    await assert.rejects(
      store.create("audioClip", { id: "c1", filePath: "a.wav", duration: -1, createdAt: T0, updatedAt: T0 }),
      isStoreError("INVALID_RECORD")
    );
    await assert.rejects(
      store.create("session", {
        id: "s1",
        patientId: "p1",
        startTime: "yesterday",
        status: "in_progress",
        createdAt: T0,
        updatedAt: T0,
      }),
      isStoreError("INVALID_RECORD")
    );
  });

  await runTest("fetchAll keeps insertion order", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("b", T1));
    await store.create("itemResponse", response("a", T0));
    const all = await store.fetchAll("itemResponse");
    assert.deepStrictEqual(all.map((r) => r.id), ["b", "a"]);
  });

  await runTest("fetchSessions and fetchItemResponses filter by owner", async () => {
    const store = new MemoryResponseStore();
    for (const [id, patientId] of [["s1", "p1"], ["s2", "p2"], ["s3", "p1"]]) {
      await store.create("session", {
        id,
        patientId,
        startTime: T0,
        status: "in_progress",
        createdAt: T0,
        updatedAt: T0,
      });
    }
    await store.create("itemResponse", response("r1", T0));
    await store.create("itemResponse", { ...response("r2", T0), sessionId: "session-2" });

    assert.deepStrictEqual((await store.fetchSessions("p1")).map((s) => s.id), ["s1", "s3"]);
    assert.deepStrictEqual((await store.fetchItemResponses("session-1")).map((r) => r.id), ["r1"]);
  });
}

// ============================================================================
// Selection
// ============================================================================

async function testSelection() {
  console.log("\nCurrent Response Selection Tests:");

  await runTest("picks the newest unscored response", () => {
    const picked = selectCurrentResponse(
      [response("old", T0), response("scored", T2, { score: 1 }), response("new", T1)],
      "task-1"
    );
    assert.strictEqual(picked?.id, "new");
  });

  await runTest("falls back to the newest response when all are scored", () => {
    const picked = selectCurrentResponse(
      [response("a", T0, { score: 1 }), response("b", T2, { score: 0 }), response("c", T1, { score: 1 })],
      "task-1"
    );
    assert.strictEqual(picked?.id, "b");
  });

  await runTest("a later insert wins a createdAt tie", () => {
    const picked = selectCurrentResponse([response("first", T1), response("second", T1)], "task-1");
    assert.strictEqual(picked?.id, "second");
  });

  await runTest("ignores other tasks and returns undefined when none match", () => {
    const other = { ...response("x", T2), taskId: "task-2" };
    assert.strictEqual(selectCurrentResponse([response("mine", T0), other], "task-1")?.id, "mine");
    assert.strictEqual(selectCurrentResponse([other], "task-1"), undefined);
  });

  await runTest("resolveTrialResponse prefers the handle", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("handled", T0));
    await store.create("itemResponse", response("newer", T1));
    const picked = await resolveTrialResponse(store, "session-1", "task-1", { responseId: "handled" });
    assert.strictEqual(picked?.id, "handled");
  });

  await runTest("resolveTrialResponse falls back when the handle is stale", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("newer", T1));
    const picked = await resolveTrialResponse(store, "session-1", "task-1", { responseId: "deleted" });
    assert.strictEqual(picked?.id, "newer");
  });
}

// ============================================================================
// Results
// ============================================================================

async function testResults() {
  console.log("\nResult Query Tests:");

  await runTest("fetchTaskResults orders oldest first", async () => {
    const store = new MemoryResponseStore();
    await store.create("itemResponse", response("late", T2));
    await store.create("itemResponse", response("early", T0));
    await store.create("itemResponse", { ...response("other", T1), taskId: "task-2" });
    await store.create("itemResponse", response("tie", T2));
    const results = await fetchTaskResults(store, "session-1", "task-1");
    assert.deepStrictEqual(results.map((r) => r.id), ["early", "late", "tie"]);
  });

  await runTest("summarizeResponses totals the scored responses", () => {
    const summary = summarizeResponses([
      response("a", T0, { score: 1 }),
      response("b", T0),
      response("c", T0, { score: 0.6 }),
    ]);
    assert.deepStrictEqual(summary, { count: 3, scored: 2, totalScore: 1.6 });
  });
}

// ============================================================================
// Main Test Runner
// ============================================================================

async function runAllTests() {
  console.log("=".repeat(60));
  console.log("Running Response Store Tests");
  console.log("=".repeat(60));

  await testStore();
  await testSelection();
  await testResults();

  console.log("\n" + "=".repeat(60));
  console.log(`Results: ${testsPassed} passed, ${testsFailed} failed`);
  console.log("=".repeat(60));

  if (testsFailed > 0) {
    process.exit(1);
  }
}

runAllTests().catch((error) => {
  console.error("Test runner failed:", error);
  process.exit(1);
});
