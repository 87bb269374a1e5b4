/**
 * End-to-end tests for the six tasks against in-process fakes
 */
import assert from "node:assert";
import { fetchTaskResults } from "../src/results";
import {
  AbstractionTask,
  AttentionTask,
  DelayedRecallTask,
  LanguageTask,
  OrientationTask,
  WORKING_MEMORY_WORDS,
  WorkingMemoryTask,
} from "../src/tasks";
import type { ItemResponse } from "../src/types/records";
import { createHarness, delay, nextState, RECORDED_SECONDS, type Harness } from "./fakes";

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

const SESSION = "session-1";
const WORDS = WORKING_MEMORY_WORDS;

function results(harness: Harness, taskId: string): Promise<ItemResponse[]> {
  return fetchTaskResults(harness.store, SESSION, taskId);
}

/** Stop the runner the first time anything is spoken. */
function stopOnFirstSpeech(harness: Harness): () => Promise<void> {
  let stopping: Promise<void> | undefined;
  harness.device.onSpeak = () => {
    if (stopping === undefined) stopping = harness.runner.stop();
  };
  return async () => {
    assert.ok(stopping, "runner was never stopped");
    await stopping;
  };
}

// ============================================================================
// Working memory & delayed recall
// ============================================================================

async function testRecallTasks() {
  console.log("\nWorking Memory and Delayed Recall Tests:");

  await runTest("working memory scores both trials", async () => {
    const harness = createHarness({
      transcripts: ["chair book hand road cloud", "book chair hand road cloud"],
    });
    const task = new WorkingMemoryTask(WORDS, "wm-task");

    await harness.runner.start(task, SESSION);

    const responses = await results(harness, "wm-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [1, 0.6]);
    assert.deepStrictEqual(responses[1].correctWords, ["hand", "road", "cloud"]);
    assert.deepStrictEqual(responses[1].expectedWords, WORDS);
    assert.strictEqual(responses[1].responseText, "book chair hand road cloud");
    assert.ok(responses.every((r) => r.audioClipId !== undefined));

    const clips = await harness.store.fetchAll("audioClip");
    assert.deepStrictEqual(
      clips.map((c) => [c.transcription, c.duration]),
      [
        ["chair book hand road cloud", RECORDED_SECONDS],
        ["book chair hand road cloud", RECORDED_SECONDS],
      ]
    );

    assert.deepStrictEqual(harness.device.cues, ["start", "end", "start", "end"]);
    assert.strictEqual(harness.device.spoken.filter((s) => s === "chair").length, 2);
    assert.ok(harness.device.spoken.includes("Great! Let's do the second round now."));
    assert.strictEqual(
      harness.device.spoken[harness.device.spoken.length - 1],
      "Great job! You've completed the working memory task."
    );
    assert.strictEqual(harness.runner.state, "completed");
  });

  await runTest("working memory presents words as stimuli", async () => {
    const harness = createHarness({ transcripts: ["", ""] });
    await harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);
    const stimuli = harness.runner.transcript.filter((t) => t.kind === "stimulus").map((t) => t.text);
    assert.deepStrictEqual(stimuli, [...WORDS, ...WORDS]);
  });

  await runTest("capture failure scores every trial 0 without audio", async () => {
    const harness = createHarness();
    harness.device.failRecording = true;

    await harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);

    const responses = await results(harness, "wm-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [0, 0]);
    assert.ok(responses.every((r) => r.audioClipId === undefined && r.responseText === ""));
    assert.deepStrictEqual(harness.transcriber.requests, []);
    assert.strictEqual(harness.runner.state, "completed");
  });

  await runTest("missing transcripts time out and score 0", async () => {
    const harness = createHarness({ transcripts: [null, null] });

    await harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);

    const responses = await results(harness, "wm-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [0, 0]);
    assert.strictEqual(harness.transcriber.requests.length, 2);
  });

  await runTest("cancel before recording stores a zero recall score", async () => {
    const harness = createHarness();
    const stopped = stopOnFirstSpeech(harness);

    await harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);
    await stopped();

    const responses = await results(harness, "wm-task");
    assert.strictEqual(responses.length, 1);
    const [zero] = responses;
    assert.strictEqual(zero.score, 0);
    assert.deepStrictEqual(zero.correctWords, []);
    assert.deepStrictEqual(zero.expectedWords, WORDS);
    assert.strictEqual("responseText" in zero, false);
    assert.strictEqual("audioClipId" in zero, false);
    assert.deepStrictEqual(harness.device.recordings, []);
    assert.strictEqual(harness.runner.state, "completed");
  });

  await runTest("cancel before recording stores nothing under the none policy", async () => {
    const harness = createHarness({ policy: "none" });
    const stopped = stopOnFirstSpeech(harness);

    await harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);
    await stopped();

    assert.deepStrictEqual(await results(harness, "wm-task"), []);
  });

  await runTest("cancel during recording scores the open trial 0", async () => {
    const harness = createHarness({ transcripts: ["chair book hand road cloud"] });
    const recording = nextState(harness.runner, "recording");
    const started = harness.runner.start(new WorkingMemoryTask(WORDS, "wm-task"), SESSION);

    await recording;
    await delay(5);
    await harness.runner.stop();
    await started;

    const responses = await results(harness, "wm-task");
    assert.strictEqual(responses.length, 1);
    assert.strictEqual(responses[0].score, 0);
    assert.strictEqual(responses[0].responseText, "");
    assert.ok(responses[0].audioClipId !== undefined);
    assert.deepStrictEqual(harness.transcriber.requests, []);
    assert.deepStrictEqual(harness.device.cues, ["start"]);
    assert.strictEqual(harness.device.isRecording, false);
  });

  await runTest("delayed recall scores recalled words in any order", async () => {
    const harness = createHarness({ transcripts: ["I remember a book and a road"] });

    await harness.runner.start(new DelayedRecallTask(WORDS, "recall-task"), SESSION);

    const responses = await results(harness, "recall-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [0.4]);
    assert.deepStrictEqual(responses[0].correctWords, ["book", "road"]);
    assert.strictEqual(harness.device.spoken.includes("chair"), false);
    assert.strictEqual(
      harness.device.spoken[harness.device.spoken.length - 1],
      "Great job! You've completed the delayed recall task."
    );
  });

  await runTest("speech failures do not stop a task", async () => {
    const harness = createHarness({ transcripts: ["I remember a book and a road"] });
    harness.device.failSpeech = true;

    await harness.runner.start(new DelayedRecallTask(WORDS, "recall-task"), SESSION);

    assert.deepStrictEqual((await results(harness, "recall-task")).map((r) => r.score), [0.4]);
    assert.strictEqual(harness.runner.state, "completed");
  });
}

// ============================================================================
// Attention
// ============================================================================

async function testAttentionTask() {
  console.log("\nAttention Task Tests:");

  await runTest("scores span, tapping and serial 7s in order", async () => {
    const harness = createHarness({
      transcripts: ["five five five five five", "five five", "ninety three eighty six seventy nine"],
    });
    let clock = 0;
    const task = new AttentionTask({ random: () => 0.5, now: () => ++clock, id: "attention-task" });
    harness.device.onSpeak = (text) => {
      if (text === "A.") task.recordTap();
    };

    await harness.runner.start(task, SESSION);

    const tapping = task.letterTappingResult;
    assert.ok(tapping);
    assert.strictEqual(tapping.letters.length, 30);
    const targets = tapping.letters.flatMap((l, i) => (l === "A" ? [i] : []));
    assert.strictEqual(targets.length, 10);
    assert.deepStrictEqual(tapping.tappedIndices, targets);
    assert.strictEqual(tapping.errors, 0);

    const responses = await results(harness, "attention-task");
    assert.deepStrictEqual(
      responses.map((r) => [r.score, r.responseText]),
      [
        [1, "5 5 5 5 5"],
        [1, "5 5"],
        [1, "Letter tapping phase"],
        [2, "ninety three eighty six seventy nine"],
      ]
    );
    assert.deepStrictEqual(responses[2].correctWords, targets.map(String));
    assert.deepStrictEqual(responses[2].expectedWords, tapping.letters);
    assert.strictEqual(responses[2].audioClipId, undefined);
    assert.deepStrictEqual(responses[3].correctWords, ["93", "86", "79"]);
    assert.strictEqual(harness.transcriber.requests.length, 3);
  });

  await runTest("no taps fail the letter phase", async () => {
    const harness = createHarness({ transcripts: ["", "", ""] });
    const task = new AttentionTask({ random: () => 0.5, id: "attention-task" });

    await harness.runner.start(task, SESSION);

    assert.deepStrictEqual(task.letterTappingResult?.tappedIndices, []);
    assert.strictEqual(task.letterTappingResult?.errors, 10);
    const responses = await results(harness, "attention-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [0, 0, 0, 0]);
  });

  await runTest("taps outside the letter phase are ignored", async () => {
    const harness = createHarness({ transcripts: ["", "", ""] });
    let clock = 0;
    const task = new AttentionTask({ random: () => 0.5, now: () => ++clock, id: "attention-task" });
    harness.device.onSpeak = (text) => {
      if (text === "5") task.recordTap();
    };

    await harness.runner.start(task, SESSION);

    assert.deepStrictEqual(task.letterTappingResult?.tappedIndices, []);
  });

  await runTest("presents letters and the calculation prompt with their kinds", async () => {
    const harness = createHarness({ transcripts: ["", "", ""] });
    await harness.runner.start(new AttentionTask({ random: () => 0.5 }), SESSION);

    const kinds = harness.runner.transcript.map((t) => t.kind);
    assert.strictEqual(kinds.filter((k) => k === "letter").length, 30);
    assert.strictEqual(kinds.filter((k) => k === "calculationPrompt").length, 1);
  });
}

// ============================================================================
// Language, abstraction, orientation
// ============================================================================

async function testOtherTasks() {
  console.log("\nLanguage, Abstraction and Orientation Task Tests:");

  await runTest("language scores two sentences and fluency", async () => {
    const harness = createHarness({
      transcripts: [
        "I only know that John is the one to help today",
        "The cat always hid under the couch",
        "fish fun fast farm food fork fig fall fire frog fence",
      ],
    });

    await harness.runner.start(new LanguageTask(undefined, "language-task"), SESSION);

    const responses = await results(harness, "language-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [1, 0, 1]);
    assert.strictEqual(responses[2].correctWords?.length, 11);
    assert.deepStrictEqual(responses[2].expectedWords, ["threshold: >10 words"]);
    assert.ok(harness.device.spoken.includes("Good. Now moving to the second part."));
    assert.strictEqual(harness.runner.transcript.filter((t) => t.kind === "fluencyPrompt").length, 1);
  });

  await runTest("abstraction scores each pair", async () => {
    const harness = createHarness({ transcripts: ["vehicles", ""] });

    await harness.runner.start(new AbstractionTask(undefined, "abstraction-task"), SESSION);

    const responses = await results(harness, "abstraction-task");
    assert.deepStrictEqual(responses.map((r) => [r.score, r.expectedWords]), [
      [1, ["vehicles"]],
      [0, ["fruits"]],
    ]);
    for (const line of ["Trial 1.", "train and bicycle", "Trial 2.", "banana and orange"]) {
      assert.ok(harness.device.spoken.includes(line), line);
    }
  });

  await runTest("cancelling a non-recall task stores a zero only under the all policy", async () => {
    const quiet = createHarness();
    const stoppedQuiet = stopOnFirstSpeech(quiet);
    await quiet.runner.start(new AbstractionTask(undefined, "abstraction-task"), SESSION);
    await stoppedQuiet();
    assert.deepStrictEqual(await results(quiet, "abstraction-task"), []);

    const strict = createHarness({ policy: "all" });
    const stoppedStrict = stopOnFirstSpeech(strict);
    await strict.runner.start(new AbstractionTask(undefined, "abstraction-task"), SESSION);
    await stoppedStrict();
    const responses = await results(strict, "abstraction-task");
    assert.deepStrictEqual(responses.map((r) => [r.score, r.expectedWords]), [[0, ["vehicles"]]]);
  });

  await runTest("orientation asks six questions and scores each", async () => {
    const harness = createHarness({
      transcripts: ["the fourteenth", "December", "twenty twenty five", "Sunday", "the hospital", "Saint Louis"],
    });
    const task = new OrientationTask({
      place: "hospital",
      city: "St. Louis",
      date: new Date(2025, 11, 14),
      id: "orientation-task",
    });

    await harness.runner.start(task, SESSION);

    const responses = await results(harness, "orientation-task");
    assert.deepStrictEqual(responses.map((r) => r.score), [1, 1, 1, 1, 1, 1]);
    assert.deepStrictEqual(
      responses.map((r) => r.expectedWords),
      [["14"], ["December"], ["2025"], ["Sunday"], ["hospital"], ["St. Louis"]]
    );
    assert.ok(harness.device.spoken.includes("What is the current date?"));
  });

  await runTest("orientation wrong answers score 0", async () => {
    const harness = createHarness({
      transcripts: ["the fifteenth", "November", "2024", "Monday", "at home", "Chicago"],
    });
    const task = new OrientationTask({
      place: "hospital",
      city: "St. Louis",
      date: new Date(2025, 11, 14),
      id: "orientation-task",
    });

    await harness.runner.start(task, SESSION);

    assert.deepStrictEqual((await results(harness, "orientation-task")).map((r) => r.score), [0, 0, 0, 0, 0, 0]);
  });
}

// ============================================================================
// Main Test Runner
// ============================================================================

async function runAllTests() {
  console.log("=".repeat(60));
  console.log("Running Task Tests");
  console.log("=".repeat(60));

  await testRecallTasks();
  await testAttentionTask();
  await testOtherTasks();

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
