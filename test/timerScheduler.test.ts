import { test } from "node:test";
import assert from "node:assert/strict";
import { CapabilityDeniedError, InvalidDurationError } from "../src/errors.js";
import { remainingSeconds } from "../src/state/timerScheduler.js";
import type { TimerSnapshot } from "../src/types.js";
import { DESKTOP_SIGNALS, START, createHarness, settle } from "./support.js";

test("remainingSeconds rounds up and never goes negative", () => {
  assert.equal(remainingSeconds(10_000, 0), 10);
  assert.equal(remainingSeconds(10_000, 500), 10);
  assert.equal(remainingSeconds(10_000, 9_001), 1);
  assert.equal(remainingSeconds(10_000, 10_000), 0);
  assert.equal(remainingSeconds(10_000, 12_000), 0);
});

test("a timer counts down once per second and completes at its end instant", async t => {
  const { clock, center, chat, outputs, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  const ticks: number[] = [];
  const completed: TimerSnapshot[] = [];
  engine.timers.on("tick", timer => ticks.push(timer.remaining));
  engine.timers.on("complete", timer => completed.push(timer));

  const timer = engine.timers.start("tea", 10, "Tea is ready");
  assert.equal(timer.remaining, 10);
  assert.deepEqual(timer.endTime, new Date(START + 10_000));

  clock.advance(5_000);
  assert.equal(engine.timers.remaining("tea"), 5);
  clock.advance(4_500);
  assert.equal(engine.timers.remaining("tea"), 1);

  clock.advance(500);
  await settle();

  assert.deepEqual(ticks, [10, 9, 8, 7, 6, 5, 4, 3, 2, 1]);
  assert.equal(completed.length, 1);
  assert.equal(completed[0].remaining, 0);
  assert.equal(engine.timers.remaining("tea"), undefined);
  assert.deepEqual(engine.timers.list(), []);
  assert.equal(clock.pendingCount, 0);

  assert.deepEqual(chat.messages, ["⏰ Timer finished: Tea is ready"]);
  const [shown] = center.getNotifications();
  assert.equal(shown.tag, "timer-tea");
  assert.equal(shown.title, "⏰ Timer");
  assert.equal(shown.actions, undefined);
  assert.deepEqual(outputs.vibrations, [[300, 100, 300, 100, 300]]);
  assert.deepEqual(outputs.sounds, [{ src: "/static/audio/timer.mp3", loop: false, volume: 0.6, stopped: false }]);
});

test("restarting a timer replaces the running one", async t => {
  const { clock, chat, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.timers.start("tea", 10, "first");
  clock.advance(3_000);
  engine.timers.start("tea", 10, "second");

  clock.advance(7_000);
  await settle();
  assert.deepEqual(chat.messages, []);
  assert.equal(engine.timers.remaining("tea"), 3);

  clock.advance(3_000);
  await settle();
  assert.deepEqual(chat.messages, ["⏰ Timer finished: second"]);
});

test("a timer restarted after finishing notifies again", async t => {
  const { clock, center, chat, outputs, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.timers.start("tea", 5, "first brew");
  clock.advance(5_000);
  await settle();

  engine.timers.start("tea", 5, "second brew");
  clock.advance(5_000);
  await settle();

  assert.deepEqual(
    center.getNotifications().map(shown => shown.body),
    ["second brew"]
  );
  assert.deepEqual(chat.messages, ["⏰ Timer finished: first brew", "⏰ Timer finished: second brew"]);
  assert.equal(outputs.vibrations.length, 2);
});

test("clear stops the countdown and its ticks", async t => {
  const { clock, chat, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.timers.start("tea", 10);
  assert.equal(engine.timers.clear("tea"), true);
  assert.equal(engine.timers.clear("tea"), false);
  assert.equal(clock.pendingCount, 0);

  clock.advance(20_000);
  await settle();
  assert.deepEqual(chat.messages, []);
});

test("list derives the remaining time from the clock", async t => {
  const { clock, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.timers.start("a", 90, "pasta");
  engine.timers.start("b", 30);
  clock.advance(12_300);

  assert.deepEqual(
    engine.timers.list().map(timer => [timer.id, timer.remaining, timer.message]),
    [
      ["a", 78, "pasta"],
      ["b", 18, "Timer finished"]
    ]
  );
});

test("durations must be positive", async t => {
  const { engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  assert.throws(() => engine.timers.start("a", 0), InvalidDurationError);
  assert.throws(() => engine.timers.start("a", -5), { message: "Timer duration must be positive." });
  assert.throws(() => engine.timers.start("a", Number.POSITIVE_INFINITY), InvalidDurationError);
  assert.deepEqual(engine.timers.list(), []);
});

test("timers are unavailable off mobile", async t => {
  const { engine, cleanup } = createHarness({ signals: DESKTOP_SIGNALS });
  t.after(cleanup);
  await engine.initialize();

  assert.throws(() => engine.timers.start("a", 10), CapabilityDeniedError);
  assert.throws(() => engine.timers.clear("a"), CapabilityDeniedError);
  assert.deepEqual(engine.timers.list(), []);
});
