import { test } from "node:test";
import assert from "node:assert/strict";
import { CapabilityDeniedError, InvalidTimeError } from "../src/errors.js";
import type { AlarmSnapshot } from "../src/types.js";
import { DESKTOP_SIGNALS, START, createHarness, settle } from "./support.js";

const DAY_MS = 24 * 60 * 60 * 1000;

test("an alarm fires once at its instant with notification, cue and chat line", async t => {
  const { clock, center, chat, outputs, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  const fired: AlarmSnapshot[] = [];
  engine.alarms.on("fired", alarm => fired.push(alarm));

  const alarm = engine.alarms.set("wake", START + 60_000, "Wake up");
  assert.deepEqual(alarm, {
    id: "wake",
    time: new Date(START + 60_000),
    message: "Wake up",
    created: new Date(START)
  });

  clock.advance(59_999);
  await settle();
  assert.deepEqual(chat.messages, []);

  clock.advance(1);
  await settle();

  assert.deepEqual(chat.messages, ["🚨 Alarm: Wake up"]);
  assert.equal(fired.length, 1);
  assert.deepEqual(engine.alarms.list(), []);

  const [shown] = center.getNotifications();
  assert.equal(shown.tag, "alarm-wake");
  assert.equal(shown.title, "🚨 Alarm");
  assert.equal(shown.requireInteraction, true);
  assert.deepEqual(
    shown.actions?.map(action => action.action),
    ["snooze", "dismiss"]
  );
  assert.deepEqual(shown.data, { kind: "alarm", id: "wake", message: "Wake up", firesAt: START + 60_000 });
  assert.deepEqual(outputs.vibrations, [[500, 200, 500, 200, 500]]);
  assert.deepEqual(outputs.sounds, [{ src: "/static/audio/alarm.mp3", loop: true, volume: 0.8, stopped: false }]);

  clock.advance(60_000);
  await settle();
  assert.equal(fired.length, 1);
});

test("setting the same id again replaces the earlier schedule", async t => {
  const { clock, chat, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("a", START + 10_000, "ten");
  engine.alarms.set("a", START + 20_000, "twenty");
  assert.equal(engine.alarms.list().length, 1);

  clock.advance(30_000);
  await settle();
  assert.deepEqual(chat.messages, ["🚨 Alarm: twenty"]);
});

test("an unanswered alarm does not hide the next firing of the same id", async t => {
  const { clock, center, chat, outputs, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("wake", START + 1_000, "monday");
  clock.advance(1_000);
  await settle();

  engine.alarms.set("wake", START + 1_000 + DAY_MS, "tuesday");
  clock.advance(DAY_MS);
  await settle();

  assert.deepEqual(
    center.getNotifications().map(shown => shown.body),
    ["tuesday"]
  );
  assert.deepEqual(chat.messages, ["🚨 Alarm: monday", "🚨 Alarm: tuesday"]);
  assert.equal(outputs.vibrations.length, 2);
});

test("a time that is not in the future is rejected and leaves the schedule alone", async t => {
  const { engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("a", START + 10_000, "keep me");

  assert.throws(() => engine.alarms.set("a", START, "now"), InvalidTimeError);
  assert.throws(() => engine.alarms.set("a", START - 1, "past"), { message: "Alarm time must be in the future." });
  assert.throws(() => engine.alarms.set("a", Number.NaN), InvalidTimeError);

  assert.equal(engine.alarms.get("a")?.message, "keep me");
});

test("cancel stops a pending alarm", async t => {
  const { clock, center, chat, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("a", START + 10_000);
  assert.equal(engine.alarms.cancel("a"), true);
  assert.equal(engine.alarms.cancel("a"), false);

  clock.advance(20_000);
  await settle();
  assert.deepEqual(chat.messages, []);
  assert.deepEqual(center.getNotifications(), []);
});

test("snooze dismisses the ringing alarm and re-arms it five minutes out", async t => {
  const { clock, center, outputs, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("wake", START + 1_000, "Wake up");
  clock.advance(1_000);
  await settle();

  const snoozed = engine.alarms.snooze("wake");
  assert.equal(snoozed?.id, "wake-snooze");
  assert.equal(snoozed?.time.getTime(), START + 1_000 + 300_000);
  assert.equal(snoozed?.message, "Wake up");
  assert.deepEqual(center.getNotifications(), []);
  assert.equal(outputs.sounds[0].stopped, true);
  assert.equal(engine.alarms.snooze("wake"), undefined);

  clock.advance(300_000);
  await settle();

  const again = engine.alarms.snooze("wake-snooze", "Five more minutes");
  assert.equal(again?.id, "wake-snooze");
  assert.equal(again?.time.getTime(), START + 601_000);
  assert.equal(again?.message, "Five more minutes");
  assert.deepEqual(
    engine.alarms.list().map(alarm => alarm.id),
    ["wake-snooze"]
  );
});

test("snooze leaves alarms that are not ringing alone", async t => {
  const { engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  assert.equal(engine.alarms.snooze("never-set"), undefined);

  engine.alarms.set("wake", START + 60_000, "Wake up");
  assert.equal(engine.alarms.snooze("wake"), undefined);
  assert.deepEqual(
    engine.alarms.list().map(alarm => [alarm.id, alarm.time.getTime()]),
    [["wake", START + 60_000]]
  );
});

test("closing the notification ends the ringing state", async t => {
  const { clock, center, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("wake", START + 1_000, "Wake up");
  clock.advance(1_000);
  await settle();

  assert.equal(center.close("alarm-wake"), true);
  assert.equal(engine.alarms.snooze("wake"), undefined);
  assert.equal(engine.alarms.dismiss("wake"), false);
});

test("dismiss reports whether an alarm was ringing", async t => {
  const { clock, center, engine, cleanup } = createHarness();
  t.after(cleanup);
  await engine.initialize();

  assert.equal(engine.alarms.dismiss("wake"), false);

  engine.alarms.set("wake", START + 1_000);
  clock.advance(1_000);
  await settle();

  assert.equal(engine.alarms.dismiss("wake"), true);
  assert.deepEqual(center.getNotifications(), []);
});

test("without permission the alarm still reaches the chat", async t => {
  const { clock, center, chat, engine, cleanup } = createHarness({ permission: "denied" });
  t.after(cleanup);
  await engine.initialize();

  engine.alarms.set("wake", START + 1_000, "Wake up");
  clock.advance(1_000);
  await settle();

  assert.deepEqual(center.getNotifications(), []);
  assert.deepEqual(chat.messages, ["🚨 Alarm: Wake up"]);
  assert.equal(engine.alarms.snooze("wake")?.message, "Wake up");
});

test("alarms are unavailable off mobile", async t => {
  const { engine, cleanup } = createHarness({ signals: DESKTOP_SIGNALS });
  t.after(cleanup);
  await engine.initialize();

  assert.throws(() => engine.alarms.set("a", START + 10_000), CapabilityDeniedError);
  assert.throws(() => engine.alarms.cancel("a"), { message: "Alarms are only available on mobile devices." });
  assert.deepEqual(engine.alarms.list(), []);
});
