import { test } from "node:test";
import assert from "node:assert/strict";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, LoggingMessageNotificationSchema } from "@modelcontextprotocol/sdk/types.js";
import { NotificationCenter } from "../src/notifications/notificationCenter.js";
import { createTimingServer } from "../src/server.js";
import type { PlatformSignals } from "../src/types.js";
import { DESKTOP_SIGNALS, MOBILE_SIGNALS, ManualClock } from "./support.js";

interface LogEntry {
  logger?: string;
  data: unknown;
}

async function connect(signals: PlatformSignals = MOBILE_SIGNALS) {
  const clock = new ManualClock();
  const center = new NotificationCenter({ permission: "granted", clock });
  const context = createTimingServer({ signals, center, clock });
  const client = new Client({ name: "timing-test-client", version: "0.0.0" });

  const waiters: Array<{ logger: string; resolve: (entry: LogEntry) => void }> = [];
  client.setNotificationHandler(LoggingMessageNotificationSchema, notification => {
    const entry = { logger: notification.params.logger, data: notification.params.data };
    for (const waiter of waiters.filter(candidate => candidate.logger === entry.logger)) {
      waiters.splice(waiters.indexOf(waiter), 1);
      waiter.resolve(entry);
    }
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), context.server.connect(serverTransport)]);
  await context.engine.initialize();

  const call = async (name: string, args: Record<string, unknown> = {}) =>
    CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));

  const nextLog = (logger: string) =>
    new Promise<LogEntry>(resolve => {
      waiters.push({ logger, resolve });
    });

  const close = async () => {
    await client.close();
    context.close();
  };

  return { clock, client, context, call, nextLog, close };
}

function textOf(result: { content: Array<{ type: string; text?: unknown }> }): string {
  return result.content.map(item => (typeof item.text === "string" ? item.text : "")).join("");
}

test("every timing tool is registered", async t => {
  const { client, close } = await connect();
  t.after(close);

  const { tools } = await client.listTools();
  assert.deepEqual(
    tools.map(tool => tool.name),
    ["alarm", "timer", "stopwatch", "notification", "session"]
  );
});

test("listing with no arguments returns the empty status card", async t => {
  const { call, close } = await connect();
  t.after(close);

  const result = await call("alarm");
  assert.equal(textOf(result), "No alarms set.");
  assert.notEqual(result.isError, true);
  assert.deepEqual(result.structuredContent?.inlineCard, {
    surface: "inline_card",
    heading: "Timing Engine",
    body: "Nothing is scheduled. Ask for an alarm, a timer or a stopwatch.",
    accessibilityLabel: "Nothing scheduled."
  });
  assert.deepEqual(result.structuredContent?.result, []);
});

test("a finished timer reaches the chat as a log message", async t => {
  const { clock, call, nextLog, close } = await connect();
  t.after(close);

  const started = await call("timer", { action: "start", id: "tea", duration: "5 seconds", message: "Tea is ready" });
  assert.equal(textOf(started), "Started a 5 seconds timer.");
  assert.deepEqual(started.structuredContent?.items, [
    { kind: "timer", id: "tea", title: "Tea is ready", subtitle: "5s left (was 5s)" }
  ]);

  const chatLine = nextLog("chat");
  const tray = nextLog("notifications");
  clock.advance(5_000);

  assert.deepEqual((await chatLine).data, { role: "system", text: "⏰ Timer finished: Tea is ready" });
  const shown = await tray;
  assert.ok(typeof shown.data === "object" && shown.data !== null && "event" in shown.data);
  assert.equal(shown.data.event, "shown");
});

test("timing errors come back as tool errors with their code", async t => {
  const desktop = await connect(DESKTOP_SIGNALS);
  t.after(desktop.close);

  const denied = await desktop.call("timer", { action: "start", duration: 60 });
  assert.equal(denied.isError, true);
  assert.deepEqual(denied.structuredContent, {
    error: "capability_denied",
    message: "Timers are only available on mobile devices."
  });

  const mobile = await connect();
  t.after(mobile.close);

  const ambiguous = await mobile.call("alarm", { action: "set", id: "wake" });
  assert.equal(ambiguous.isError, true);
  assert.deepEqual(ambiguous.structuredContent, {
    error: "invalid_input",
    message: "Provide either an alarm time or a relative duration, not both."
  });

  const missingId = await mobile.call("stopwatch", { action: "lap" });
  assert.equal(missingId.isError, true);
  assert.equal(missingId.structuredContent?.error, "invalid_input");

  const tooLong = await mobile.call("timer", { action: "start", duration: 90_000 });
  assert.deepEqual(tooLong.structuredContent, {
    error: "invalid_input",
    message: "Timers can run for at most 24 hours."
  });

  const badDuration = await mobile.call("timer", { action: "start", duration: "whenever" });
  assert.deepEqual(badDuration.structuredContent, {
    error: "invalid_duration",
    message: 'Could not parse duration "whenever".'
  });
});

test("the session tool reports capabilities and takes visibility", async t => {
  const { call, context, close } = await connect();
  t.after(close);

  const profile = await call("session");
  assert.equal(textOf(profile), "Alarms, timers and stopwatches are available on this device.");
  assert.deepEqual(profile.structuredContent?.result, {
    isMobile: true,
    permission: "granted",
    haptics: true,
    backgroundRelay: false
  });

  const hidden = await call("session", { action: "visibility", visibility: "hidden" });
  assert.equal(textOf(hidden), "Page is now hidden.");
  assert.equal(context.engine.visibility, "hidden");
});
