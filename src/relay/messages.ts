import { z } from "zod";

export const scheduleAlarmMessage = z.object({
  type: z.literal("SCHEDULE_ALARM"),
  data: z.object({
    id: z.string().min(1),
    time: z.number().finite(),
    message: z.string()
  })
});

export const cancelAlarmMessage = z.object({
  type: z.literal("CANCEL_ALARM"),
  data: z.object({
    id: z.string().min(1)
  })
});

export const relayMessageSchema = z.discriminatedUnion("type", [scheduleAlarmMessage, cancelAlarmMessage]);

export type RelayMessage = z.infer<typeof relayMessageSchema>;
export type ScheduleAlarmData = z.infer<typeof scheduleAlarmMessage>["data"];
export type CancelAlarmData = z.infer<typeof cancelAlarmMessage>["data"];
