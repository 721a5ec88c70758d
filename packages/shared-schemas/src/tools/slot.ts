import { z } from "zod";
import { DateSchema, LocalTimeSchema } from "../domain/date.js";

export const SlotFieldsSchema = z.object({
  date: DateSchema,
  start_time: LocalTimeSchema,
  end_time: LocalTimeSchema,
});

// Zero-padded HH:MM strings order the same way as the times they denote.
export function endsAfterStart(slot: { start_time: string; end_time: string }): boolean {
  return slot.end_time > slot.start_time;
}

export const endsAfterStartIssue = {
  message: "end_time must be later than start_time",
  path: ["end_time"],
};
