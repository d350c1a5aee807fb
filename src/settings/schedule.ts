import { parseExpression } from "cron-parser";
import { JobSchedule } from "../types/settings";

/**
 * Normalizes a crontab value into a JobSchedule. The expression is parsed
 * once so a broken schedule fails at startup instead of at first use.
 * Throws whatever cron-parser throws for an invalid expression, and a
 * RangeError for an unknown timezone.
 */
export function scheduleFromCrontab(
  value: string | JobSchedule | null
): JobSchedule | null {
  if (value === null) return null;

  const schedule: JobSchedule =
    typeof value === "string" ? { cron: value.trim() } : { ...value };

  if (!schedule.cron) {
    throw new Error("Cron expression must not be empty");
  }

  if (schedule.timezone !== undefined) {
    // cron-parser accepts unknown zones and only misbehaves later
    new Intl.DateTimeFormat("en-US", { timeZone: schedule.timezone });
  }

  parseExpression(schedule.cron, { tz: schedule.timezone ?? "UTC" });

  return schedule;
}
