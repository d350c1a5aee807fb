import { z } from "zod";
import { findUnsupportedDirective } from "../identity/date-format";
import { scheduleFromCrontab } from "./schedule";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);

// null and undefined both mean "not configured"
const isAbsent = (value: unknown) => value === undefined || value === null;

function toInteger(value: unknown): unknown {
  if (isAbsent(value)) return undefined;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : value;
  }
  if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

function toFloat(value: unknown): unknown {
  if (isAbsent(value)) return undefined;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

function toText(value: unknown): unknown {
  if (isAbsent(value)) return undefined;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return value;
}

function toBoolean(value: unknown): unknown {
  if (isAbsent(value)) return undefined;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return true;
    if (FALSE_WORDS.has(word)) return false;
  }
  return value;
}

const count = (fallback: number) =>
  z.preprocess(
    toInteger,
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).default(fallback)
  );

const cronSchedule = z
  .union([
    z.string(),
    z.object({ cron: z.string(), timezone: z.string().optional() }),
  ])
  .nullable()
  .transform((value, ctx) => {
    try {
      return scheduleFromCrontab(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid cron schedule: ${
          err instanceof Error ? err.message : String(err)
        }`,
      });
      return z.NEVER;
    }
  });

/**
 * Raw job configuration, keyed the way config files spell it.
 */
export const rawSettingsSchema = z.object({
  job_class: z.preprocess(
    toText,
    z.string({ required_error: "job_class is required" }).min(1)
  ),
  job_type: z.preprocess(
    toText,
    z.string({ required_error: "job_type is required" })
  ),
  job_schedule: z.preprocess(
    (value) => (isAbsent(value) ? null : value),
    cronSchedule
  ),
  date_format: z.preprocess(
    toText,
    z
      .string()
      .default("%Y%m%d")
      .superRefine((format, ctx) => {
        const unsupported = findUnsupportedDirective(format);
        if (unsupported !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unsupported date format directive ${unsupported}`,
          });
        }
      })
  ),
  max_failures: count(20),
  max_consecutive_failures: count(5),
  expire_hours: count(24),
  batch_size: count(1000),
  process_interval_in_seconds: z.preprocess(
    toFloat,
    z.number().finite().nonnegative().default(0)
  ),
  require_lock: z.preprocess(toBoolean, z.boolean().default(false)),
  job_version: count(1),
});
