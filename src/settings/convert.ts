import { ZodError } from "zod";
import { CapabilityRegistry } from "../capability/registry";
import { ConfigurationError, ConfigurationIssue } from "../errors";
import { JobSettings, RawJobSettings } from "../types/settings";
import { rawSettingsSchema } from "./schema";

function toIssues(error: ZodError): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join(".") || "(root)",
    message: issue.message,
  }));
}

/**
 * Converts raw job configuration into an immutable JobSettings value.
 *
 * - `job_class` (a capability identifier) and `job_type` are required.
 * - Everything else falls back to a default: no schedule, `%Y%m%d` run
 *   dates (one job id per calendar day), 20 failures, 5 consecutive
 *   failures, 24 hour expiry, batches of 1000, no process interval, no
 *   locking, version 1.
 *
 * Throws ConfigurationError for missing or uncoercible values, and lets
 * ResolutionError / NotFoundError from the capability lookup through.
 */
export function convertSettings(
  raw: RawJobSettings,
  capabilities: CapabilityRegistry
): JobSettings {
  const parsed = rawSettingsSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = toIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid job settings: ${issues
        .map((issue) => `${issue.path}: ${issue.message}`)
        .join("; ")}`,
      issues
    );
  }

  const data = parsed.data;
  const jobClass = capabilities.resolve(data.job_class);

  return Object.freeze({
    schedule: data.job_schedule ? Object.freeze(data.job_schedule) : null,
    dateFormat: data.date_format,
    maxFailures: data.max_failures,
    maxConsecutiveFailures: data.max_consecutive_failures,
    expireHours: data.expire_hours,
    batchSize: data.batch_size,
    processIntervalInSeconds: data.process_interval_in_seconds,
    jobClass,
    jobType: data.job_type,
    jobVersion: data.job_version,
    requireLock: data.require_lock,
  });
}
