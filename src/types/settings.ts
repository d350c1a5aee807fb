import { JobClass } from "./job";

export interface JobSchedule {
  /**
   * Cron expression
   */
  cron: string;

  /**
   * Timezone for cron
   */
  timezone?: string;
}

/**
 * Raw per-job configuration as it comes out of a config file or service.
 * Values are coerced when resolved.
 */
export type RawJobSettings = Record<string, unknown>;

export interface JobSettings {
  readonly schedule: JobSchedule | null;
  readonly dateFormat: string;
  readonly maxFailures: number;
  readonly maxConsecutiveFailures: number;
  readonly expireHours: number;
  readonly batchSize: number;
  readonly processIntervalInSeconds: number;
  readonly jobClass: JobClass;
  readonly jobType: string;
  readonly jobVersion: number;

  /**
   * Advisory; honoured by the execution engine, not here
   */
  readonly requireLock: boolean;
}
