import { DEFAULT_IDENTITY_OPTIONS, IdentityOptions, deriveRunIdentity } from "../identity/identity";
import { JobSettings } from "../types/settings";
import { RunRecord } from "../types/record";
import { encodeInputs, encodeStates } from "./codec";

export interface RecordFactoryOptions {
  /**
   * Offsets used for partition/row keys
   */
  identity?: IdentityOptions;

  /**
   * Clock for timestamps and the default run date.
   * Defaults to the system clock.
   */
  now?: () => Date;
}

/**
 * Builds the initial record for one run of a job. Nothing is persisted.
 *
 * Pass `runDate` whenever the record must be reproducible: without it the
 * current instant is used and two calls can land on different row keys.
 */
export function createRunRecord(
  settings: JobSettings,
  revision: number,
  runDate?: Date,
  options: RecordFactoryOptions = {}
): RunRecord {
  const now = (options.now ?? (() => new Date()))();
  const effectiveRunDate = runDate ?? now;

  if (Number.isNaN(effectiveRunDate.getTime())) {
    throw new RangeError("Invalid Date");
  }

  const { partitionKey, rowKey } = deriveRunIdentity(
    {
      jobType: settings.jobType,
      jobVersion: settings.jobVersion,
      runDate: effectiveRunDate,
      revision,
      dateFormat: settings.dateFormat,
    },
    options.identity ?? DEFAULT_IDENTITY_OPTIONS
  );

  return {
    partitionKey,
    rowKey,
    revision,
    inputs: encodeInputs({
      runDate: effectiveRunDate,
      batchSize: settings.batchSize,
      processInterval: settings.processIntervalInSeconds,
    }),
    states: encodeStates({ lastProcessed: "", processed: 0, skipped: 0 }),
    status: "pending",
    createTime: new Date(now.getTime()),
    updateTime: new Date(now.getTime()),
  };
}
