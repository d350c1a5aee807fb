import { formatRunDate } from "./date-format";

export interface IdentityOptions {
  /**
   * Added to the job version in every partition key
   */
  versionOffset: number;

  /**
   * Added to the revision in every row key
   */
  revisionOffset: number;
}

export const DEFAULT_IDENTITY_OPTIONS: Readonly<IdentityOptions> = Object.freeze({
  versionOffset: 100,
  revisionOffset: 1,
});

export interface RunIdentity {
  partitionKey: string;
  rowKey: string;
}

export function getJobPartition(
  jobType: string,
  jobVersion: number,
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): string {
  return `${jobType}_${jobVersion + options.versionOffset}`;
}

/**
 * Derives the partition and row key of one run. Pure: the same arguments
 * always produce the same keys, which is what create-if-absent writes
 * downstream depend on.
 */
export function deriveRunIdentity(
  params: {
    jobType: string;
    jobVersion: number;
    runDate: Date;
    revision: number;
    dateFormat: string;
  },
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): RunIdentity {
  if (!Number.isInteger(params.revision) || params.revision < 0) {
    throw new RangeError(
      `Revision must be a non-negative integer, got ${params.revision}`
    );
  }

  const partitionKey = getJobPartition(params.jobType, params.jobVersion, options);
  const rowKey = [
    formatRunDate(params.runDate, params.dateFormat),
    params.revision + options.revisionOffset,
    partitionKey,
  ].join("_");

  return { partitionKey, rowKey };
}
