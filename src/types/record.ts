import { RunStatus } from "./lifecycle";

export interface RunRecord {
  /**
   * Groups every run of one job type + version
   */
  partitionKey: string;

  /**
   * Unique per run date + revision (the job id)
   */
  rowKey: string;

  revision: number;

  // serialized JobInputs / JobStates
  inputs: Uint8Array;
  states: Uint8Array;

  status: RunStatus;

  // timestamps
  createTime: Date;
  updateTime: Date;
}
