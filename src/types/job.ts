export interface JobInputs {
  runDate: Date;
  batchSize: number;

  /**
   * Seconds to wait between processing steps
   */
  processInterval: number;
}

export interface JobStates {
  lastProcessed: string;
  processed: number;
  skipped: number;
}

/**
 * A pluggable job implementation. The execution engine builds one per run
 * from the decoded inputs/states and drives it through `run`.
 */
export interface Job {
  run(): Promise<JobStates>;
}

export type JobClass = new (inputs: JobInputs, states: JobStates) => Job;
