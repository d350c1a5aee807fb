import { Job, JobInputs, JobStates } from "../types/job";

/**
 * Built-in no-op job. Used for job names that have no configuration.
 */
export class BaseJob implements Job {
  constructor(
    protected readonly inputs: JobInputs,
    protected readonly states: JobStates
  ) {}

  async run(): Promise<JobStates> {
    return { ...this.states };
  }
}
