export { JobSettingsFactory, convertSettings } from "./settings";
export {
  CapabilityRegistry,
  createCapabilityRegistry,
  NOOP_JOB_IDENTIFIER,
} from "./capability/registry";
export { BaseJob } from "./capability/base-job";
export { createRunRecord } from "./record";
export {
  encodeInputs,
  decodeInputs,
  encodeStates,
  decodeStates,
  CODEC_VERSION,
} from "./record";
export {
  deriveRunIdentity,
  getJobPartition,
  formatRunDate,
  DEFAULT_IDENTITY_OPTIONS,
} from "./identity";

export * from "./errors";
export * from "./types/job";
export * from "./types/settings";
export * from "./types/record";
export * from "./types/lifecycle";
export type { JobSettingsFactoryOptions } from "./settings";
export type { RecordFactoryOptions } from "./record";
export type { IdentityOptions, RunIdentity } from "./identity";
export type { SettingsEventMap } from "./types/events";
export type {
  CapabilityContainer,
  ContainerLoader,
} from "./capability/registry";
