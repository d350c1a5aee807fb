export { createRunRecord } from "./factory";
export type { RecordFactoryOptions } from "./factory";
export * from "./codec";
