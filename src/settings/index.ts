export { convertSettings } from "./convert";
export { JobSettingsFactory } from "./factory";
export type { JobSettingsFactoryOptions } from "./factory";
export { scheduleFromCrontab } from "./schedule";
