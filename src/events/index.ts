export { SettingsEmitter } from "./emitter";
export { TypedEventEmitter } from "./typed-emitter";
