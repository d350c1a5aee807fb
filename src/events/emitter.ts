import { TypedEventEmitter } from "./typed-emitter";
import { SettingsEventMap } from "../types/events";

export class SettingsEmitter extends TypedEventEmitter<SettingsEventMap> {
  emitSafe<K extends keyof SettingsEventMap>(
    event: K,
    payload: SettingsEventMap[K]
  ): void {
    try {
      this.emitUnsafe(event, payload);
    } catch (err) {
      // a listener must never break settings resolution
      try {
        this.emitUnsafe(
          "settings:error",
          err instanceof Error ? err : new Error(String(err))
        );
      } catch {
        // absolute last guard
      }
    }
  }
}
