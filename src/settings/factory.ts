import { SettingsEmitter } from "../events";
import {
  CapabilityRegistry,
  NOOP_JOB_IDENTIFIER,
  createCapabilityRegistry,
} from "../capability/registry";
import { SettingsEventMap } from "../types/events";
import { JobSettings, RawJobSettings } from "../types/settings";
import { convertSettings } from "./convert";

export interface JobSettingsFactoryOptions {
  /**
   * Registry used to resolve `job_class`.
   * Defaults to one holding only the built-in jobs.
   */
  capabilities?: CapabilityRegistry;
}

/**
 * Looks up settings by friendly job name.
 *
 * Each raw entry is copied at construction; later edits to the caller's
 * maps are not seen.
 */
export class JobSettingsFactory {
  private readonly emitter = new SettingsEmitter();
  private readonly capabilities: CapabilityRegistry;
  private readonly allSettings: Readonly<Record<string, RawJobSettings>>;

  constructor(
    allSettings: Record<string, RawJobSettings>,
    options: JobSettingsFactoryOptions = {}
  ) {
    this.allSettings = Object.freeze(
      Object.fromEntries(
        Object.entries(allSettings).map(([name, raw]) => [
          name,
          Object.freeze({ ...raw }),
        ])
      )
    );
    this.capabilities = options.capabilities ?? createCapabilityRegistry();
  }

  /**
   * Subscribe to resolution events
   */
  on<K extends keyof SettingsEventMap>(
    event: K,
    listener: (payload: SettingsEventMap[K]) => void
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  /**
   * Resolves the settings for `name`, re-reading the raw table every time.
   *
   * Unknown names do not throw: they get the built-in no-op job with default
   * settings, and a "settings:fallback" event is emitted so a typo in a job
   * name can still be noticed.
   */
  create(name: string): JobSettings {
    if (this.has(name)) {
      const settings = convertSettings(this.allSettings[name], this.capabilities);
      this.emitter.emitSafe("settings:resolved", settings);
      return settings;
    }

    const settings = convertSettings(
      { job_class: NOOP_JOB_IDENTIFIER, job_type: name },
      this.capabilities
    );
    this.emitter.emitSafe("settings:fallback", { name, settings });
    return settings;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.allSettings, name);
  }

  names(): string[] {
    return Object.keys(this.allSettings);
  }
}
