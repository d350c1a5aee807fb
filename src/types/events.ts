import { JobSettings } from "./settings";

export type SettingsEventMap = {
  "settings:resolved": JobSettings;
  "settings:fallback": { name: string; settings: JobSettings };
  "settings:error": Error;
};
