import type { SettingsFragment } from "../settings/settings.js";

/** Produces one settings fragment; fields it knows nothing about stay absent. */
export interface SettingsSource {
  readonly name: string;
  read(): Promise<SettingsFragment>;
}
