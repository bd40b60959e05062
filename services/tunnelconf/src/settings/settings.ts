import {
  controlServerToNode,
  copyControlServer,
  emptyControlServerSettings,
  mergeControlServer,
  overrideControlServer,
  setControlServerDefaults,
  validateControlServer,
  type ControlServerSettings,
} from "./controlServer.js";
import { renderTitledTree, treeNode, type LineStyle } from "./lines.js";
import {
  copyUpdater,
  emptyUpdaterSettings,
  mergeUpdater,
  overrideUpdater,
  setUpdaterDefaults,
  updaterToNode,
  validateUpdater,
  type UpdaterSettings,
} from "./updater.js";
import {
  copyVpn,
  emptyVpnSettings,
  mergeVpn,
  overrideVpn,
  setVpnDefaults,
  validateVpn,
  vpnToNode,
  type VpnSettings,
} from "./vpn.js";

export type Settings = {
  readonly vpn: VpnSettings;
  readonly controlServer: ControlServerSettings;
  readonly updater: UpdaterSettings;
};

/** A partial view of the settings as produced by a single source. */
export type SettingsFragment = Settings;

export function emptySettings(): Settings {
  return {
    vpn: emptyVpnSettings(),
    controlServer: emptyControlServerSettings(),
    updater: emptyUpdaterSettings(),
  };
}

export function settingsFragment(fields: Partial<Settings>): SettingsFragment {
  return { ...emptySettings(), ...fields };
}

export function copySettings(settings: Settings): Settings {
  return {
    vpn: copyVpn(settings.vpn),
    controlServer: copyControlServer(settings.controlServer),
    updater: copyUpdater(settings.updater),
  };
}

export function mergeSettings(receiver: Settings, other: Settings): Settings {
  return {
    vpn: mergeVpn(receiver.vpn, other.vpn),
    controlServer: mergeControlServer(receiver.controlServer, other.controlServer),
    updater: mergeUpdater(receiver.updater, other.updater),
  };
}

export function overrideSettings(receiver: Settings, other: Settings): Settings {
  return {
    vpn: overrideVpn(receiver.vpn, other.vpn),
    controlServer: overrideControlServer(receiver.controlServer, other.controlServer),
    updater: overrideUpdater(receiver.updater, other.updater),
  };
}

export function setSettingsDefaults(settings: Settings): Settings {
  return {
    vpn: setVpnDefaults(settings.vpn),
    controlServer: setControlServerDefaults(settings.controlServer),
    updater: setUpdaterDefaults(settings.updater),
  };
}

export function validateSettings(settings: Settings): void {
  validateVpn(settings.vpn);
  validateControlServer(settings.controlServer);
  validateUpdater(settings.updater);
}

export function settingsToLines(settings: Settings, style: Partial<LineStyle> = {}): string[] {
  const root = treeNode("Settings summary:", [
    vpnToNode(settings.vpn),
    controlServerToNode(settings.controlServer),
    updaterToNode(settings.updater),
  ]);
  return renderTitledTree(root, style);
}

export function settingsToString(settings: Settings): string {
  return settingsToLines(settings).join("\n");
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
