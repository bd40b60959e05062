import { validationErrors } from "./errors.js";
import { enabledState, renderTitledTree, treeNode, type LineStyle, type TreeNode } from "./lines.js";
import { parsePort } from "./network.js";
import { absent, defaultOptional, mergeOptional, overrideOptional, toUndefined, valueOr, type Optional } from "./optional.js";

export type ControlServerSettings = {
  /** Listening address, `host:port` or `:port`. */
  readonly address: Optional<string>;
  readonly log: Optional<boolean>;
};

export function emptyControlServerSettings(): ControlServerSettings {
  return { address: absent(), log: absent() };
}

export function controlServerFragment(fields: Partial<ControlServerSettings>): ControlServerSettings {
  return { ...emptyControlServerSettings(), ...fields };
}

export function copyControlServer(settings: ControlServerSettings): ControlServerSettings {
  return mergeControlServer(settings, emptyControlServerSettings());
}

export function mergeControlServer(receiver: ControlServerSettings, other: ControlServerSettings): ControlServerSettings {
  return {
    address: mergeOptional(receiver.address, other.address),
    log: mergeOptional(receiver.log, other.log),
  };
}

export function overrideControlServer(receiver: ControlServerSettings, other: ControlServerSettings): ControlServerSettings {
  return {
    address: overrideOptional(receiver.address, other.address),
    log: overrideOptional(receiver.log, other.log),
  };
}

export function setControlServerDefaults(settings: ControlServerSettings): ControlServerSettings {
  return {
    address: defaultOptional(settings.address, ":8000"),
    log: defaultOptional(settings.log, true),
  };
}

export function validateControlServer(settings: ControlServerSettings): void {
  const address = valueOr(settings.address, "");
  const separator = address.lastIndexOf(":");
  if (separator < 0) {
    throw validationErrors.controlServerAddressInvalid(address, "missing port in address");
  }
  try {
    parsePort(address.slice(separator + 1));
  } catch (error) {
    throw validationErrors.controlServerAddressInvalid(address, error instanceof Error ? error.message : String(error));
  }
}

export function controlServerToNode(settings: ControlServerSettings): TreeNode {
  return treeNode("Control server settings:", [
    treeNode(`Listening address: ${valueOr(settings.address, "not set")}`),
    treeNode(`Logging: ${enabledState(toUndefined(settings.log))}`),
  ]);
}

export function controlServerToLines(settings: ControlServerSettings, style: Partial<LineStyle> = {}): string[] {
  return renderTitledTree(controlServerToNode(settings), style);
}
