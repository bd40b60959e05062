import { formatDuration } from "./duration.js";
import { validationErrors } from "./errors.js";
import { isValidIpAddress } from "./network.js";
import { renderTitledTree, treeNode, type LineStyle, type TreeNode } from "./lines.js";
import {
  absent,
  defaultOptional,
  fromUndefined,
  mergeOptional,
  overrideOptional,
  present,
  valueOr,
  type Optional,
} from "./optional.js";

export const UPDATABLE_PROVIDERS = [
  "cyberghost",
  "mullvad",
  "nordvpn",
  "private internet access",
  "privado",
  "purevpn",
  "surfshark",
  "torguard",
  "vyprvpn",
  "windscribe",
] as const;

export type UpdatableProvider = (typeof UPDATABLE_PROVIDERS)[number];

export type UpdaterProviderFlags = Readonly<Record<UpdatableProvider, Optional<boolean>>>;

export const MIN_UPDATER_PERIOD_MS = 60 * 1000;

export type UpdaterSettings = {
  /** Milliseconds between server data updates; 0 disables the updater. */
  readonly period: Optional<number>;
  readonly dnsAddress: Optional<string>;
  readonly providers: UpdaterProviderFlags;
};

export function isUpdatableProvider(value: string): value is UpdatableProvider {
  return UPDATABLE_PROVIDERS.some(candidate => candidate === value);
}

function mapFlags(fn: (provider: UpdatableProvider) => Optional<boolean>): UpdaterProviderFlags {
  return {
    cyberghost: fn("cyberghost"),
    mullvad: fn("mullvad"),
    nordvpn: fn("nordvpn"),
    "private internet access": fn("private internet access"),
    privado: fn("privado"),
    purevpn: fn("purevpn"),
    surfshark: fn("surfshark"),
    torguard: fn("torguard"),
    vyprvpn: fn("vyprvpn"),
    windscribe: fn("windscribe"),
  };
}

export function emptyUpdaterSettings(): UpdaterSettings {
  return { period: absent(), dnsAddress: absent(), providers: mapFlags(() => absent()) };
}

export function updaterFragment(fields: Partial<UpdaterSettings>): UpdaterSettings {
  return { ...emptyUpdaterSettings(), ...fields };
}

/** Flags for the given providers only; the others stay absent. */
export function updaterProviderFlags(flags: Partial<Record<UpdatableProvider, boolean>>): UpdaterProviderFlags {
  return mapFlags(provider => fromUndefined(flags[provider]));
}

/** Listed providers are enabled, every other one is disabled. */
export function updaterProvidersFromList(enabled: readonly UpdatableProvider[]): UpdaterProviderFlags {
  return mapFlags(provider => present(enabled.includes(provider)));
}

export function copyUpdater(settings: UpdaterSettings): UpdaterSettings {
  return mergeUpdater(settings, emptyUpdaterSettings());
}

export function mergeUpdater(receiver: UpdaterSettings, other: UpdaterSettings): UpdaterSettings {
  return {
    period: mergeOptional(receiver.period, other.period),
    dnsAddress: mergeOptional(receiver.dnsAddress, other.dnsAddress),
    providers: mapFlags(provider => mergeOptional(receiver.providers[provider], other.providers[provider])),
  };
}

export function overrideUpdater(receiver: UpdaterSettings, other: UpdaterSettings): UpdaterSettings {
  return {
    period: overrideOptional(receiver.period, other.period),
    dnsAddress: overrideOptional(receiver.dnsAddress, other.dnsAddress),
    providers: mapFlags(provider => overrideOptional(receiver.providers[provider], other.providers[provider])),
  };
}

export function setUpdaterDefaults(settings: UpdaterSettings): UpdaterSettings {
  return {
    period: defaultOptional(settings.period, 0),
    // Plaintext resolver so updates are not blocked by DNS over TLS.
    dnsAddress: defaultOptional(settings.dnsAddress, "1.1.1.1"),
    providers: mapFlags(provider => defaultOptional(settings.providers[provider], true)),
  };
}

export function validateUpdater(settings: UpdaterSettings): void {
  const period = valueOr(settings.period, 0);
  if (period < 0 || (period > 0 && period < MIN_UPDATER_PERIOD_MS)) {
    throw validationErrors.updaterPeriodTooSmall(formatDuration(period), formatDuration(MIN_UPDATER_PERIOD_MS));
  }
  const dnsAddress = valueOr(settings.dnsAddress, "");
  if (!isValidIpAddress(dnsAddress)) {
    throw validationErrors.updaterDnsAddressInvalid(dnsAddress);
  }
}

export function enabledUpdaterProviders(settings: UpdaterSettings): UpdatableProvider[] {
  return UPDATABLE_PROVIDERS.filter(provider => valueOr(settings.providers[provider], false));
}

export function updaterToNode(settings: UpdaterSettings): TreeNode {
  const period = valueOr(settings.period, 0);
  if (period === 0) {
    return treeNode("Updater settings:", [treeNode("Period: disabled")]);
  }
  const providers = enabledUpdaterProviders(settings);
  return treeNode("Updater settings:", [
    treeNode(`Period: every ${formatDuration(period)}`),
    treeNode(`DNS address: ${valueOr(settings.dnsAddress, "not set")}`),
    treeNode(`Providers: ${providers.length > 0 ? providers.join(", ") : "none"}`),
  ]);
}

export function updaterToLines(settings: UpdaterSettings, style: Partial<LineStyle> = {}): string[] {
  return renderTitledTree(updaterToNode(settings), style);
}
