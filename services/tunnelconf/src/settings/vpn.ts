import { validationErrors } from "./errors.js";
import { treeNode, type TreeNode } from "./lines.js";
import {
  copyOpenvpn,
  emptyOpenvpnSettings,
  mergeOpenvpn,
  openvpnToNode,
  overrideOpenvpn,
  setOpenvpnDefaults,
  validateOpenvpn,
  type OpenvpnSettings,
} from "./openvpn.js";
import { absent, defaultOptional, mergeOptional, overrideOptional, valueOr, type Optional } from "./optional.js";
import { isVpnProvider, VPN_PROVIDERS } from "./providers.js";
import {
  copyWireguard,
  emptyWireguardSettings,
  mergeWireguard,
  overrideWireguard,
  setWireguardDefaults,
  validateWireguard,
  wireguardToNodes,
  type WireguardSettings,
} from "./wireguard.js";

export const VPN_TYPES = ["openvpn", "wireguard"] as const;
export type VpnType = (typeof VPN_TYPES)[number];

export const DEFAULT_VPN_PROVIDER = "private internet access";

export type VpnSettings = {
  readonly type: Optional<string>;
  readonly provider: Optional<string>;
  readonly openvpn: OpenvpnSettings;
  readonly wireguard: WireguardSettings;
};

export function emptyVpnSettings(): VpnSettings {
  return {
    type: absent(),
    provider: absent(),
    openvpn: emptyOpenvpnSettings(),
    wireguard: emptyWireguardSettings(),
  };
}

export function vpnFragment(fields: Partial<VpnSettings>): VpnSettings {
  return { ...emptyVpnSettings(), ...fields };
}

export function copyVpn(settings: VpnSettings): VpnSettings {
  return {
    type: settings.type,
    provider: settings.provider,
    openvpn: copyOpenvpn(settings.openvpn),
    wireguard: copyWireguard(settings.wireguard),
  };
}

export function mergeVpn(receiver: VpnSettings, other: VpnSettings): VpnSettings {
  return {
    type: mergeOptional(receiver.type, other.type),
    provider: mergeOptional(receiver.provider, other.provider),
    openvpn: mergeOpenvpn(receiver.openvpn, other.openvpn),
    wireguard: mergeWireguard(receiver.wireguard, other.wireguard),
  };
}

export function overrideVpn(receiver: VpnSettings, other: VpnSettings): VpnSettings {
  return {
    type: overrideOptional(receiver.type, other.type),
    provider: overrideOptional(receiver.provider, other.provider),
    openvpn: overrideOpenvpn(receiver.openvpn, other.openvpn),
    wireguard: overrideWireguard(receiver.wireguard, other.wireguard),
  };
}

/** The provider is defaulted first since OpenVPN defaults depend on it. */
export function setVpnDefaults(settings: VpnSettings): VpnSettings {
  const provider = defaultOptional(settings.provider, DEFAULT_VPN_PROVIDER);
  return {
    type: defaultOptional(settings.type, "openvpn"),
    provider,
    openvpn: setOpenvpnDefaults(settings.openvpn, valueOr(provider, DEFAULT_VPN_PROVIDER)),
    wireguard: setWireguardDefaults(settings.wireguard),
  };
}

function isVpnType(value: string): value is VpnType {
  return VPN_TYPES.some(candidate => candidate === value);
}

/** Only the settings of the selected protocol are validated. */
export function validateVpn(settings: VpnSettings): void {
  const type = valueOr(settings.type, "");
  if (!isVpnType(type)) {
    throw validationErrors.vpnTypeInvalid(type, VPN_TYPES);
  }
  const provider = valueOr(settings.provider, "");
  if (!isVpnProvider(provider)) {
    throw validationErrors.vpnProviderInvalid(provider);
  }
  if (type === "openvpn") {
    validateOpenvpn(settings.openvpn, provider);
  } else {
    validateWireguard(settings.wireguard);
  }
}

export function vpnToNode(settings: VpnSettings): TreeNode {
  const type = valueOr(settings.type, "not set");
  const protocolNode =
    type === "wireguard"
      ? treeNode("Wireguard settings:", wireguardToNodes(settings.wireguard))
      : openvpnToNode(settings.openvpn);
  return treeNode("VPN settings:", [
    treeNode(`VPN type: ${type}`),
    treeNode(`VPN provider: ${valueOr(settings.provider, "not set")}`),
    protocolNode,
  ]);
}

export { VPN_PROVIDERS };
