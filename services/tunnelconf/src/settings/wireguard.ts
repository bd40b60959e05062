import { validationErrors } from "./errors.js";
import { isValidWireguardKey } from "./keys.js";
import { enabledState, renderTree, secretState, treeNode, type LineStyle, type TreeNode } from "./lines.js";
import {
  copyEndpoint,
  copyIpNetworkList,
  formatEndpoint,
  formatIpNetwork,
  INTERFACE_NAME_PATTERN,
  isIPv6,
  parseIpNetwork,
  type Endpoint,
  type IpNetworkList,
} from "./network.js";
import {
  absent,
  copyOptional,
  defaultOptional,
  mergeOptional,
  overrideOptional,
  present,
  toUndefined,
  valueOr,
  type Optional,
} from "./optional.js";

export const WIREGUARD_IMPLEMENTATIONS = ["auto", "kernelspace", "userspace"] as const;
export type WireguardImplementation = (typeof WIREGUARD_IMPLEMENTATIONS)[number];

export const DEFAULT_WIREGUARD_PORT = 51820;
export const DEFAULT_FIREWALL_MARK = 51820;
/** Firewall marks and rule priorities are 32-bit unsigned in the kernel. */
export const MAX_UINT32 = 0xffffffff;

export type WireguardSettings = {
  readonly interfaceName: Optional<string>;
  readonly privateKey: Optional<string>;
  readonly publicKey: Optional<string>;
  readonly preSharedKey: Optional<string>;
  readonly endpoint: Optional<Endpoint>;
  readonly allowedIPs: Optional<IpNetworkList>;
  readonly addresses: Optional<IpNetworkList>;
  readonly ipv6: Optional<boolean>;
  readonly firewallMark: Optional<number>;
  readonly rulePriority: Optional<number>;
  /** Kept as a string so that unknown values can be reported by validation. */
  readonly implementation: Optional<string>;
};

export function emptyWireguardSettings(): WireguardSettings {
  return {
    interfaceName: absent(),
    privateKey: absent(),
    publicKey: absent(),
    preSharedKey: absent(),
    endpoint: absent(),
    allowedIPs: absent(),
    addresses: absent(),
    ipv6: absent(),
    firewallMark: absent(),
    rulePriority: absent(),
    implementation: absent(),
  };
}

/** Builds a fragment from the fields given; everything else stays absent. */
export function wireguardFragment(fields: Partial<WireguardSettings>): WireguardSettings {
  return { ...emptyWireguardSettings(), ...fields };
}

export function copyWireguard(settings: WireguardSettings): WireguardSettings {
  return {
    interfaceName: copyOptional(settings.interfaceName),
    privateKey: copyOptional(settings.privateKey),
    publicKey: copyOptional(settings.publicKey),
    preSharedKey: copyOptional(settings.preSharedKey),
    endpoint: copyOptional(settings.endpoint, copyEndpoint),
    allowedIPs: copyOptional(settings.allowedIPs, copyIpNetworkList),
    addresses: copyOptional(settings.addresses, copyIpNetworkList),
    ipv6: copyOptional(settings.ipv6),
    firewallMark: copyOptional(settings.firewallMark),
    rulePriority: copyOptional(settings.rulePriority),
    implementation: copyOptional(settings.implementation),
  };
}

export function mergeWireguard(receiver: WireguardSettings, other: WireguardSettings): WireguardSettings {
  return {
    interfaceName: mergeOptional(receiver.interfaceName, other.interfaceName),
    privateKey: mergeOptional(receiver.privateKey, other.privateKey),
    publicKey: mergeOptional(receiver.publicKey, other.publicKey),
    preSharedKey: mergeOptional(receiver.preSharedKey, other.preSharedKey),
    endpoint: mergeOptional(receiver.endpoint, other.endpoint, copyEndpoint),
    allowedIPs: mergeOptional(receiver.allowedIPs, other.allowedIPs, copyIpNetworkList),
    addresses: mergeOptional(receiver.addresses, other.addresses, copyIpNetworkList),
    ipv6: mergeOptional(receiver.ipv6, other.ipv6),
    firewallMark: mergeOptional(receiver.firewallMark, other.firewallMark),
    rulePriority: mergeOptional(receiver.rulePriority, other.rulePriority),
    implementation: mergeOptional(receiver.implementation, other.implementation),
  };
}

export function overrideWireguard(receiver: WireguardSettings, other: WireguardSettings): WireguardSettings {
  return {
    interfaceName: overrideOptional(receiver.interfaceName, other.interfaceName),
    privateKey: overrideOptional(receiver.privateKey, other.privateKey),
    publicKey: overrideOptional(receiver.publicKey, other.publicKey),
    preSharedKey: overrideOptional(receiver.preSharedKey, other.preSharedKey),
    endpoint: overrideOptional(receiver.endpoint, other.endpoint, copyEndpoint),
    allowedIPs: overrideOptional(receiver.allowedIPs, other.allowedIPs, copyIpNetworkList),
    addresses: overrideOptional(receiver.addresses, other.addresses, copyIpNetworkList),
    ipv6: overrideOptional(receiver.ipv6, other.ipv6),
    firewallMark: overrideOptional(receiver.firewallMark, other.firewallMark),
    rulePriority: overrideOptional(receiver.rulePriority, other.rulePriority),
    implementation: overrideOptional(receiver.implementation, other.implementation),
  };
}

function defaultEndpoint(endpoint: Optional<Endpoint>): Optional<Endpoint> {
  if (endpoint.kind === "absent") {
    return endpoint;
  }
  const copied = copyEndpoint(endpoint.value);
  return present(copied.port === 0 ? { ...copied, port: DEFAULT_WIREGUARD_PORT } : copied);
}

export function setWireguardDefaults(settings: WireguardSettings): WireguardSettings {
  return {
    interfaceName: defaultOptional(settings.interfaceName, "wg0"),
    privateKey: copyOptional(settings.privateKey),
    publicKey: copyOptional(settings.publicKey),
    preSharedKey: defaultOptional(settings.preSharedKey, ""),
    endpoint: defaultEndpoint(settings.endpoint),
    allowedIPs: defaultOptional(settings.allowedIPs, [parseIpNetwork("0.0.0.0/0")], copyIpNetworkList),
    addresses: defaultOptional(settings.addresses, [], copyIpNetworkList),
    ipv6: defaultOptional(settings.ipv6, false),
    firewallMark: defaultOptional(settings.firewallMark, DEFAULT_FIREWALL_MARK),
    rulePriority: defaultOptional(settings.rulePriority, 0),
    implementation: defaultOptional(settings.implementation, "auto"),
  };
}

function isImplementation(value: string): value is WireguardImplementation {
  return WIREGUARD_IMPLEMENTATIONS.some(candidate => candidate === value);
}

function isUint32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_UINT32;
}

function validateKeys(settings: WireguardSettings): void {
  const privateKey = valueOr(settings.privateKey, "");
  if (privateKey === "") {
    throw validationErrors.privateKeyMissing();
  }
  if (!isValidWireguardKey(privateKey)) {
    throw validationErrors.privateKeyInvalid();
  }

  const publicKey = valueOr(settings.publicKey, "");
  if (publicKey === "") {
    throw validationErrors.publicKeyMissing();
  }
  if (!isValidWireguardKey(publicKey)) {
    throw validationErrors.publicKeyInvalid(publicKey);
  }

  const preSharedKey = valueOr(settings.preSharedKey, "");
  if (preSharedKey !== "" && !isValidWireguardKey(preSharedKey)) {
    throw validationErrors.preSharedKeyInvalid();
  }
}

function validateEndpoint(endpoint: Endpoint | undefined): void {
  if (!endpoint) {
    throw validationErrors.endpointMissing();
  }
  if (!endpoint.address) {
    throw validationErrors.endpointIpMissing();
  }
  if (endpoint.port === 0) {
    throw validationErrors.endpointPortMissing();
  }
}

function validateAllowedIPs(allowedIPs: IpNetworkList, ipv6Enabled: boolean): void {
  if (allowedIPs.length === 0) {
    throw validationErrors.allowedIPsMissing();
  }
  allowedIPs.forEach((network, index) => {
    if (!network) {
      throw validationErrors.allowedIPNil(index, allowedIPs.length);
    }
    if (!network.address) {
      throw validationErrors.allowedIPAddressNil(index, allowedIPs.length);
    }
    if (!ipv6Enabled && isIPv6(network.address)) {
      throw validationErrors.allowedIPv6NotSupported(formatIpNetwork(network), index, allowedIPs.length);
    }
  });
}

function validateAddresses(addresses: IpNetworkList): void {
  if (addresses.length === 0) {
    throw validationErrors.addressMissing();
  }
  addresses.forEach((network, index) => {
    if (!network) {
      throw validationErrors.addressNil(index, addresses.length);
    }
    if (!network.address) {
      throw validationErrors.addressIpMissing(index, addresses.length);
    }
    if (network.prefixLength === undefined) {
      throw validationErrors.addressMaskMissing(index, addresses.length);
    }
  });
}

/**
 * Checks are run in a fixed order and the first failure is thrown.
 * Absent fields are checked as their zero value, so unresolved fragments
 * can be validated too.
 */
export function validateWireguard(settings: WireguardSettings): void {
  const interfaceName = valueOr(settings.interfaceName, "");
  if (!INTERFACE_NAME_PATTERN.test(interfaceName)) {
    throw validationErrors.wireguardInterfaceNameInvalid(interfaceName);
  }

  validateKeys(settings);
  validateEndpoint(toUndefined(settings.endpoint));
  validateAllowedIPs(valueOr(settings.allowedIPs, []), valueOr(settings.ipv6, false));
  validateAddresses(valueOr(settings.addresses, []));

  const firewallMark = valueOr(settings.firewallMark, 0);
  if (firewallMark === 0) {
    throw validationErrors.firewallMarkMissing();
  }
  if (!isUint32(firewallMark)) {
    throw validationErrors.firewallMarkInvalid(firewallMark, MAX_UINT32);
  }

  const rulePriority = valueOr(settings.rulePriority, 0);
  if (!isUint32(rulePriority)) {
    throw validationErrors.rulePriorityInvalid(rulePriority, MAX_UINT32);
  }

  const implementation = valueOr(settings.implementation, "");
  if (!isImplementation(implementation)) {
    throw validationErrors.implementationInvalid(implementation);
  }
}

export function wireguardToNodes(settings: WireguardSettings): TreeNode[] {
  const nodes: TreeNode[] = [
    treeNode(`Interface name: ${valueOr(settings.interfaceName, "not set")}`),
    treeNode(`Private key: ${secretState(toUndefined(settings.privateKey))}`),
  ];

  const publicKey = valueOr(settings.publicKey, "");
  if (publicKey !== "") {
    nodes.push(treeNode(`PublicKey: ${publicKey}`));
  }

  nodes.push(treeNode(`Pre shared key: ${secretState(toUndefined(settings.preSharedKey))}`));

  const endpoint = toUndefined(settings.endpoint);
  nodes.push(treeNode(`Endpoint: ${endpoint ? formatEndpoint(endpoint) : "not set"}`));
  nodes.push(treeNode(`IPv6: ${enabledState(toUndefined(settings.ipv6))}`));

  const firewallMark = valueOr(settings.firewallMark, 0);
  if (firewallMark !== 0) {
    nodes.push(treeNode(`Firewall mark: ${firewallMark}`));
  }

  const rulePriority = valueOr(settings.rulePriority, 0);
  if (rulePriority !== 0) {
    nodes.push(treeNode(`Rule priority: ${rulePriority}`));
  }

  nodes.push(treeNode(`Implementation: ${valueOr(settings.implementation, "not set")}`));

  const addresses = valueOr(settings.addresses, []);
  if (addresses.length === 0) {
    nodes.push(treeNode("Addresses: not set"));
  } else {
    nodes.push(
      treeNode(
        "Addresses:",
        addresses.map(address => treeNode(address ? formatIpNetwork(address) : "<nil>")),
      ),
    );
  }

  return nodes;
}

export function wireguardToLines(settings: WireguardSettings, style: Partial<LineStyle> = {}): string[] {
  return renderTree(wireguardToNodes(settings), style);
}

export function wireguardToString(settings: WireguardSettings): string {
  return wireguardToLines(settings).join("\n");
}
