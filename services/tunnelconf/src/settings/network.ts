import ipaddr from "ipaddr.js";

export type IpAddress = ReturnType<typeof ipaddr.parse>;

/**
 * CIDR network. Both parts may be missing so that incomplete entries coming
 * from a source can be carried to validation and reported with their position.
 */
export type IpNetwork = {
  readonly address: IpAddress | undefined;
  readonly prefixLength: number | undefined;
};

/** Network interface names, shared by the WireGuard and OpenVPN devices. */
export const INTERFACE_NAME_PATTERN = /^[a-zA-Z0-9_]+$/;

export type IpNetworkList = ReadonlyArray<IpNetwork | undefined>;

export type Endpoint = {
  readonly address: IpAddress | undefined;
  readonly port: number;
};

function stripZone(value: string): string {
  return value.includes("%") ? value.split("%", 1)[0] : value;
}

/** Dotted-quad IPv4 or IPv6; the shorthand IPv4 forms are refused. */
export function isValidIpAddress(value: string): boolean {
  if (value.includes(":")) {
    return ipaddr.IPv6.isValid(stripZone(value));
  }
  return ipaddr.IPv4.isValidFourPartDecimal(value);
}

export function parseIpAddress(raw: string): IpAddress {
  const trimmed = stripZone(raw.trim());
  if (!isValidIpAddress(trimmed)) {
    throw new Error(`invalid IP address: ${raw}`);
  }
  return ipaddr.parse(trimmed);
}

export function parseIpNetwork(raw: string): IpNetwork {
  const trimmed = raw.trim();
  const separator = trimmed.lastIndexOf("/");
  if (separator < 0 || !isValidIpAddress(trimmed.slice(0, separator))) {
    throw new Error(`invalid CIDR address: ${raw}`);
  }
  try {
    const [address, prefixLength] = ipaddr.parseCIDR(trimmed);
    return { address, prefixLength };
  } catch {
    throw new Error(`invalid CIDR address: ${raw}`);
  }
}

export function parseIpNetworkList(csv: string): IpNetwork[] {
  return csv
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0)
    .map(parseIpNetwork);
}

/** Parses `host:port` or `[v6]:port`. The port is mandatory. */
export function parseEndpoint(raw: string): Endpoint {
  const trimmed = raw.trim();
  let host: string;
  let portText: string;
  if (trimmed.startsWith("[")) {
    const closing = trimmed.indexOf("]");
    if (closing < 0 || trimmed[closing + 1] !== ":") {
      throw new Error(`invalid endpoint: ${raw}`);
    }
    host = trimmed.slice(1, closing);
    portText = trimmed.slice(closing + 2);
  } else {
    const separator = trimmed.lastIndexOf(":");
    if (separator <= 0) {
      throw new Error(`invalid endpoint: ${raw}`);
    }
    host = trimmed.slice(0, separator);
    portText = trimmed.slice(separator + 1);
  }
  const port = parsePort(portText);
  return { address: parseIpAddress(host), port };
}

export function parsePort(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`invalid port: ${raw}`);
  }
  const port = Number.parseInt(trimmed, 10);
  if (port > 65535) {
    throw new Error(`port ${port} is above the maximum of 65535`);
  }
  return port;
}

/** IPv4-mapped IPv6 addresses are treated as IPv4. */
export function isIPv6(address: IpAddress): boolean {
  if (address instanceof ipaddr.IPv6) {
    return !address.isIPv4MappedAddress();
  }
  return false;
}

export function formatIpAddress(address: IpAddress): string {
  if (address instanceof ipaddr.IPv6 && address.isIPv4MappedAddress()) {
    return address.toIPv4Address().toString();
  }
  return address.toString();
}

export function formatIpNetwork(network: IpNetwork): string {
  const address = network.address ? formatIpAddress(network.address) : "<nil>";
  const prefix = network.prefixLength === undefined ? "<nil>" : String(network.prefixLength);
  return `${address}/${prefix}`;
}

export function formatEndpoint(endpoint: Endpoint): string {
  if (!endpoint.address) {
    return `:${endpoint.port}`;
  }
  const host = formatIpAddress(endpoint.address);
  return isIPv6(endpoint.address) ? `[${host}]:${endpoint.port}` : `${host}:${endpoint.port}`;
}

export function copyIpAddress(address: IpAddress): IpAddress {
  return ipaddr.fromByteArray(address.toByteArray());
}

export function copyIpNetwork(network: IpNetwork): IpNetwork {
  return {
    address: network.address ? copyIpAddress(network.address) : undefined,
    prefixLength: network.prefixLength,
  };
}

export function copyIpNetworkList(list: IpNetworkList): Array<IpNetwork | undefined> {
  return list.map(entry => (entry ? copyIpNetwork(entry) : undefined));
}

export function copyEndpoint(endpoint: Endpoint): Endpoint {
  return {
    address: endpoint.address ? copyIpAddress(endpoint.address) : undefined,
    port: endpoint.port,
  };
}
