import { INTERFACE_NAME_PATTERN } from "./network.js";

export type ValidationErrorCode =
  | "wireguard.interface_name_invalid"
  | "wireguard.private_key_missing"
  | "wireguard.private_key_invalid"
  | "wireguard.public_key_missing"
  | "wireguard.public_key_invalid"
  | "wireguard.preshared_key_invalid"
  | "wireguard.endpoint_missing"
  | "wireguard.endpoint_ip_missing"
  | "wireguard.endpoint_port_missing"
  | "wireguard.allowed_ips_missing"
  | "wireguard.allowed_ip_nil"
  | "wireguard.allowed_ip_address_nil"
  | "wireguard.allowed_ipv6_not_supported"
  | "wireguard.address_missing"
  | "wireguard.address_nil"
  | "wireguard.address_ip_missing"
  | "wireguard.address_mask_missing"
  | "wireguard.firewall_mark_missing"
  | "wireguard.firewall_mark_invalid"
  | "wireguard.rule_priority_invalid"
  | "wireguard.implementation_invalid"
  | "openvpn.version_invalid"
  | "openvpn.user_empty"
  | "openvpn.password_empty"
  | "openvpn.conf_file_missing"
  | "openvpn.conf_file_not_found"
  | "openvpn.conf_file_inaccessible"
  | "openvpn.conf_file_unparseable"
  | "openvpn.missing_value"
  | "openvpn.base64_invalid"
  | "openvpn.key_passphrase_empty"
  | "openvpn.mssfix_too_high"
  | "openvpn.mssfix_invalid"
  | "openvpn.interface_invalid"
  | "openvpn.verbosity_out_of_bounds"
  | "control_server.address_invalid"
  | "updater.period_too_small"
  | "updater.dns_address_invalid"
  | "vpn.type_invalid"
  | "vpn.provider_invalid";

export type ListPosition = {
  /** 1-based. */
  index: number;
  total: number;
};

export type ValidationErrorDetails = {
  value?: string | number;
  position?: ListPosition;
  limit?: string | number;
  reason?: string;
};

type MessageContext = {
  field: string;
  details: ValidationErrorDetails;
};

const FIELD_LABELS: Record<string, string> = {
  cert: "client certificate",
  key: "client key",
  encryptedKey: "encrypted key",
};

function fieldLabel(field: string): string {
  return FIELD_LABELS[field] ?? field;
}

function position(details: ValidationErrorDetails): string {
  const pos = details.position;
  return pos ? `${pos.index} of ${pos.total}` : "";
}

function value(details: ValidationErrorDetails): string {
  return details.value === undefined ? "" : String(details.value);
}

const MESSAGES: Record<ValidationErrorCode, (ctx: MessageContext) => string> = {
  "wireguard.interface_name_invalid": ({ details }) => `invalid interface name: ${value(details)}`,
  "wireguard.private_key_missing": () => "private key is missing",
  "wireguard.private_key_invalid": () => "cannot parse private key",
  "wireguard.public_key_missing": () => "public key is missing",
  "wireguard.public_key_invalid": ({ details }) => `cannot parse public key: ${value(details)}`,
  "wireguard.preshared_key_invalid": () => "cannot parse pre-shared key",
  "wireguard.endpoint_missing": () => "endpoint is missing",
  "wireguard.endpoint_ip_missing": () => "endpoint IP is missing",
  "wireguard.endpoint_port_missing": () => "endpoint port is missing",
  "wireguard.allowed_ips_missing": () => "allowed IPs are missing",
  "wireguard.allowed_ip_nil": ({ details }) => `allowed IP is nil: for allowed IP ${position(details)}`,
  "wireguard.allowed_ip_address_nil": ({ details }) =>
    `allowed IP IP field is nil: for allowed IP ${position(details)}`,
  "wireguard.allowed_ipv6_not_supported": ({ details }) =>
    `allowed IPv6 address not supported: for allowed IP ${value(details)}`,
  "wireguard.address_missing": () => "interface address is missing",
  "wireguard.address_nil": ({ details }) => `interface address is nil: for address ${position(details)}`,
  "wireguard.address_ip_missing": ({ details }) =>
    `interface address IP is missing: for address ${position(details)}`,
  "wireguard.address_mask_missing": ({ details }) =>
    `interface address mask is missing: for address ${position(details)}`,
  "wireguard.firewall_mark_missing": () => "firewall mark is missing",
  "wireguard.firewall_mark_invalid": ({ details }) =>
    `firewall mark is not valid: ${value(details)} must be an integer between 1 and ${String(details.limit)}`,
  "wireguard.rule_priority_invalid": ({ details }) =>
    `rule priority is not valid: ${value(details)} must be an integer between 0 and ${String(details.limit)}`,
  "wireguard.implementation_invalid": ({ details }) => `invalid implementation: ${value(details)}`,
  "openvpn.version_invalid": ({ details }) =>
    `OpenVPN version is not valid: "${value(details)}" is not one of ${String(details.limit)}`,
  "openvpn.user_empty": () => "user is empty",
  "openvpn.password_empty": () => "password is empty",
  "openvpn.conf_file_missing": () => "custom configuration file: filepath is missing",
  "openvpn.conf_file_not_found": ({ details }) =>
    `custom configuration file: file does not exist: ${value(details)}`,
  "openvpn.conf_file_inaccessible": ({ details }) =>
    `custom configuration file: cannot access ${value(details)}: ${details.reason ?? ""}`,
  "openvpn.conf_file_unparseable": ({ details }) =>
    `custom configuration file: extracting information from custom configuration file: ${details.reason ?? ""}`,
  "openvpn.missing_value": ({ field }) => `${fieldLabel(field)}: missing value`,
  "openvpn.base64_invalid": ({ field }) => `${fieldLabel(field)}: value is not valid base64`,
  "openvpn.key_passphrase_empty": () => "key passphrase is empty",
  "openvpn.mssfix_too_high": ({ details }) =>
    `mssfix option value is too high: ${value(details)} is over the maximum value of ${String(details.limit)}`,
  "openvpn.mssfix_invalid": ({ details }) => `mssfix option value is not valid: ${value(details)} must be a non-negative integer`,
  "openvpn.interface_invalid": ({ details }) =>
    `OpenVPN interface name is not valid: '${value(details)}' does not match regex '${INTERFACE_NAME_PATTERN.source}'`,
  "openvpn.verbosity_out_of_bounds": ({ details }) =>
    `verbosity value is out of bounds: ${value(details)} can only be between 0 and ${String(details.limit)}`,
  "control_server.address_invalid": ({ details }) =>
    `control server listening address is not valid: ${value(details)}: ${details.reason ?? ""}`,
  "updater.period_too_small": ({ details }) =>
    `updater period is too small: ${value(details)} must be at least ${String(details.limit)}`,
  "updater.dns_address_invalid": ({ details }) => `updater DNS address is not valid: ${value(details)}`,
  "vpn.type_invalid": ({ details }) => `VPN type is not valid: "${value(details)}" is not one of ${String(details.limit)}`,
  "vpn.provider_invalid": ({ details }) => `VPN provider is not valid: ${value(details)}`,
};

export function formatValidationMessage(
  code: ValidationErrorCode,
  field: string,
  details: ValidationErrorDetails = {},
): string {
  return MESSAGES[code]({ field, details });
}

export class SettingsValidationError extends Error {
  readonly code: ValidationErrorCode;
  readonly field: string;
  readonly details: ValidationErrorDetails;

  constructor(code: ValidationErrorCode, field: string, details: ValidationErrorDetails = {}) {
    super(formatValidationMessage(code, field, details));
    this.name = "SettingsValidationError";
    this.code = code;
    this.field = field;
    this.details = details;
  }
}

export function isValidationError(error: unknown, code?: ValidationErrorCode): error is SettingsValidationError {
  if (!(error instanceof SettingsValidationError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

function at(index: number, total: number): ListPosition {
  return { index: index + 1, total };
}

/** One constructor per invariant; list indexes are passed 0-based. */
export const validationErrors = {
  wireguardInterfaceNameInvalid: (name: string) =>
    new SettingsValidationError("wireguard.interface_name_invalid", "interfaceName", { value: name }),
  privateKeyMissing: () => new SettingsValidationError("wireguard.private_key_missing", "privateKey"),
  privateKeyInvalid: () => new SettingsValidationError("wireguard.private_key_invalid", "privateKey"),
  publicKeyMissing: () => new SettingsValidationError("wireguard.public_key_missing", "publicKey"),
  publicKeyInvalid: (key: string) =>
    new SettingsValidationError("wireguard.public_key_invalid", "publicKey", { value: key }),
  preSharedKeyInvalid: () => new SettingsValidationError("wireguard.preshared_key_invalid", "preSharedKey"),
  endpointMissing: () => new SettingsValidationError("wireguard.endpoint_missing", "endpoint"),
  endpointIpMissing: () => new SettingsValidationError("wireguard.endpoint_ip_missing", "endpoint"),
  endpointPortMissing: () => new SettingsValidationError("wireguard.endpoint_port_missing", "endpoint"),
  allowedIPsMissing: () => new SettingsValidationError("wireguard.allowed_ips_missing", "allowedIPs"),
  allowedIPNil: (index: number, total: number) =>
    new SettingsValidationError("wireguard.allowed_ip_nil", "allowedIPs", { position: at(index, total) }),
  allowedIPAddressNil: (index: number, total: number) =>
    new SettingsValidationError("wireguard.allowed_ip_address_nil", "allowedIPs", { position: at(index, total) }),
  allowedIPv6NotSupported: (network: string, index: number, total: number) =>
    new SettingsValidationError("wireguard.allowed_ipv6_not_supported", "allowedIPs", {
      value: network,
      position: at(index, total),
    }),
  addressMissing: () => new SettingsValidationError("wireguard.address_missing", "addresses"),
  addressNil: (index: number, total: number) =>
    new SettingsValidationError("wireguard.address_nil", "addresses", { position: at(index, total) }),
  addressIpMissing: (index: number, total: number) =>
    new SettingsValidationError("wireguard.address_ip_missing", "addresses", { position: at(index, total) }),
  addressMaskMissing: (index: number, total: number) =>
    new SettingsValidationError("wireguard.address_mask_missing", "addresses", { position: at(index, total) }),
  firewallMarkMissing: () => new SettingsValidationError("wireguard.firewall_mark_missing", "firewallMark"),
  firewallMarkInvalid: (mark: number, max: number) =>
    new SettingsValidationError("wireguard.firewall_mark_invalid", "firewallMark", { value: mark, limit: max }),
  rulePriorityInvalid: (priority: number, max: number) =>
    new SettingsValidationError("wireguard.rule_priority_invalid", "rulePriority", { value: priority, limit: max }),
  implementationInvalid: (implementation: string) =>
    new SettingsValidationError("wireguard.implementation_invalid", "implementation", { value: implementation }),

  openvpnVersionInvalid: (version: string, allowed: readonly string[]) =>
    new SettingsValidationError("openvpn.version_invalid", "version", { value: version, limit: allowed.join(", ") }),
  userEmpty: () => new SettingsValidationError("openvpn.user_empty", "user"),
  passwordEmpty: () => new SettingsValidationError("openvpn.password_empty", "password"),
  confFileMissing: () => new SettingsValidationError("openvpn.conf_file_missing", "confFile"),
  confFileNotFound: (path: string) =>
    new SettingsValidationError("openvpn.conf_file_not_found", "confFile", { value: path }),
  confFileInaccessible: (path: string, reason: string) =>
    new SettingsValidationError("openvpn.conf_file_inaccessible", "confFile", { value: path, reason }),
  confFileUnparseable: (path: string, reason: string) =>
    new SettingsValidationError("openvpn.conf_file_unparseable", "confFile", { value: path, reason }),
  missingValue: (field: "cert" | "key" | "encryptedKey") =>
    new SettingsValidationError("openvpn.missing_value", field),
  base64Invalid: (field: "cert" | "key" | "encryptedKey") =>
    new SettingsValidationError("openvpn.base64_invalid", field),
  keyPassphraseEmpty: () => new SettingsValidationError("openvpn.key_passphrase_empty", "keyPassphrase"),
  mssFixTooHigh: (mssFix: number, max: number) =>
    new SettingsValidationError("openvpn.mssfix_too_high", "mssFix", { value: mssFix, limit: max }),
  mssFixInvalid: (mssFix: number) => new SettingsValidationError("openvpn.mssfix_invalid", "mssFix", { value: mssFix }),
  openvpnInterfaceInvalid: (name: string) =>
    new SettingsValidationError("openvpn.interface_invalid", "interfaceName", { value: name }),
  verbosityOutOfBounds: (verbosity: number, max: number) =>
    new SettingsValidationError("openvpn.verbosity_out_of_bounds", "verbosity", { value: verbosity, limit: max }),

  controlServerAddressInvalid: (address: string, reason: string) =>
    new SettingsValidationError("control_server.address_invalid", "address", { value: address, reason }),
  updaterPeriodTooSmall: (period: string, min: string) =>
    new SettingsValidationError("updater.period_too_small", "period", { value: period, limit: min }),
  updaterDnsAddressInvalid: (address: string) =>
    new SettingsValidationError("updater.dns_address_invalid", "dnsAddress", { value: address }),

  vpnTypeInvalid: (type: string, allowed: readonly string[]) =>
    new SettingsValidationError("vpn.type_invalid", "type", { value: type, limit: allowed.join(", ") }),
  vpnProviderInvalid: (provider: string) =>
    new SettingsValidationError("vpn.provider_invalid", "provider", { value: provider }),
} as const;

/** Failure of a source to read or decode its input. The cause is kept untouched. */
export class SourceError extends Error {
  readonly source: string;
  readonly context: string;

  constructor(source: string, context: string, cause: unknown) {
    super(`${context}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "SourceError";
    this.source = source;
    this.context = context;
  }
}

/** Prefixes a lower level error with context, keeping it as the cause. */
export function withContext(context: string, cause: unknown): Error {
  return new Error(`${context}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
}
