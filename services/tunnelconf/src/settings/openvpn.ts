import { validationErrors } from "./errors.js";
import { isValidBase64 } from "./keys.js";
import { renderTitledTree, secretState, treeNode, type LineStyle, type TreeNode } from "./lines.js";
import { INTERFACE_NAME_PATTERN } from "./network.js";
import { extractConnectionFromFile, fileExists } from "./openvpnConfigFile.js";
import {
  absent,
  copyList,
  copyOptional,
  defaultOptional,
  mergeOptional,
  overrideOptional,
  toUndefined,
  valueOr,
  type Optional,
} from "./optional.js";
import { isPasswordRequired, isUserRequired, providerRules } from "./providers.js";

export const OPENVPN_VERSIONS = ["2.5", "2.6"] as const;
export const MAX_MSS_FIX = 10000;
export const MAX_VERBOSITY = 6;

export type OpenvpnSettings = {
  readonly version: Optional<string>;
  /** Present-empty means no user/password authentication. */
  readonly user: Optional<string>;
  readonly password: Optional<string>;
  /** Custom configuration file path; the empty string means none. */
  readonly confFile: Optional<string>;
  readonly ciphers: Optional<readonly string[]>;
  readonly auth: Optional<string>;
  /** Base64 DER of the client certificate. */
  readonly cert: Optional<string>;
  /** Base64 DER of the client key. */
  readonly key: Optional<string>;
  readonly encryptedKey: Optional<string>;
  readonly keyPassphrase: Optional<string>;
  /** Private Internet Access encryption preset. */
  readonly encryptionPreset: Optional<string>;
  /** 0 leaves mssfix unset. */
  readonly mssFix: Optional<number>;
  readonly interfaceName: Optional<string>;
  readonly processUser: Optional<string>;
  readonly verbosity: Optional<number>;
  readonly flags: Optional<readonly string[]>;
};

export function emptyOpenvpnSettings(): OpenvpnSettings {
  return {
    version: absent(),
    user: absent(),
    password: absent(),
    confFile: absent(),
    ciphers: absent(),
    auth: absent(),
    cert: absent(),
    key: absent(),
    encryptedKey: absent(),
    keyPassphrase: absent(),
    encryptionPreset: absent(),
    mssFix: absent(),
    interfaceName: absent(),
    processUser: absent(),
    verbosity: absent(),
    flags: absent(),
  };
}

export function openvpnFragment(fields: Partial<OpenvpnSettings>): OpenvpnSettings {
  return { ...emptyOpenvpnSettings(), ...fields };
}

type Combine = <T>(receiver: Optional<T>, other: Optional<T>, clone?: (value: T) => T) => Optional<T>;

function combineOpenvpn(receiver: OpenvpnSettings, other: OpenvpnSettings, combine: Combine): OpenvpnSettings {
  return {
    version: combine(receiver.version, other.version),
    user: combine(receiver.user, other.user),
    password: combine(receiver.password, other.password),
    confFile: combine(receiver.confFile, other.confFile),
    ciphers: combine(receiver.ciphers, other.ciphers, copyList),
    auth: combine(receiver.auth, other.auth),
    cert: combine(receiver.cert, other.cert),
    key: combine(receiver.key, other.key),
    encryptedKey: combine(receiver.encryptedKey, other.encryptedKey),
    keyPassphrase: combine(receiver.keyPassphrase, other.keyPassphrase),
    encryptionPreset: combine(receiver.encryptionPreset, other.encryptionPreset),
    mssFix: combine(receiver.mssFix, other.mssFix),
    interfaceName: combine(receiver.interfaceName, other.interfaceName),
    processUser: combine(receiver.processUser, other.processUser),
    verbosity: combine(receiver.verbosity, other.verbosity),
    flags: combine(receiver.flags, other.flags, copyList),
  };
}

export function copyOpenvpn(settings: OpenvpnSettings): OpenvpnSettings {
  return combineOpenvpn(settings, emptyOpenvpnSettings(), mergeOptional);
}

export function mergeOpenvpn(receiver: OpenvpnSettings, other: OpenvpnSettings): OpenvpnSettings {
  return combineOpenvpn(receiver, other, mergeOptional);
}

export function overrideOpenvpn(receiver: OpenvpnSettings, other: OpenvpnSettings): OpenvpnSettings {
  return combineOpenvpn(receiver, other, overrideOptional);
}

export function setOpenvpnDefaults(settings: OpenvpnSettings, provider: string): OpenvpnSettings {
  const rules = providerRules(provider);
  return {
    version: defaultOptional(settings.version, "2.5"),
    user: defaultOptional(settings.user, ""),
    password: defaultOptional(settings.password, rules.defaultPassword),
    confFile: defaultOptional(settings.confFile, ""),
    ciphers: defaultOptional(settings.ciphers, [], copyList),
    auth: defaultOptional(settings.auth, ""),
    cert: defaultOptional(settings.cert, ""),
    key: defaultOptional(settings.key, ""),
    encryptedKey: defaultOptional(settings.encryptedKey, ""),
    keyPassphrase: defaultOptional(settings.keyPassphrase, ""),
    encryptionPreset: defaultOptional(settings.encryptionPreset, rules.defaultEncryptionPreset),
    mssFix: defaultOptional(settings.mssFix, 0),
    interfaceName: defaultOptional(settings.interfaceName, "tun0"),
    processUser: defaultOptional(settings.processUser, "root"),
    verbosity: defaultOptional(settings.verbosity, 1),
    flags: defaultOptional(settings.flags, [], copyList),
  };
}

function validateConfFile(required: boolean, confFile: string): void {
  if (!required) {
    return;
  }
  if (confFile === "") {
    throw validationErrors.confFileMissing();
  }
  let exists: boolean;
  try {
    exists = fileExists(confFile);
  } catch (error) {
    throw validationErrors.confFileInaccessible(confFile, error instanceof Error ? error.message : String(error));
  }
  if (!exists) {
    throw validationErrors.confFileNotFound(confFile);
  }
  try {
    extractConnectionFromFile(confFile);
  } catch (error) {
    throw validationErrors.confFileUnparseable(confFile, error instanceof Error ? error.message : String(error));
  }
}

function validateBlob(field: "cert" | "key" | "encryptedKey", value: string, required: boolean): void {
  if (value === "") {
    if (required) {
      throw validationErrors.missingValue(field);
    }
    return;
  }
  if (!isValidBase64(value)) {
    throw validationErrors.base64Invalid(field);
  }
}

/**
 * Provider-dependent checks read their requirements from the provider rule
 * table. The first failing check is thrown.
 */
export function validateOpenvpn(settings: OpenvpnSettings, provider: string): void {
  const version = valueOr(settings.version, "");
  if (!OPENVPN_VERSIONS.some(candidate => candidate === version)) {
    throw validationErrors.openvpnVersionInvalid(version, OPENVPN_VERSIONS);
  }

  const user = valueOr(settings.user, "");
  if (isUserRequired(provider) && user === "") {
    throw validationErrors.userEmpty();
  }
  if (isPasswordRequired(provider, user) && valueOr(settings.password, "") === "") {
    throw validationErrors.passwordEmpty();
  }

  const rules = providerRules(provider);
  validateConfFile(rules.requiresConfFile, valueOr(settings.confFile, ""));
  validateBlob("cert", valueOr(settings.cert, ""), rules.requiresCert);
  validateBlob("key", valueOr(settings.key, ""), rules.requiresKey);

  const encryptedKey = valueOr(settings.encryptedKey, "");
  validateBlob("encryptedKey", encryptedKey, rules.requiresEncryptedKey);
  if (encryptedKey !== "" && valueOr(settings.keyPassphrase, "") === "") {
    throw validationErrors.keyPassphraseEmpty();
  }

  const mssFix = valueOr(settings.mssFix, 0);
  if (!Number.isInteger(mssFix) || mssFix < 0) {
    throw validationErrors.mssFixInvalid(mssFix);
  }
  if (mssFix > MAX_MSS_FIX) {
    throw validationErrors.mssFixTooHigh(mssFix, MAX_MSS_FIX);
  }

  const interfaceName = valueOr(settings.interfaceName, "");
  if (!INTERFACE_NAME_PATTERN.test(interfaceName)) {
    throw validationErrors.openvpnInterfaceInvalid(interfaceName);
  }

  const verbosity = valueOr(settings.verbosity, 0);
  if (verbosity < 0 || verbosity > MAX_VERBOSITY) {
    throw validationErrors.verbosityOutOfBounds(verbosity, MAX_VERBOSITY);
  }
}

function nonEmpty(field: Optional<string>): string | undefined {
  const value = toUndefined(field);
  return value === "" ? undefined : value;
}

export function openvpnToNode(settings: OpenvpnSettings): TreeNode {
  const children: TreeNode[] = [
    treeNode(`OpenVPN version: ${valueOr(settings.version, "not set")}`),
    treeNode(`User: ${secretState(toUndefined(settings.user))}`),
    treeNode(`Password: ${secretState(toUndefined(settings.password))}`),
  ];

  const confFile = nonEmpty(settings.confFile);
  if (confFile) {
    children.push(treeNode(`Custom configuration file: ${confFile}`));
  }

  const ciphers = valueOr(settings.ciphers, []);
  if (ciphers.length > 0) {
    children.push(treeNode(`Ciphers: ${ciphers.join(", ")}`));
  }

  const auth = nonEmpty(settings.auth);
  if (auth) {
    children.push(treeNode(`Auth: ${auth}`));
  }

  if (nonEmpty(settings.cert)) {
    children.push(treeNode("Client crt: set"));
  }
  if (nonEmpty(settings.key)) {
    children.push(treeNode("Client key: set"));
  }
  if (nonEmpty(settings.encryptedKey)) {
    children.push(treeNode(`Encrypted key: set (key passphrase ${secretState(toUndefined(settings.keyPassphrase))})`));
  }

  const preset = nonEmpty(settings.encryptionPreset);
  if (preset) {
    children.push(treeNode(`Private Internet Access encryption preset: ${preset}`));
  }

  const mssFix = valueOr(settings.mssFix, 0);
  if (mssFix > 0) {
    children.push(treeNode(`MSS Fix: ${mssFix}`));
  }

  children.push(treeNode(`Network interface: ${valueOr(settings.interfaceName, "not set")}`));
  children.push(treeNode(`Run OpenVPN as: ${valueOr(settings.processUser, "not set")}`));

  const verbosity = toUndefined(settings.verbosity);
  children.push(treeNode(`Verbosity level: ${verbosity === undefined ? "not set" : verbosity}`));

  const flags = valueOr(settings.flags, []);
  if (flags.length > 0) {
    children.push(treeNode(`Flags: ${flags.join(" ")}`));
  }

  return treeNode("OpenVPN settings:", children);
}

export function openvpnToLines(settings: OpenvpnSettings, style: Partial<LineStyle> = {}): string[] {
  return renderTitledTree(openvpnToNode(settings), style);
}

export function openvpnToString(settings: OpenvpnSettings): string {
  return openvpnToLines(settings).join("\n");
}
