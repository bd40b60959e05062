export { resolveSettings, type ResolveOptions, type ResolvedSettings } from "./resolve.js";
export {
  loadSettings,
  readSources,
  defaultSources,
  resolveSourcePaths,
  EnvSource,
  SecretsSource,
  WireguardFileSource,
  YamlFileSource,
  parseWireguardConf,
  parseYamlSettings,
  type LoadSettingsOptions,
  type SettingsSource,
  type SourcePaths,
} from "./sources/index.js";

export {
  absent,
  present,
  fromUndefined,
  isPresent,
  isAbsent,
  valueOr,
  toUndefined,
  type Optional,
} from "./settings/optional.js";
export {
  SettingsValidationError,
  SourceError,
  isValidationError,
  formatValidationMessage,
  type ValidationErrorCode,
  type ValidationErrorDetails,
} from "./settings/errors.js";
export {
  DEFAULT_LINE_STYLE,
  withLineStyleDefaults,
  renderTree,
  type LineStyle,
  type TreeNode,
} from "./settings/lines.js";
export {
  parseIpAddress,
  parseIpNetwork,
  parseIpNetworkList,
  parseEndpoint,
  formatIpNetwork,
  formatEndpoint,
  type IpAddress,
  type IpNetwork,
  type Endpoint,
} from "./settings/network.js";
export { PROVIDER_RULES, VPN_PROVIDERS, isVpnProvider, type VpnProvider } from "./settings/providers.js";

export {
  emptySettings,
  settingsFragment,
  settingsToLines,
  settingsToString,
  validateSettings,
  type Settings,
  type SettingsFragment,
} from "./settings/settings.js";
export { vpnFragment, validateVpn, VPN_TYPES, type VpnSettings, type VpnType } from "./settings/vpn.js";
export {
  emptyWireguardSettings,
  wireguardFragment,
  validateWireguard,
  wireguardToLines,
  wireguardToString,
  WIREGUARD_IMPLEMENTATIONS,
  type WireguardSettings,
} from "./settings/wireguard.js";
export {
  openvpnFragment,
  validateOpenvpn,
  openvpnToLines,
  openvpnToString,
  type OpenvpnSettings,
} from "./settings/openvpn.js";
export {
  controlServerFragment,
  validateControlServer,
  controlServerToLines,
  type ControlServerSettings,
} from "./settings/controlServer.js";
export {
  updaterFragment,
  updaterProviderFlags,
  validateUpdater,
  updaterToLines,
  type UpdaterSettings,
} from "./settings/updater.js";
