export const VPN_PROVIDERS = [
  "airvpn",
  "custom",
  "cyberghost",
  "ivpn",
  "mullvad",
  "nordvpn",
  "private internet access",
  "privado",
  "protonvpn",
  "purevpn",
  "surfshark",
  "torguard",
  "vpn secure",
  "vpn unlimited",
  "vyprvpn",
  "wevpn",
  "windscribe",
] as const;

export type VpnProvider = (typeof VPN_PROVIDERS)[number];

export type ProviderRules = {
  /** Whether OpenVPN user/password authentication is expected at all. */
  credentials: "required" | "exempt";
  /** Waives the password for usernames that are account identifiers on their own. */
  passwordExemption?: (user: string) => boolean;
  requiresCert: boolean;
  requiresKey: boolean;
  requiresEncryptedKey: boolean;
  requiresConfFile: boolean;
  defaultPassword: string;
  defaultEncryptionPreset: string;
};

const IVPN_ACCOUNT_ID = /^(i|ivpn)-[a-zA-Z0-9]{4}-[a-zA-Z0-9]{4}-[a-zA-Z0-9]{4}$/;

const BASE_RULES: ProviderRules = {
  credentials: "required",
  requiresCert: false,
  requiresKey: false,
  requiresEncryptedKey: false,
  requiresConfFile: false,
  defaultPassword: "",
  defaultEncryptionPreset: "",
};

export const PROVIDER_RULES: Readonly<Record<VpnProvider, Readonly<ProviderRules>>> = {
  airvpn: { ...BASE_RULES, credentials: "exempt", requiresCert: true, requiresKey: true },
  custom: { ...BASE_RULES, credentials: "exempt", requiresConfFile: true },
  cyberghost: { ...BASE_RULES, requiresCert: true, requiresKey: true },
  ivpn: { ...BASE_RULES, passwordExemption: user => IVPN_ACCOUNT_ID.test(user) },
  mullvad: { ...BASE_RULES, defaultPassword: "m" },
  nordvpn: BASE_RULES,
  "private internet access": { ...BASE_RULES, defaultEncryptionPreset: "strong" },
  privado: BASE_RULES,
  protonvpn: BASE_RULES,
  purevpn: BASE_RULES,
  surfshark: BASE_RULES,
  torguard: BASE_RULES,
  "vpn secure": { ...BASE_RULES, credentials: "exempt", requiresCert: true, requiresEncryptedKey: true },
  "vpn unlimited": { ...BASE_RULES, requiresCert: true, requiresKey: true },
  vyprvpn: BASE_RULES,
  wevpn: { ...BASE_RULES, requiresKey: true },
  windscribe: BASE_RULES,
};

export function isVpnProvider(value: string): value is VpnProvider {
  return VPN_PROVIDERS.some(candidate => candidate === value);
}

/** Unknown providers get the base rules; provider validity is checked at the VPN level. */
export function providerRules(provider: string): Readonly<ProviderRules> {
  return isVpnProvider(provider) ? PROVIDER_RULES[provider] : BASE_RULES;
}

export function isUserRequired(provider: string): boolean {
  return providerRules(provider).credentials === "required";
}

export function isPasswordRequired(provider: string, user: string): boolean {
  const rules = providerRules(provider);
  if (rules.credentials !== "required") {
    return false;
  }
  return !(rules.passwordExemption?.(user) ?? false);
}
