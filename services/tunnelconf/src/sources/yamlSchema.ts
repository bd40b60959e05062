import { z } from "zod";

import { UPDATABLE_PROVIDERS } from "../settings/updater.js";
import { MAX_UINT32 } from "../settings/wireguard.js";

// ============================================================================
// WireGuard
// ============================================================================

export const WireguardDocumentSchema = z
  .object({
    interfaceName: z.string(),
    privateKey: z.string(),
    publicKey: z.string(),
    preSharedKey: z.string(),
    /** `ip:port` */
    endpoint: z.string(),
    allowedIPs: z.array(z.string()),
    addresses: z.array(z.string()),
    ipv6: z.boolean(),
    firewallMark: z.number().int().nonnegative().max(MAX_UINT32),
    rulePriority: z.number().int().nonnegative().max(MAX_UINT32),
    implementation: z.string(),
  })
  .partial()
  .strict();
export type WireguardDocument = z.infer<typeof WireguardDocumentSchema>;

// ============================================================================
// OpenVPN
// ============================================================================

export const OpenvpnDocumentSchema = z
  .object({
    version: z.string(),
    user: z.string(),
    password: z.string(),
    confFile: z.string(),
    ciphers: z.array(z.string()),
    auth: z.string(),
    cert: z.string(),
    key: z.string(),
    encryptedKey: z.string(),
    keyPassphrase: z.string(),
    encryptionPreset: z.string(),
    mssFix: z.number().int().nonnegative().max(0xffff),
    interfaceName: z.string(),
    processUser: z.string(),
    verbosity: z.number().int(),
    flags: z.array(z.string()),
  })
  .partial()
  .strict();
export type OpenvpnDocument = z.infer<typeof OpenvpnDocumentSchema>;

// ============================================================================
// Root document
// ============================================================================

export const VpnDocumentSchema = z
  .object({
    type: z.string(),
    provider: z.string(),
    wireguard: WireguardDocumentSchema,
    openvpn: OpenvpnDocumentSchema,
  })
  .partial()
  .strict();

export const ControlServerDocumentSchema = z
  .object({
    address: z.string(),
    log: z.boolean(),
  })
  .partial()
  .strict();

export const UpdaterDocumentSchema = z
  .object({
    /** Duration such as `24h`; `0` disables. */
    period: z.union([z.string(), z.literal(0)]),
    dnsAddress: z.string(),
    /** Providers to update; those not listed are disabled. */
    providers: z.array(z.enum(UPDATABLE_PROVIDERS)),
  })
  .partial()
  .strict();

export const SettingsDocumentSchema = z
  .object({
    vpn: VpnDocumentSchema,
    controlServer: ControlServerDocumentSchema,
    updater: UpdaterDocumentSchema,
  })
  .partial()
  .strict();
export type SettingsDocument = z.infer<typeof SettingsDocumentSchema>;
