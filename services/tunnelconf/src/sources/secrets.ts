import { readFile } from "node:fs/promises";
import path from "node:path";

import { appLogger } from "../observability/logger.js";
import { SourceError } from "../settings/errors.js";
import { parseIpNetworkList } from "../settings/network.js";
import { openvpnFragment } from "../settings/openvpn.js";
import { absent, present, type Optional } from "../settings/optional.js";
import { settingsFragment, type SettingsFragment } from "../settings/settings.js";
import { vpnFragment } from "../settings/vpn.js";
import { wireguardFragment } from "../settings/wireguard.js";
import { extractPemBody } from "./parse.js";
import type { SettingsSource } from "./types.js";

const logger = appLogger.child({ component: "secrets-source" });

export const DEFAULT_SECRETS_DIR = "/run/secrets";

export type SecretsSourceOptions = {
  directory?: string;
};

/** Reads a secret file; a missing file yields `undefined`. */
export async function readSecretFile(filePath: string): Promise<string | undefined> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw new SourceError("secrets", `reading file ${filePath}`, error);
  }
  return content.trimEnd();
}

export class SecretsSource implements SettingsSource {
  readonly name = "secrets";
  private readonly directory: string;

  constructor(options: SecretsSourceOptions = {}) {
    this.directory = options.directory ?? DEFAULT_SECRETS_DIR;
  }

  private async secret(fileName: string): Promise<Optional<string>> {
    const value = await readSecretFile(path.join(this.directory, fileName));
    if (value === undefined || value === "") {
      return absent();
    }
    logger.debug({ event: "settings.secret.read", file: fileName }, "secret file read");
    return present(value);
  }

  private async parsedSecret<T>(fileName: string, parse: (raw: string) => T): Promise<Optional<T>> {
    const value = await this.secret(fileName);
    if (value.kind === "absent") {
      return value;
    }
    try {
      return present(parse(value.value));
    } catch (error) {
      throw new SourceError("secrets", `secret file ${fileName}`, error);
    }
  }

  async read(): Promise<SettingsFragment> {
    const [user, password, cert, key, encryptedKey, keyPassphrase, privateKey, preSharedKey, publicKey, addresses] =
      await Promise.all([
        this.secret("openvpn_user"),
        this.secret("openvpn_password"),
        this.parsedSecret("openvpn_clientcrt", extractPemBody),
        this.parsedSecret("openvpn_clientkey", extractPemBody),
        this.parsedSecret("openvpn_encrypted_key", extractPemBody),
        this.secret("openvpn_key_passphrase"),
        this.secret("wireguard_private_key"),
        this.secret("wireguard_preshared_key"),
        this.secret("wireguard_public_key"),
        this.parsedSecret("wireguard_addresses", parseIpNetworkList),
      ]);

    return settingsFragment({
      vpn: vpnFragment({
        openvpn: openvpnFragment({ user, password, cert, key, encryptedKey, keyPassphrase }),
        wireguard: wireguardFragment({ privateKey, preSharedKey, publicKey, addresses }),
      }),
    });
  }
}
