import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../observability/logger.js", () => ({
  appLogger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      error: vi.fn(),
      warn: vi.fn(),
    }),
  },
}));

import { SourceError } from "../settings/errors.js";
import { formatIpNetwork } from "../settings/network.js";
import { absent, valueOr } from "../settings/optional.js";
import { readSecretFile, SecretsSource } from "./secrets.js";

describe("secrets source", () => {
  let directory: string;

  beforeEach(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "tunnelconf-secrets-"));
  });

  afterEach(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  function writeSecret(name: string, content: string): void {
    fs.writeFileSync(path.join(directory, name), content);
  }

  it("reads secret files and trims trailing whitespace", async () => {
    writeSecret("openvpn_user", "test-user\n");
    writeSecret("openvpn_password", "test-secret  \n");
    writeSecret("openvpn_clientcrt", "-----BEGIN CERTIFICATE-----\nAQEB\nAQEB\n-----END CERTIFICATE-----\n");
    writeSecret("wireguard_addresses", "10.64.0.2/32,fd00::2/128\n");

    const fragment = await new SecretsSource({ directory }).read();
    const openvpn = fragment.vpn.openvpn;
    expect(valueOr(openvpn.user, "")).toBe("test-user");
    expect(valueOr(openvpn.password, "")).toBe("test-secret");
    expect(valueOr(openvpn.cert, "")).toBe("AQEBAQEB");
    expect(openvpn.key).toEqual(absent());
    expect(valueOr(fragment.vpn.wireguard.addresses, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual([
      "10.64.0.2/32",
      "fd00::2/128",
    ]);
    expect(fragment.vpn.wireguard.privateKey).toEqual(absent());
  });

  it("treats a missing directory as no secrets", async () => {
    const fragment = await new SecretsSource({ directory: path.join(directory, "missing") }).read();
    expect(fragment.vpn.openvpn.user).toEqual(absent());
    expect(fragment.vpn.wireguard.addresses).toEqual(absent());
  });

  it("treats an empty file as unset", async () => {
    writeSecret("wireguard_private_key", "\n");
    const fragment = await new SecretsSource({ directory }).read();
    expect(fragment.vpn.wireguard.privateKey).toEqual(absent());
  });

  it("names the secret file holding a malformed value", async () => {
    writeSecret("wireguard_addresses", "bogus");
    await expect(new SecretsSource({ directory }).read()).rejects.toThrow(
      "secret file wireguard_addresses: invalid CIDR address: bogus",
    );
  });

  it("reports read failures other than a missing file", async () => {
    const secretPath = path.join(directory, "openvpn_user");
    fs.mkdirSync(secretPath);
    await expect(readSecretFile(secretPath)).rejects.toBeInstanceOf(SourceError);
    await expect(new SecretsSource({ directory }).read()).rejects.toThrow(
      `reading file ${secretPath}: EISDIR: illegal operation on a directory, read`,
    );
  });
});
