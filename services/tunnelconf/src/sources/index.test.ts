import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

const logMocks = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../observability/logger.js", () => ({
  appLogger: { child: () => logMocks },
  normalizeError: (error: unknown) => ({ message: error instanceof Error ? error.message : String(error) }),
}));

import { controlServerFragment } from "../settings/controlServer.js";
import { formatEndpoint, formatIpNetwork } from "../settings/network.js";
import { present, toUndefined, valueOr } from "../settings/optional.js";
import { emptySettings, settingsFragment } from "../settings/settings.js";
import { loadSettings, readSources, resolveSourcePaths, type SettingsSource } from "./index.js";

const SECRET_KEY = "AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE=";
const PUBLIC_KEY = "AgICAgICAgICAgICAgICAgICAgICAgICAgICAgICAgI=";
const FILE_KEY = "AwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwMDAwM=";

describe("loadSettings", () => {
  let directory: string;
  let secretsDir: string;
  let wireguardConfPath: string;
  let yamlPath: string;

  beforeAll(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), "tunnelconf-load-"));
    secretsDir = path.join(directory, "secrets");
    fs.mkdirSync(secretsDir);
    fs.writeFileSync(path.join(secretsDir, "wireguard_private_key"), `${SECRET_KEY}\n`);
    wireguardConfPath = path.join(directory, "wg0.conf");
    fs.writeFileSync(
      wireguardConfPath,
      [
        "[Interface]",
        `PrivateKey = ${FILE_KEY}`,
        "Address = 10.64.0.2/32",
        "",
        "[Peer]",
        `PublicKey = ${PUBLIC_KEY}`,
        "Endpoint = 1.2.3.4:51820",
        "",
      ].join("\n"),
    );
    yamlPath = path.join(directory, "settings.yaml");
    fs.writeFileSync(yamlPath, 'vpn:\n  provider: nordvpn\ncontrolServer:\n  address: ":9000"\n');
  });

  afterAll(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.clearAllMocks();
  });

  const env = { VPN_TYPE: "wireguard", VPN_SERVICE_PROVIDER: "mullvad", WIREGUARD_ENDPOINT_IP: "5.6.7.8" };

  it("combines every source by priority", async () => {
    const settings = await loadSettings({ env, secretsDir, wireguardConfPath, yamlPath });
    const wireguard = settings.vpn.wireguard;

    expect(valueOr(wireguard.privateKey, "")).toBe(SECRET_KEY);
    expect(valueOr(wireguard.publicKey, "")).toBe(PUBLIC_KEY);
    const endpoint = toUndefined(wireguard.endpoint);
    expect(endpoint && formatEndpoint(endpoint)).toBe("1.2.3.4:51820");
    expect(valueOr(wireguard.addresses, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual(["10.64.0.2/32"]);
    expect(valueOr(settings.vpn.provider, "")).toBe("mullvad");
    expect(valueOr(settings.controlServer.address, "")).toBe(":9000");
  });

  it("applies overrides last", async () => {
    const overrides = [settingsFragment({ controlServer: controlServerFragment({ address: present(":7000") }) })];
    const settings = await loadSettings({ env, secretsDir, wireguardConfPath, yamlPath, overrides });
    expect(valueOr(settings.controlServer.address, "")).toBe(":7000");
  });

  it("accepts explicit sources", async () => {
    const sources: SettingsSource[] = [
      { name: "fixed", read: async () => settingsFragment({ controlServer: controlServerFragment({ log: present(false) }) }) },
    ];
    await expect(loadSettings({}, sources)).rejects.toThrow("user is empty");
  });
});

describe("resolveSourcePaths", () => {
  it("prefers options over environment variables", () => {
    expect(
      resolveSourcePaths({
        env: { TUNNELCONF_CONFIG: "/env/settings.yaml", TUNNELCONF_SECRETS_DIR: "/env/secrets" },
        yamlPath: "/opt/settings.yaml",
      }),
    ).toEqual({
      yamlPath: "/opt/settings.yaml",
      secretsDir: "/env/secrets",
      wireguardConfPath: "/etc/wireguard/wg0.conf",
    });
  });

  it("ignores empty environment variables", () => {
    expect(resolveSourcePaths({ env: { TUNNELCONF_SECRETS_DIR: "", WIREGUARD_CONF_PATH: "/env/wg1.conf" } })).toEqual({
      yamlPath: path.join(process.cwd(), "config", "settings.yaml"),
      secretsDir: "/run/secrets",
      wireguardConfPath: "/env/wg1.conf",
    });
  });
});

describe("readSources", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("stops at the first failing source and logs it", async () => {
    const later = vi.fn(async () => emptySettings());
    const sources: SettingsSource[] = [
      { name: "broken", read: async () => Promise.reject(new Error("boom")) },
      { name: "later", read: later },
    ];

    await expect(readSources(sources)).rejects.toThrow("boom");
    expect(later).not.toHaveBeenCalled();
    expect(logMocks.error).toHaveBeenCalledWith(
      { event: "settings.source.failed", source: "broken", err: { message: "boom" } },
      "source failed",
    );
  });

  it("keeps source order", async () => {
    const first = settingsFragment({ controlServer: controlServerFragment({ address: present(":1") }) });
    const second = emptySettings();
    const fragments = await readSources([
      { name: "first", read: async () => first },
      { name: "second", read: async () => second },
    ]);
    expect(fragments).toEqual([first, second]);
    expect(fragments[0]).toBe(first);
  });
});
