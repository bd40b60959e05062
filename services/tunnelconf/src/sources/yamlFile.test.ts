import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { SourceError } from "../settings/errors.js";
import { formatEndpoint, formatIpNetwork } from "../settings/network.js";
import { absent, toUndefined, valueOr } from "../settings/optional.js";
import { emptySettings } from "../settings/settings.js";
import { parseYamlSettings, YamlFileSource } from "./yamlFile.js";

const DOCUMENT = `
vpn:
  type: wireguard
  provider: Mullvad
  wireguard:
    endpoint: 1.2.3.4:51820
    addresses:
      - 10.64.0.2/32
    ipv6: true
    firewallMark: 0
  openvpn:
    ciphers: [aes-256-gcm]
controlServer:
  address: ":9000"
updater:
  period: 12h
  providers: [mullvad]
`;

function parseError(content: string): string {
  try {
    parseYamlSettings(content, "settings.yaml");
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
  return "no error";
}

describe("YAML settings file", () => {
  it("maps the document onto a fragment", () => {
    const fragment = parseYamlSettings(DOCUMENT, "settings.yaml");
    const wireguard = fragment.vpn.wireguard;
    expect(valueOr(fragment.vpn.type, "")).toBe("wireguard");
    expect(valueOr(fragment.vpn.provider, "")).toBe("mullvad");
    const endpoint = toUndefined(wireguard.endpoint);
    expect(endpoint && formatEndpoint(endpoint)).toBe("1.2.3.4:51820");
    expect(valueOr(wireguard.addresses, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual(["10.64.0.2/32"]);
    expect(valueOr(wireguard.ipv6, false)).toBe(true);
    expect(valueOr(wireguard.firewallMark, -1)).toBe(0);
    expect(wireguard.privateKey).toEqual(absent());
    expect(valueOr(fragment.vpn.openvpn.ciphers, [])).toEqual(["aes-256-gcm"]);
    expect(valueOr(fragment.controlServer.address, "")).toBe(":9000");
    expect(valueOr(fragment.updater.period, 0)).toBe(43_200_000);
    expect(valueOr(fragment.updater.providers.mullvad, false)).toBe(true);
    expect(valueOr(fragment.updater.providers.nordvpn, true)).toBe(false);
  });

  it("treats an empty document as no settings", () => {
    expect(parseYamlSettings("", "settings.yaml")).toEqual(emptySettings());
  });

  it("accepts a zero updater period", () => {
    const fragment = parseYamlSettings("updater:\n  period: 0\n", "settings.yaml");
    expect(valueOr(fragment.updater.period, -1)).toBe(0);
  });

  it("reports the first schema violation with its path", () => {
    expect(parseError("vpn:\n  wireguard:\n    firewallMark: high\n")).toBe(
      "parsing settings.yaml: vpn.wireguard.firewallMark: Expected number, received string",
    );
  });

  it("refuses negative firewall marks", () => {
    expect(parseError("vpn:\n  wireguard:\n    firewallMark: -1\n")).toBe(
      "parsing settings.yaml: vpn.wireguard.firewallMark: Number must be greater than or equal to 0",
    );
  });

  it("refuses unknown keys", () => {
    expect(parseError("vpn:\n  bogus: 1\n")).toBe("parsing settings.yaml: vpn: Unrecognized key(s) in object: 'bogus'");
  });

  it("refuses unknown updatable providers", () => {
    expect(parseError("updater:\n  providers: [acme]\n").startsWith("parsing settings.yaml: updater.providers.0: ")).toBe(
      true,
    );
  });

  it("names the field holding a malformed value", () => {
    expect(parseError("vpn:\n  wireguard:\n    endpoint: 1.2.3.4\n")).toBe(
      "parsing settings.yaml: vpn.wireguard.endpoint: invalid endpoint: 1.2.3.4",
    );
    expect(parseError("updater:\n  period: daily\n")).toBe(
      "parsing settings.yaml: updater.period: invalid duration: daily",
    );
  });

  it("wraps YAML syntax errors", () => {
    let caught: unknown;
    try {
      parseYamlSettings("vpn: [", "settings.yaml");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SourceError);
  });

  describe("YamlFileSource", () => {
    let directory: string;

    beforeAll(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), "tunnelconf-yaml-"));
      fs.writeFileSync(path.join(directory, "settings.yaml"), DOCUMENT);
    });

    afterAll(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    it("reads the file", async () => {
      const fragment = await new YamlFileSource({ path: path.join(directory, "settings.yaml") }).read();
      expect(valueOr(fragment.vpn.type, "")).toBe("wireguard");
    });

    it("names the file it failed to read", async () => {
      const source = new YamlFileSource({ path: directory });
      await expect(source.read()).rejects.toBeInstanceOf(SourceError);
      await expect(source.read()).rejects.toThrow(
        `reading file ${directory}: EISDIR: illegal operation on a directory, read`,
      );
    });

    it("returns an empty fragment for a missing file", async () => {
      const fragment = await new YamlFileSource({ path: path.join(directory, "missing.yaml") }).read();
      expect(fragment).toEqual(emptySettings());
    });
  });
});
