import { beforeEach, describe, expect, it, vi } from "vitest";

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

import { SourceError } from "../settings/errors.js";
import { formatEndpoint, formatIpNetwork } from "../settings/network.js";
import { absent, toUndefined, valueOr } from "../settings/optional.js";
import { EnvSource, readEnvFragment } from "./env.js";

const PRIVATE_KEY = "AQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQEBAQE=";

describe("environment source", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("reads WireGuard settings", () => {
    const fragment = readEnvFragment({
      VPN_TYPE: "wireguard",
      VPN_SERVICE_PROVIDER: "Mullvad",
      WIREGUARD_PRIVATE_KEY: PRIVATE_KEY,
      WIREGUARD_ENDPOINT_IP: "1.2.3.4",
      WIREGUARD_ENDPOINT_PORT: "51820",
      WIREGUARD_ADDRESSES: "10.64.0.2/32",
      WIREGUARD_ALLOWED_IPS: "0.0.0.0/0, ::/0",
      WIREGUARD_IPV6: "on",
      WIREGUARD_FIREWALL_MARK: "100",
      WIREGUARD_IMPLEMENTATION: "userspace",
    });
    const wireguard = fragment.vpn.wireguard;

    expect(valueOr(fragment.vpn.type, "")).toBe("wireguard");
    expect(valueOr(fragment.vpn.provider, "")).toBe("mullvad");
    expect(valueOr(wireguard.privateKey, "")).toBe(PRIVATE_KEY);
    const endpoint = toUndefined(wireguard.endpoint);
    expect(endpoint && formatEndpoint(endpoint)).toBe("1.2.3.4:51820");
    expect(valueOr(wireguard.addresses, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual(["10.64.0.2/32"]);
    expect(valueOr(wireguard.allowedIPs, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual(["0.0.0.0/0", "::/0"]);
    expect(valueOr(wireguard.ipv6, false)).toBe(true);
    expect(valueOr(wireguard.firewallMark, 0)).toBe(100);
    expect(valueOr(wireguard.implementation, "")).toBe("userspace");
    expect(wireguard.rulePriority).toEqual(absent());
  });

  it("keeps an endpoint port without an address", () => {
    const endpoint = toUndefined(readEnvFragment({ WIREGUARD_ENDPOINT_PORT: "443" }).vpn.wireguard.endpoint);
    expect(endpoint).toEqual({ address: undefined, port: 443 });
  });

  it("treats empty variables as unset", () => {
    const fragment = readEnvFragment({ OPENVPN_USER: "", OPENVPN_PASSWORD: "   " });
    expect(fragment.vpn.openvpn.user).toEqual(absent());
    expect(fragment.vpn.openvpn.password).toEqual(absent());
  });

  it("falls back to deprecated variables and logs them", () => {
    const fragment = readEnvFragment({ WIREGUARD_ADDRESS: "10.64.0.2/32" });
    expect(valueOr(fragment.vpn.wireguard.addresses, []).map(n => (n ? formatIpNetwork(n) : ""))).toEqual([
      "10.64.0.2/32",
    ]);
    expect(logMocks.warn).toHaveBeenCalledWith(
      { event: "settings.env.deprecated_key", key: "WIREGUARD_ADDRESS", replacement: "WIREGUARD_ADDRESSES" },
      "deprecated environment variable, please use the replacement",
    );
  });

  it("prefers the current variable over deprecated ones", () => {
    const fragment = readEnvFragment({ VPN_INTERFACE: "tun1", OPENVPN_INTERFACE: "tun2" });
    expect(valueOr(fragment.vpn.openvpn.interfaceName, "")).toBe("tun1");
    expect(valueOr(fragment.vpn.wireguard.interfaceName, "")).toBe("tun1");
    expect(logMocks.warn).not.toHaveBeenCalled();
  });

  it("converts a bare control server port", () => {
    const fragment = readEnvFragment({ HTTP_CONTROL_SERVER_PORT: "9999", HTTP_CONTROL_SERVER_LOG: "no" });
    expect(valueOr(fragment.controlServer.address, "")).toBe(":9999");
    expect(valueOr(fragment.controlServer.log, true)).toBe(false);
  });

  it("reads OpenVPN lists and PEM blocks", () => {
    const fragment = readEnvFragment({
      OPENVPN_CIPHERS: "aes-256-gcm,aes-128-gcm",
      OPENVPN_FLAGS: "--tun-mtu 1400",
      OPENVPN_CERT: "-----BEGIN CERTIFICATE-----\nAQEB\nAQEB\n-----END CERTIFICATE-----",
      OPENVPN_VERBOSITY: "3",
    });
    const openvpn = fragment.vpn.openvpn;
    expect(valueOr(openvpn.ciphers, [])).toEqual(["aes-256-gcm", "aes-128-gcm"]);
    expect(valueOr(openvpn.flags, [])).toEqual(["--tun-mtu", "1400"]);
    expect(valueOr(openvpn.cert, "")).toBe("AQEBAQEB");
    expect(valueOr(openvpn.verbosity, 0)).toBe(3);
  });

  it("reads the updater settings", () => {
    const fragment = readEnvFragment({
      UPDATER_PERIOD: "24h",
      UPDATER_VPN_SERVICE_PROVIDERS: "mullvad, NordVPN",
    });
    const updater = fragment.updater;
    expect(valueOr(updater.period, 0)).toBe(86_400_000);
    expect(valueOr(updater.providers.mullvad, false)).toBe(true);
    expect(valueOr(updater.providers.nordvpn, false)).toBe(true);
    expect(valueOr(updater.providers.surfshark, true)).toBe(false);
  });

  it.each([
    ["WIREGUARD_ENDPOINT_PORT", "abc", "invalid port: abc"],
    ["WIREGUARD_ADDRESSES", "10.64.0.2", "invalid CIDR address: 10.64.0.2"],
    ["WIREGUARD_IPV6", "maybe", "invalid boolean: maybe"],
    ["OPENVPN_MSSFIX", "12.5", "invalid unsigned integer: 12.5"],
    ["OPENVPN_MSSFIX", "-5", "invalid unsigned integer: -5"],
    ["OPENVPN_MSSFIX", "70000", "value 70000 is over the maximum of 65535"],
    ["WIREGUARD_FIREWALL_MARK", "-1", "invalid unsigned integer: -1"],
    ["WIREGUARD_RULE_PRIORITY", "4294967296", "value 4294967296 is over the maximum of 4294967295"],
    ["OPENVPN_VERBOSITY", "loud", "invalid integer: loud"],
    ["UPDATER_PERIOD", "daily", "invalid duration: daily"],
    ["UPDATER_VPN_SERVICE_PROVIDERS", "acme", "provider is not updatable: acme"],
  ])("names %s when its value is malformed", (key, value, reason) => {
    let caught: unknown;
    try {
      readEnvFragment({ [key]: value });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(SourceError);
    expect(caught instanceof Error && caught.message).toBe(`environment variable ${key}: ${reason}`);
  });

  describe("EnvSource", () => {
    it("removes secrets from the environment when asked to", async () => {
      const env: Record<string, string | undefined> = { VPN_TYPE: "wireguard", WIREGUARD_PRIVATE_KEY: PRIVATE_KEY };
      const fragment = await new EnvSource({ env, unsetSecrets: true }).read();
      expect(valueOr(fragment.vpn.wireguard.privateKey, "")).toBe(PRIVATE_KEY);
      expect(env).toEqual({ VPN_TYPE: "wireguard" });
    });

    it("keeps an injected environment intact by default", async () => {
      const env: Record<string, string | undefined> = { WIREGUARD_PRIVATE_KEY: PRIVATE_KEY };
      await new EnvSource({ env }).read();
      expect(env).toEqual({ WIREGUARD_PRIVATE_KEY: PRIVATE_KEY });
    });
  });
});
