import { describe, expect, it } from "vitest";

import { isValidationError, SettingsValidationError, SourceError, validationErrors, withContext } from "./errors.js";

describe("validation errors", () => {
  it("reports list positions 1-based", () => {
    const error = validationErrors.allowedIPNil(0, 1);
    expect(error.message).toBe("allowed IP is nil: for allowed IP 1 of 1");
    expect(error.details.position).toEqual({ index: 1, total: 1 });
  });

  it("names the offending network for unsupported IPv6", () => {
    const error = validationErrors.allowedIPv6NotSupported("::/0", 1, 2);
    expect(error.message).toBe("allowed IPv6 address not supported: for allowed IP ::/0");
    expect(error.code).toBe("wireguard.allowed_ipv6_not_supported");
    expect(error.field).toBe("allowedIPs");
  });

  it("uses readable labels for OpenVPN blobs", () => {
    expect(validationErrors.missingValue("cert").message).toBe("client certificate: missing value");
    expect(validationErrors.base64Invalid("encryptedKey").message).toBe("encrypted key: value is not valid base64");
  });

  it("formats bounds", () => {
    expect(validationErrors.verbosityOutOfBounds(7, 6).message).toBe(
      "verbosity value is out of bounds: 7 can only be between 0 and 6",
    );
    expect(validationErrors.openvpnInterfaceInvalid("tun-0").message).toBe(
      "OpenVPN interface name is not valid: 'tun-0' does not match regex '^[a-zA-Z0-9_]+$'",
    );
  });

  it("discriminates by code", () => {
    const error: unknown = validationErrors.privateKeyMissing();
    expect(error).toBeInstanceOf(SettingsValidationError);
    expect(isValidationError(error)).toBe(true);
    expect(isValidationError(error, "wireguard.private_key_missing")).toBe(true);
    expect(isValidationError(error, "wireguard.public_key_missing")).toBe(false);
    expect(isValidationError(new Error("private key is missing"))).toBe(false);
  });
});

describe("source errors", () => {
  it("prefixes the cause message and keeps the cause", () => {
    const cause = new Error("invalid port: abc");
    const error = new SourceError("env", "environment variable WIREGUARD_ENDPOINT_PORT", cause);
    expect(error.message).toBe("environment variable WIREGUARD_ENDPOINT_PORT: invalid port: abc");
    expect(error.source).toBe("env");
    expect(error.cause).toBe(cause);
  });

  it("chains contexts", () => {
    const error = withContext("parsing peer section", withContext("parsing Endpoint: x", new Error("invalid endpoint: x")));
    expect(error.message).toBe("parsing peer section: parsing Endpoint: x: invalid endpoint: x");
  });
});
