const WIREGUARD_KEY_LENGTH = 32;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Standard padded base64. Line breaks are ignored, as in PEM bodies. */
export function isValidBase64(value: string): boolean {
  const compact = value.replace(/[\r\n]/g, "");
  return BASE64_PATTERN.test(compact);
}

/**
 * Decodes a WireGuard key: standard base64 of exactly 32 bytes.
 * Throws with a message that never contains the key itself.
 */
export function parseWireguardKey(value: string): Buffer {
  if (!BASE64_PATTERN.test(value)) {
    throw new Error("failed to parse base64-encoded key: illegal base64 data");
  }
  const decoded = Buffer.from(value, "base64");
  if (decoded.length !== WIREGUARD_KEY_LENGTH) {
    throw new Error(
      `incorrect key size: ${decoded.length} bytes instead of ${WIREGUARD_KEY_LENGTH} bytes`,
    );
  }
  return decoded;
}

export function isValidWireguardKey(value: string): boolean {
  try {
    parseWireguardKey(value);
    return true;
  } catch {
    return false;
  }
}
