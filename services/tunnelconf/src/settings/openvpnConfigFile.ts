import fs from "node:fs";

export type OpenvpnConnection = {
  host: string;
  port: number;
  protocol: "udp" | "tcp";
};

const DEFAULT_OPENVPN_PORT = 1194;

function normalizeProtocol(raw: string): "udp" | "tcp" {
  const lowered = raw.toLowerCase();
  if (lowered === "udp" || lowered === "udp4" || lowered === "udp6") {
    return "udp";
  }
  if (lowered === "tcp" || lowered === "tcp4" || lowered === "tcp6" || lowered === "tcp-client") {
    return "tcp";
  }
  throw new Error(`network protocol not supported: ${raw}`);
}

function significantLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith("#") && !line.startsWith(";"));
}

/**
 * Extracts the first `remote` of an OpenVPN configuration. A `proto`
 * directive applies when the remote line does not carry its own protocol.
 */
export function extractConnection(content: string): OpenvpnConnection {
  let remote: string[] | undefined;
  let protocol: "udp" | "tcp" = "udp";

  for (const line of significantLines(content)) {
    const fields = line.split(/\s+/);
    const directive = fields[0];
    if (directive === "proto") {
      if (fields.length !== 2) {
        throw new Error(`proto line is not valid: ${line}`);
      }
      protocol = normalizeProtocol(fields[1]);
    } else if (directive === "remote" && remote === undefined) {
      if (fields.length < 2 || fields.length > 4) {
        throw new Error(`remote line is not valid: ${line}`);
      }
      remote = fields;
    }
  }

  if (!remote) {
    throw new Error("remote line not found");
  }

  const [, host, portText, remoteProtocol] = remote;
  let port = DEFAULT_OPENVPN_PORT;
  if (portText !== undefined) {
    port = Number.parseInt(portText, 10);
    if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
      throw new Error(`port is not valid: ${portText}`);
    }
  }

  return {
    host,
    port,
    protocol: remoteProtocol !== undefined ? normalizeProtocol(remoteProtocol) : protocol,
  };
}

export function fileExists(path: string): boolean {
  try {
    return fs.statSync(path).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

export function extractConnectionFromFile(path: string): OpenvpnConnection {
  return extractConnection(fs.readFileSync(path, "utf-8"));
}
