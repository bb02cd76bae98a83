/**
 * Device connection strings: "HostName=<host>;DeviceId=<id>;SharedAccessKey=<key>[;Protocol=ws|wss]"
 */

export interface ConnectionInfo {
  hostName: string;
  deviceId: string;
  sharedAccessKey: string;
  protocol: "ws" | "wss";
}

export class ConnectionStringError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionStringError";
  }
}

export function parseConnectionString(value: string): ConnectionInfo {
  const fields = new Map<string, string>();
  for (const part of value.split(";")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      throw new ConnectionStringError(`Malformed connection string segment '${trimmed.slice(0, 32)}'`);
    }
    fields.set(trimmed.slice(0, eq).toLowerCase(), trimmed.slice(eq + 1));
  }

  const required = (key: string, label: string): string => {
    const found = fields.get(key.toLowerCase())?.trim();
    if (!found) {
      throw new ConnectionStringError(`Connection string is missing ${label}`);
    }
    return found;
  };

  const protocol = fields.get("protocol")?.trim().toLowerCase() ?? "wss";
  if (protocol !== "ws" && protocol !== "wss") {
    throw new ConnectionStringError(`Unsupported protocol '${protocol}'`);
  }

  return {
    hostName: required("HostName", "HostName"),
    deviceId: required("DeviceId", "DeviceId"),
    sharedAccessKey: required("SharedAccessKey", "SharedAccessKey"),
    protocol,
  };
}

export function deviceUrl(info: ConnectionInfo): string {
  return `${info.protocol}://${info.hostName}/devices/${encodeURIComponent(info.deviceId)}`;
}
