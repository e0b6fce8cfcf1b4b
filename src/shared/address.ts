/**
 * Splits "host:port", "[v6]:port" or ":port" into its parts.
 * An empty host means every local interface.
 */
export function splitHostPort(addr: string): { host: string; port: number } {
  const separator = addr.lastIndexOf(":");
  if (separator === -1) {
    throw new Error(`Missing port in address ${addr}`);
  }
  let host = addr.slice(0, separator);
  const portString = addr.slice(separator + 1);

  if (host.startsWith("[")) {
    if (!host.endsWith("]")) {
      throw new Error(`Invalid IPv6 address in ${addr}`);
    }
    host = host.slice(1, -1);
  } else if (host.includes(":")) {
    throw new Error(`Too many colons in address ${addr}`);
  }

  const port = Number(portString);
  if (!/^\d+$/.test(portString) || port > 65535) {
    throw new Error(`Invalid port in address ${addr}`);
  }
  return { host, port };
}
