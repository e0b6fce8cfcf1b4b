import type { ObfsNode } from "../pt/types.ts";

/**
 * Parses a node string such as `obfs4+tcp://:443/?cert=abc&iat-mode=0`.
 *
 * A scheme without "+" names both the protocol and the transport
 * (`ohttp://host:80`), a string without a scheme is taken as `ohttp+tcp`.
 */
export function parseNode(value: string): ObfsNode {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error("Empty node string");
  }

  const schemeEnd = trimmed.indexOf("://");
  const scheme = schemeEnd === -1 ? "ohttp+tcp" : trimmed.slice(0, schemeEnd);
  const rest = schemeEnd === -1 ? trimmed : trimmed.slice(schemeEnd + 3);

  const [protocol = "", transport = protocol, ...extra] = scheme.split("+");
  if (!protocol || extra.length > 0) {
    throw new Error(`Invalid node scheme: ${scheme}`);
  }

  const queryStart = rest.indexOf("?");
  const location = queryStart === -1 ? rest : rest.slice(0, queryStart);
  const query = queryStart === -1 ? "" : rest.slice(queryStart + 1);
  const pathStart = location.indexOf("/");
  const addr = pathStart === -1 ? location : location.slice(0, pathStart);

  return {
    addr,
    protocol: protocol.toLowerCase(),
    transport: transport.toLowerCase(),
    values: new URLSearchParams(query),
  };
}
