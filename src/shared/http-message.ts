import { DEFAULT_DECOY_URL, DEFAULT_USER_AGENT } from "./constants.ts";
import { HandshakeError } from "./errors.ts";

/**
 * Header names are lower-cased, repeated headers are joined with ", ".
 */
export type HttpHeaders = Record<string, string>;

/**
 * The request a client sends to disguise the start of a connection.
 */
export type DecoyRequest = {
  method: string;
  // absolute URL, the host part ends up in the Host header
  url: string;
  headers?: Record<string, string>;
  body?: Buffer;
};

export type ParsedRequest = {
  method: string;
  target: string;
  version: string;
  headers: HttpHeaders;
};

export type ParsedResponse = {
  version: string;
  statusCode: number;
  statusText: string;
  // "<code> <text>", e.g. "404 Not Found"
  status: string;
  headers: HttpHeaders;
};

const TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
const REQUEST_LINE = /^(\S+) (\S+) (HTTP\/\d\.\d)$/;
const STATUS_LINE = /^(HTTP\/\d\.\d) (\d{3})(?: (.*))?$/;
const METHODS_WITH_BODY = new Set(["POST", "PUT", "PATCH"]);

export function createDecoyRequest(): DecoyRequest {
  return {
    method: "POST",
    url: DEFAULT_DECOY_URL,
    headers: { "User-Agent": DEFAULT_USER_AGENT },
  };
}

/**
 * Serializes a request the way an HTTP/1.1 client library would put it on the wire.
 * Host and Content-Length are always computed, caller-supplied values for them are ignored.
 */
export function encodeRequest(request: DecoyRequest): Buffer {
  if (!TOKEN.test(request.method)) {
    throw new Error(`Invalid HTTP method: ${request.method}`);
  }
  const url = new URL(request.url);
  const body = request.body ?? Buffer.alloc(0);

  const lines = [
    `${request.method} ${url.pathname}${url.search} HTTP/1.1`,
    `Host: ${url.host}`,
  ];
  for (const [name, value] of Object.entries(request.headers ?? {})) {
    const lowerName = name.toLowerCase();
    if (lowerName === "host" || lowerName === "content-length") continue;
    lines.push(`${name}: ${value}`);
  }
  if (body.length > 0 || METHODS_WITH_BODY.has(request.method)) {
    lines.push(`Content-Length: ${body.length}`);
  }

  const head = Buffer.from(`${lines.join("\r\n")}\r\n\r\n`, "latin1");
  return Buffer.concat([head, body]);
}

function parseHeaderLines(lines: string[]): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const line of lines) {
    const separator = line.indexOf(":");
    const name = separator === -1 ? "" : line.slice(0, separator);
    if (!TOKEN.test(name)) {
      throw new HandshakeError(
        `Malformed HTTP header line: ${JSON.stringify(line)}`,
      );
    }
    const key = name.toLowerCase();
    const value = line.slice(separator + 1).trim();
    const existing = headers[key];
    headers[key] = existing === undefined ? value : `${existing}, ${value}`;
  }
  return headers;
}

/**
 * Splits a head (without the terminating blank line) into its first line and header lines.
 */
function splitHead(head: Buffer): { firstLine: string; headerLines: string[] } {
  const [firstLine = "", ...headerLines] = head
    .toString("latin1")
    .split("\r\n");
  return { firstLine, headerLines };
}

export function parseRequestHead(head: Buffer): ParsedRequest {
  const { firstLine, headerLines } = splitHead(head);
  const match = REQUEST_LINE.exec(firstLine);
  if (!match || !match[1] || !match[2] || !match[3] || !TOKEN.test(match[1])) {
    throw new HandshakeError(
      `Malformed HTTP request line: ${JSON.stringify(firstLine)}`,
    );
  }
  return {
    method: match[1],
    target: match[2],
    version: match[3],
    headers: parseHeaderLines(headerLines),
  };
}

export function parseResponseHead(head: Buffer): ParsedResponse {
  const { firstLine, headerLines } = splitHead(head);
  const match = STATUS_LINE.exec(firstLine);
  if (!match || !match[1] || !match[2]) {
    throw new HandshakeError(
      `Malformed HTTP status line: ${JSON.stringify(firstLine)}`,
    );
  }
  const statusText = match[3] ?? "";
  return {
    version: match[1],
    statusCode: Number.parseInt(match[2], 10),
    statusText,
    status: statusText ? `${match[2]} ${statusText}` : match[2],
    headers: parseHeaderLines(headerLines),
  };
}

export function getContentLength(headers: HttpHeaders): number {
  const value = headers["content-length"];
  if (value === undefined) return 0;
  const length = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(length)) {
    throw new HandshakeError(`Invalid Content-Length: ${value}`);
  }
  return length;
}
