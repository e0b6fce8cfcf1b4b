/**
 * User-Agent sent with the default decoy request.
 */
export const DEFAULT_USER_AGENT = "Chrome/60.0.3112.90";

/**
 * The decoy request is a POST to this URL unless the client supplies its own request.
 */
export const DEFAULT_DECOY_URL = "http://www.baidu.com/";

/**
 * Canned response the server sends back to any well-formed request.
 */
export const OK_RESPONSE = Buffer.from(
  "HTTP/1.1 200 OK\r\nContent-Type: text/html; charset=utf-8\r\n\r\n",
  "latin1",
);

export const HEAD_TERMINATOR = Buffer.from("\r\n\r\n");

/**
 * A peer that keeps sending header bytes without ever terminating the head
 * is not speaking HTTP, give up once this many bytes have been buffered.
 */
export const MAX_HEAD_LENGTH = 64 * 1024;

/**
 * Largest request or response body the handshake reads and drops.
 */
export const MAX_BODY_LENGTH = MAX_HEAD_LENGTH;

export const DEFAULT_STATE_DIR = ".";
export const DEFAULT_DIAL_TIMEOUT = 5000;
export const KEEP_ALIVE_INITIAL_DELAY = 30000;
