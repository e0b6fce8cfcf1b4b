import net from "node:net";
import type { Duplex } from "node:stream";
import {
  DEFAULT_DIAL_TIMEOUT,
  KEEP_ALIVE_INITIAL_DELAY,
} from "../shared/constants.ts";
import { splitHostPort } from "../shared/address.ts";
import type {
  DialOptions,
  HandshakeOptions,
  StreamEndpoint,
  Transporter,
} from "../transport.ts";

/**
 * Opens a TCP connection, resolving once it is established.
 */
export async function dialTcp(
  addr: string,
  { timeout = DEFAULT_DIAL_TIMEOUT }: DialOptions = {},
): Promise<net.Socket> {
  const { host, port } = splitHostPort(addr);

  return new Promise((resolve, reject) => {
    const socket = net.createConnection({
      host: host || "localhost",
      port,
      noDelay: true,
      keepAlive: true,
      keepAliveInitialDelay: KEEP_ALIVE_INITIAL_DELAY,
    });

    const timer = setTimeout(() => {
      socket.destroy(new Error(`dial ${addr}: timeout`));
    }, timeout);

    const onError = (err: Error) => {
      clearTimeout(timer);
      reject(err);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

/**
 * Plain TCP, no obfuscation. The disguise transporters extend it and only
 * replace `handshake`.
 */
export class TcpTransporter implements Transporter {
  dial(addr: string, options?: DialOptions): Promise<net.Socket> {
    return dialTcp(addr, options);
  }

  async handshake(
    conn: StreamEndpoint,
    _options?: HandshakeOptions,
  ): Promise<Duplex> {
    return conn;
  }
}
