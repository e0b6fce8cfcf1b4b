import type net from "node:net";
import type { Duplex } from "node:stream";

/**
 * A bidirectional byte stream, a `net.Socket` outside of tests.
 */
export type StreamEndpoint = Duplex &
  Partial<
    Pick<net.Socket, "remoteAddress" | "remotePort" | "localAddress" | "localPort">
  >;

export type DialOptions = {
  // milliseconds to wait for the TCP connection to be established
  timeout?: number;
};

export type HandshakeOptions = {
  // address of the node being connected to, used to look up its obfuscation context
  addr?: string;
};

/**
 * Outbound side: opens a raw connection and turns it into an obfuscated one.
 */
export interface Transporter {
  dial(addr: string, options?: DialOptions): Promise<net.Socket>;
  handshake(conn: StreamEndpoint, options?: HandshakeOptions): Promise<Duplex>;
}

/**
 * Inbound side: yields obfuscated connections, one per accepted socket.
 */
export interface Listener {
  accept(): Promise<Duplex>;
  address(): net.AddressInfo | string | null;
  // true once accept() can no longer succeed
  readonly closed: boolean;
  close(): Promise<void>;
}
