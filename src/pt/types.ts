import type { Duplex } from "node:stream";

export type ObfsRole = "client" | "server";

/**
 * A configured proxy node. `values` holds the node's key/value options
 * (transport arguments, `state-dir`, ...).
 */
export type ObfsNode = {
  addr: string;
  protocol: string;
  transport: string;
  values: URLSearchParams;
};

/**
 * The dial hook a pluggable transport calls to open the underlying connection.
 */
export type DialFunction = (network: string, address: string) => Promise<Duplex>;

/**
 * Client side of a pluggable transport.
 * `parseArgs` validates the node options once, the result is handed back to every `dial`.
 */
export interface ClientFactory<TArgs = unknown> {
  parseArgs(args: URLSearchParams): TArgs | Promise<TArgs>;
  dial(
    network: string,
    address: string,
    dialFn: DialFunction,
    args: TArgs,
  ): Promise<Duplex>;
}

/**
 * Server side of a pluggable transport.
 */
export interface ServerFactory {
  /**
   * Public arguments clients need to connect (e.g. a certificate), advertised in the endpoint URL.
   */
  args(): URLSearchParams;
  /**
   * Runs the transport's server handshake on an accepted connection and
   * returns the connection carrying the unwrapped application bytes.
   */
  wrapConn(conn: Duplex): Promise<Duplex>;
}

export interface PluggableTransport {
  readonly name: string;
  clientFactory(stateDir: string): ClientFactory | Promise<ClientFactory>;
  serverFactory(
    stateDir: string,
    args: URLSearchParams,
  ): ServerFactory | Promise<ServerFactory>;
}

export type ClientContext = {
  role: "client";
  clientFactory: ClientFactory;
  clientArgs: unknown;
};

export type ServerContext = {
  role: "server";
  serverFactory: ServerFactory;
  serverArgs: URLSearchParams;
};

export type ObfsContext = ClientContext | ServerContext;
