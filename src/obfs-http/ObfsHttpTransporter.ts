import EventEmitter from "node:events";
import type { ConnectionEvents, TypeSafeEventEmitter } from "../events.ts";
import type { DecoyRequest } from "../shared/http-message.ts";
import { TcpTransporter } from "../tcp/TcpTransporter.ts";
import type { HandshakeOptions, StreamEndpoint } from "../transport.ts";
import { ObfsHttpConnection } from "./ObfsHttpConnection.ts";

/**
 * Client side of the HTTP disguise. The handshake itself is deferred to the
 * first read or write on the returned connection.
 */
export class ObfsHttpTransporter extends TcpTransporter {
  public events: TypeSafeEventEmitter<ConnectionEvents> = new EventEmitter();
  readonly #request: DecoyRequest | undefined;

  constructor({
    request,
    events,
  }: {
    request?: DecoyRequest;
    events?: TypeSafeEventEmitter<ConnectionEvents>;
  } = {}) {
    super();
    this.#request = request;
    if (events) this.events = events;
  }

  override async handshake(
    conn: StreamEndpoint,
    _options?: HandshakeOptions,
  ): Promise<ObfsHttpConnection> {
    return new ObfsHttpConnection(conn, {
      request: this.#request,
      events: this.events,
    });
  }
}
