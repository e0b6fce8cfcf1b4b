import type net from "node:net";
import EventEmitter from "node:events";
import type { ConnectionEvents, TypeSafeEventEmitter } from "../events.ts";
import {
  bindTcpServer,
  TcpListener,
  type TcpListenerOptions,
} from "../tcp/TcpListener.ts";
import { ObfsHttpConnection } from "./ObfsHttpConnection.ts";

export type ObfsHttpListenerOptions = TcpListenerOptions & {
  connectionEvents?: TypeSafeEventEmitter<ConnectionEvents>;
};

/**
 * Server side of the HTTP disguise. Each accepted socket is wrapped as is;
 * the client's decoy request is read on the first read or write.
 */
export class ObfsHttpListener extends TcpListener {
  public connectionEvents: TypeSafeEventEmitter<ConnectionEvents> =
    new EventEmitter();

  constructor(server: net.Server, options: ObfsHttpListenerOptions = {}) {
    super(server, options);
    if (options.connectionEvents) {
      this.connectionEvents = options.connectionEvents;
    }
  }

  override async accept(): Promise<ObfsHttpConnection> {
    const socket = await this.acceptSocket();
    return this.wrap(socket);
  }

  protected override async wrap(
    socket: net.Socket,
  ): Promise<ObfsHttpConnection> {
    return new ObfsHttpConnection(socket, {
      isServer: true,
      events: this.connectionEvents,
    });
  }
}

export async function listenObfsHttp(
  addr: string,
  options?: ObfsHttpListenerOptions,
): Promise<ObfsHttpListener> {
  return new ObfsHttpListener(await bindTcpServer(addr), options);
}
