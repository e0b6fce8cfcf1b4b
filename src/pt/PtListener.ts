import type net from "node:net";
import type { Duplex } from "node:stream";
import {
  bindTcpServer,
  TcpListener,
  type TcpListenerOptions,
} from "../tcp/TcpListener.ts";
import type { ContextRegistry } from "./ContextRegistry.ts";
import { serverAccept } from "./server-accept.ts";

/**
 * Server side of a pluggable transport, bound to the context of one node address.
 *
 * A socket whose transport handshake fails is closed and that `accept()` rejects;
 * the listener keeps accepting.
 */
export class PtListener extends TcpListener {
  readonly registry: ContextRegistry;
  readonly addr: string;

  constructor(
    server: net.Server,
    registry: ContextRegistry,
    addr: string,
    options?: TcpListenerOptions,
  ) {
    super(server, options);
    this.registry = registry;
    this.addr = addr;
  }

  protected override async wrap(socket: net.Socket): Promise<Duplex> {
    try {
      return await serverAccept(this.registry, this.addr, socket);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      socket.destroy();
      this.events.emit("accept-error", {
        address: this.addr,
        socket,
        err: error,
      });
      throw error;
    }
  }
}

/**
 * `addr` is both the bind address and the registry key, it must match the
 * address the server node was initialized with.
 */
export async function listenPt(
  registry: ContextRegistry,
  addr: string,
  options?: TcpListenerOptions,
): Promise<PtListener> {
  return new PtListener(await bindTcpServer(addr), registry, addr, options);
}
