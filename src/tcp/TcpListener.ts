import net from "node:net";
import EventEmitter from "node:events";
import type { Duplex } from "node:stream";
import type { ListenerEvents, TypeSafeEventEmitter } from "../events.ts";
import { KEEP_ALIVE_INITIAL_DELAY } from "../shared/constants.ts";
import { splitHostPort } from "../shared/address.ts";
import type { Listener } from "../transport.ts";

export type TcpListenerOptions = {
  events?: TypeSafeEventEmitter<ListenerEvents>;
};

/**
 * Binds a TCP server to `addr` ("host:port" or ":port").
 */
export async function bindTcpServer(addr: string): Promise<net.Server> {
  const { host, port } = splitHostPort(addr);
  const server = net.createServer();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host || undefined, () => {
      server.off("error", reject);
      resolve();
    });
  });
  return server;
}

/**
 * Turns the push-style `connection` events of a `net.Server` into a pull-style `accept()`.
 *
 * Sockets that arrive while nobody is waiting are queued. Subclasses obfuscate
 * each socket by overriding `wrap`.
 */
export class TcpListener implements Listener {
  public events: TypeSafeEventEmitter<ListenerEvents> = new EventEmitter();
  protected readonly server: net.Server;

  // sockets nobody has accepted yet, each with the error listener that guards it meanwhile
  #queue: { socket: net.Socket; onError: (err: Error) => void }[] = [];
  #waiters: {
    resolve: (socket: net.Socket) => void;
    reject: (err: Error) => void;
  }[] = [];
  // once set, every pending and future accept() fails with it
  #error: Error | null = null;

  constructor(server: net.Server, { events }: TcpListenerOptions = {}) {
    this.server = server;
    if (events) this.events = events;

    this.server.on("connection", (socket) => {
      socket.setKeepAlive(true, KEEP_ALIVE_INITIAL_DELAY);
      socket.setTimeout(0);
      socket.setNoDelay(true);
      this.events.emit("connection-accepted", { socket });

      const waiter = this.#waiters.shift();
      if (waiter) {
        waiter.resolve(socket);
        return;
      }
      const onError = () => {
        this.#queue = this.#queue.filter((queued) => queued.socket !== socket);
        socket.destroy();
      };
      socket.once("error", onError);
      this.#queue.push({ socket, onError });
    });

    this.server.on("error", (err) => {
      this.#fail(err);
    });

    this.events.emit("listener-start", { address: this.address() });
  }

  address() {
    return this.server.address();
  }

  get closed() {
    return this.#error !== null;
  }

  async accept(): Promise<Duplex> {
    const socket = await this.acceptSocket();
    return this.wrap(socket);
  }

  protected async wrap(socket: net.Socket): Promise<Duplex> {
    return socket;
  }

  /**
   * Resolves the next raw socket, without wrapping it.
   */
  protected acceptSocket(): Promise<net.Socket> {
    for (let entry = this.#queue.shift(); entry; entry = this.#queue.shift()) {
      entry.socket.off("error", entry.onError);
      if (!entry.socket.destroyed) return Promise.resolve(entry.socket);
    }
    if (this.#error) return Promise.reject(this.#error);
    return new Promise((resolve, reject) => {
      this.#waiters.push({ resolve, reject });
    });
  }

  #fail(err: Error) {
    if (this.#error) return;
    this.#error = err;
    for (const waiter of this.#waiters) {
      waiter.reject(err);
    }
    this.#waiters = [];
  }

  /**
   * Stops listening. Sockets already returned by `accept()` are left open,
   * queued ones are destroyed.
   */
  async close(): Promise<void> {
    this.#fail(new Error("listener closed"));
    for (const { socket } of this.#queue) {
      socket.destroy();
    }
    this.#queue = [];
    if (this.server.listening) {
      this.server.close();
      this.events.emit("listener-close", undefined);
    }
  }
}

export async function listenTcp(
  addr: string,
  options?: TcpListenerOptions,
): Promise<TcpListener> {
  return new TcpListener(await bindTcpServer(addr), options);
}
