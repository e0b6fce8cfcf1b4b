import EventEmitter from "node:events";
import type net from "node:net";
import type { Duplex } from "node:stream";
import type { RelayEvents, TypeSafeEventEmitter } from "./events.ts";
import { relay } from "./shared/relay.ts";
import { listenTcp, type TcpListener } from "./tcp/TcpListener.ts";
import type { Transporter } from "./transport.ts";

/**
 * Accepts plain local connections and relays each one to an obfuscation server.
 */
export class ObfsClient {
  public connections = new Set<Duplex>();
  public events: TypeSafeEventEmitter<RelayEvents> = new EventEmitter();
  readonly transporter: Transporter;
  readonly serverAddr: string;
  readonly listenAddr: string;

  #listener: TcpListener | null = null;
  #acceptLoop: Promise<void> | null = null;

  constructor({
    transporter,
    serverAddr,
    listenAddr = "127.0.0.1:0",
  }: {
    transporter: Transporter;
    serverAddr: string;
    listenAddr?: string;
  }) {
    this.transporter = transporter;
    this.serverAddr = serverAddr;
    this.listenAddr = listenAddr;
  }

  address() {
    return this.#listener?.address() ?? null;
  }

  async start() {
    if (this.#listener) {
      throw new Error("Obfs client is already running");
    }
    const listener = await listenTcp(this.listenAddr);
    this.#listener = listener;
    this.events.emit("relay-start", { address: listener.address() });
    this.#acceptLoop = this.#runAcceptLoop(listener);
  }

  async #runAcceptLoop(listener: TcpListener) {
    for (;;) {
      let localSocket: Duplex;
      try {
        localSocket = await listener.accept();
      } catch (err) {
        if (listener.closed) break;
        const error = err instanceof Error ? err : new Error(String(err));
        this.events.emit("connection-error", { target: null, err: error });
        continue;
      }
      this.#handleConnection(localSocket);
    }
    this.events.emit("relay-end", undefined);
  }

  #handleConnection(localSocket: Duplex) {
    this.connections.add(localSocket);
    localSocket.on("close", () => {
      this.connections.delete(localSocket);
    });
    const onEarlyError = (err: Error) => {
      this.events.emit("connection-error", { target: this.serverAddr, err });
    };
    localSocket.on("error", onEarlyError);

    this.#connectToServer().then(
      (conn) => {
        localSocket.off("error", onEarlyError);
        if (localSocket.destroyed) {
          conn.destroy();
          return;
        }
        this.events.emit("connection-opened", { target: this.serverAddr });
        relay(conn, localSocket, this.events, this.serverAddr);
      },
      (err: Error) => {
        this.events.emit("connection-error", { target: this.serverAddr, err });
        localSocket.destroy();
      },
    );
  }

  async #connectToServer(): Promise<Duplex> {
    const raw: net.Socket = await this.transporter.dial(this.serverAddr);
    try {
      return await this.transporter.handshake(raw, { addr: this.serverAddr });
    } catch (err) {
      raw.destroy();
      throw err;
    }
  }

  async stop() {
    const listener = this.#listener;
    if (!listener) return;
    await listener.close();
    await this.#acceptLoop;
    for (const conn of this.connections) {
      conn.destroy();
    }
    this.connections.clear();
    this.#listener = null;
  }
}
