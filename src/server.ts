import EventEmitter from "node:events";
import type { Duplex } from "node:stream";
import type { RelayEvents, TypeSafeEventEmitter } from "./events.ts";
import { relay } from "./shared/relay.ts";
import { dialTcp } from "./tcp/TcpTransporter.ts";
import type { Listener } from "./transport.ts";

/**
 * Accepts obfuscated connections and relays each one to a plain TCP target.
 */
export class ObfsServer {
  public connections = new Set<Duplex>();
  public events: TypeSafeEventEmitter<RelayEvents> = new EventEmitter();
  readonly listener: Listener;
  // "host:port" every accepted connection is relayed to
  readonly target: string;

  #isRunning = false;
  #acceptLoop: Promise<void> | null = null;

  constructor({ listener, target }: { listener: Listener; target: string }) {
    this.listener = listener;
    this.target = target;
  }

  get isRunning() {
    return this.#isRunning;
  }

  start() {
    if (this.#isRunning) {
      throw new Error("Obfs server is already running");
    }
    this.#isRunning = true;
    this.events.emit("relay-start", { address: this.listener.address() });
    this.#acceptLoop = this.#runAcceptLoop();
  }

  async #runAcceptLoop() {
    while (this.#isRunning) {
      let conn: Duplex;
      try {
        conn = await this.listener.accept();
      } catch (err) {
        // a closed listener ends the loop, any other failure only concerns one connection
        if (this.listener.closed) break;
        const error = err instanceof Error ? err : new Error(String(err));
        this.events.emit("connection-error", { target: null, err: error });
        continue;
      }
      this.#handleConnection(conn);
    }
    this.#isRunning = false;
    this.events.emit("relay-end", undefined);
  }

  #handleConnection(conn: Duplex) {
    this.connections.add(conn);
    conn.on("close", () => {
      this.connections.delete(conn);
    });
    // errors before the target socket exists
    const onEarlyError = (err: Error) => {
      this.events.emit("connection-error", { target: this.target, err });
    };
    conn.on("error", onEarlyError);

    dialTcp(this.target).then(
      (targetSocket) => {
        conn.off("error", onEarlyError);
        if (conn.destroyed) {
          targetSocket.destroy();
          return;
        }
        this.events.emit("connection-opened", { target: this.target });
        relay(conn, targetSocket, this.events, this.target);
      },
      (err: Error) => {
        this.events.emit("connection-error", { target: this.target, err });
        conn.destroy();
      },
    );
  }

  async stop() {
    this.#isRunning = false;
    await this.listener.close();
    await this.#acceptLoop;
    for (const conn of this.connections) {
      conn.destroy();
    }
    this.connections.clear();
  }
}
