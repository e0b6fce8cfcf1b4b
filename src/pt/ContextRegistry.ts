import EventEmitter from "node:events";
import type { RegistryEvents, TypeSafeEventEmitter } from "../events.ts";
import { DEFAULT_STATE_DIR } from "../shared/constants.ts";
import {
  ContextAlreadyInitializedError,
  ContextNotInitializedError,
  ContextRoleMismatchError,
} from "../shared/errors.ts";
import type {
  ClientContext,
  ObfsContext,
  ObfsNode,
  PluggableTransport,
  ServerContext,
} from "./types.ts";

/**
 * Maps a node address to the pluggable transport state built for it.
 *
 * Parsing transport arguments (and, server side, loading keys from the state directory)
 * happens once per address in `init`; every later dial or accept for that address
 * reuses the stored context. Entries are never replaced or removed.
 */
export class ContextRegistry {
  public readonly transport: PluggableTransport;
  public events: TypeSafeEventEmitter<RegistryEvents> = new EventEmitter();

  #contexts = new Map<string, ObfsContext>();
  // addresses whose init is still awaiting the transport
  #pending = new Set<string>();

  constructor(
    transport: PluggableTransport,
    { events }: { events?: TypeSafeEventEmitter<RegistryEvents> } = {},
  ) {
    this.transport = transport;
    if (events) this.events = events;
  }

  get size() {
    return this.#contexts.size;
  }

  has(addr: string) {
    return this.#contexts.has(addr);
  }

  async init(node: ObfsNode, isServerNode: boolean): Promise<void> {
    if (this.#contexts.has(node.addr) || this.#pending.has(node.addr)) {
      throw new ContextAlreadyInitializedError(node.addr);
    }
    this.#pending.add(node.addr);

    let context: ObfsContext;
    try {
      const stateDir = node.values.get("state-dir") || DEFAULT_STATE_DIR;
      context = isServerNode
        ? await this.#buildServerContext(stateDir, node.values)
        : await this.#buildClientContext(stateDir, node.values);
      this.#contexts.set(node.addr, context);
    } finally {
      this.#pending.delete(node.addr);
    }

    this.events.emit("context-initialized", { node, role: context.role });
    if (isServerNode) {
      this.events.emit("server-initialized", {
        node,
        url: this.describeServerEndpoint(node),
      });
    }
  }

  async #buildClientContext(
    stateDir: string,
    values: URLSearchParams,
  ): Promise<ClientContext> {
    const clientFactory = await this.transport.clientFactory(stateDir);
    const clientArgs = await clientFactory.parseArgs(values);
    return { role: "client", clientFactory, clientArgs };
  }

  async #buildServerContext(
    stateDir: string,
    values: URLSearchParams,
  ): Promise<ServerContext> {
    const serverFactory = await this.transport.serverFactory(stateDir, values);
    return { role: "server", serverFactory, serverArgs: serverFactory.args() };
  }

  get(addr: string): ObfsContext {
    const context = this.#contexts.get(addr);
    if (!context) throw new ContextNotInitializedError(addr);
    return context;
  }

  getClientContext(addr: string): ClientContext {
    const context = this.get(addr);
    if (context.role !== "client") {
      throw new ContextRoleMismatchError(addr, "client", context.role);
    }
    return context;
  }

  getServerContext(addr: string): ServerContext {
    const context = this.get(addr);
    if (context.role !== "server") {
      throw new ContextRoleMismatchError(addr, "server", context.role);
    }
    return context;
  }

  /**
   * Renders the URL clients should use to reach a server node, e.g.
   * `obfs4+tcp://203.0.113.5:443/?cert=...&iat-mode=0`.
   * Returns an empty string if the address has no server context.
   */
  describeServerEndpoint(node: ObfsNode): string {
    const context = this.#contexts.get(node.addr);
    if (!context || context.role !== "server") return "";

    const values = new URLSearchParams(context.serverArgs);
    values.sort();
    return `${node.protocol}+${node.transport}://${node.addr}/?${values.toString()}`;
  }
}
