import type { Duplex } from "node:stream";
import { TcpTransporter } from "../tcp/TcpTransporter.ts";
import type { HandshakeOptions, StreamEndpoint } from "../transport.ts";
import { clientConnect } from "./client-connect.ts";
import type { ContextRegistry } from "./ContextRegistry.ts";

/**
 * Client side of a pluggable transport. The target address picks the context
 * that `ContextRegistry.init` built for that node.
 */
export class PtTransporter extends TcpTransporter {
  readonly registry: ContextRegistry;

  constructor(registry: ContextRegistry) {
    super();
    this.registry = registry;
  }

  override async handshake(
    conn: StreamEndpoint,
    options: HandshakeOptions = {},
  ): Promise<Duplex> {
    if (!options.addr) {
      throw new Error("pt transporter requires a target address");
    }
    return clientConnect(this.registry, options.addr, conn);
  }
}
