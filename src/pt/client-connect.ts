import type { Duplex } from "node:stream";
import type { ContextRegistry } from "./ContextRegistry.ts";
import type { DialFunction } from "./types.ts";

/**
 * Runs the transport's client handshake over a connection that is already open.
 *
 * Transports expect to dial on their own, so they get a dial function that ignores
 * the network and address it is asked for and hands back `conn`.
 */
export async function clientConnect(
  registry: ContextRegistry,
  addr: string,
  conn: Duplex,
): Promise<Duplex> {
  const { clientFactory, clientArgs } = registry.getClientContext(addr);
  const pseudoDial: DialFunction = async () => conn;
  return clientFactory.dial("tcp", "", pseudoDial, clientArgs);
}
