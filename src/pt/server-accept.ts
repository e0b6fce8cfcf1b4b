import type { Duplex } from "node:stream";
import type { ContextRegistry } from "./ContextRegistry.ts";

/**
 * Strips the transport's framing from an accepted connection.
 */
export async function serverAccept(
  registry: ContextRegistry,
  addr: string,
  conn: Duplex,
): Promise<Duplex> {
  const { serverFactory } = registry.getServerContext(addr);
  return serverFactory.wrapConn(conn);
}
