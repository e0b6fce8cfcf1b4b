import type { Duplex } from "node:stream";
import type { RelayEvents, TypeSafeEventEmitter } from "../events.ts";
import { connectSockets } from "./connect-sockets.ts";

/**
 * Relays between an obfuscated connection and a plain one until both are closed.
 * An error on either side tears down the other.
 */
export function relay(
  obfuscated: Duplex,
  plain: Duplex,
  events: TypeSafeEventEmitter<RelayEvents>,
  target: string,
) {
  const cleanup = connectSockets(obfuscated, plain);
  let isClosed = false;

  const closeOther = (other: Duplex) => () => {
    if (!other.destroyed) other.end();
    if (isClosed) return;
    isClosed = true;
    cleanup();
    events.emit("connection-closed", { target });
  };
  const destroyOther = (other: Duplex) => (err: Error) => {
    events.emit("connection-error", { target, err });
    other.destroy();
  };

  obfuscated.on("error", destroyOther(plain));
  plain.on("error", destroyOther(obfuscated));
  obfuscated.on("close", closeOther(plain));
  plain.on("close", closeOther(obfuscated));
}
