import type { Duplex } from "node:stream";

/**
 * Forwards bytes in both directions until either side ends.
 * Returns a function that removes the forwarding listeners.
 */
export function connectSockets(a: Duplex, b: Duplex) {
  // Manual data forwarding instead of pipe() so that backpressure and end are handled per side
  function forward(from: Duplex, to: Duplex) {
    const onData = (chunk: Buffer) => {
      if (!to.write(chunk)) {
        from.pause();
        to.once("drain", () => from.resume());
      }
    };
    const onEnd = () => {
      if (to.writable) to.end();
    };
    from.on("data", onData);
    from.on("end", onEnd);
    return () => {
      from.off("data", onData);
      from.off("end", onEnd);
    };
  }

  const cleanupAtoB = forward(a, b);
  const cleanupBtoA = forward(b, a);

  return () => {
    cleanupAtoB();
    cleanupBtoA();
  };
}
