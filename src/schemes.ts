import type { ConnectionEvents, ListenerEvents, TypeSafeEventEmitter } from "./events.ts";
import { listenObfsHttp } from "./obfs-http/ObfsHttpListener.ts";
import { ObfsHttpTransporter } from "./obfs-http/ObfsHttpTransporter.ts";
import type { ContextRegistry } from "./pt/ContextRegistry.ts";
import { listenPt } from "./pt/PtListener.ts";
import { PtTransporter } from "./pt/PtTransporter.ts";
import type { DecoyRequest } from "./shared/http-message.ts";
import type { Listener, Transporter } from "./transport.ts";

/**
 * The two ways a connection can be disguised: as an HTTP exchange, or by a
 * pluggable transport whose per-node state lives in a registry.
 */
export type ObfsScheme =
  | { kind: "ohttp"; request?: DecoyRequest }
  | { kind: "pt"; registry: ContextRegistry };

export function createTransporter(
  scheme: ObfsScheme,
  { events }: { events?: TypeSafeEventEmitter<ConnectionEvents> } = {},
): Transporter {
  switch (scheme.kind) {
    case "ohttp":
      return new ObfsHttpTransporter({ request: scheme.request, events });
    case "pt":
      return new PtTransporter(scheme.registry);
  }
}

export function listen(
  scheme: ObfsScheme,
  addr: string,
  options: {
    events?: TypeSafeEventEmitter<ListenerEvents>;
    connectionEvents?: TypeSafeEventEmitter<ConnectionEvents>;
  } = {},
): Promise<Listener> {
  switch (scheme.kind) {
    case "ohttp":
      return listenObfsHttp(addr, options);
    case "pt":
      return listenPt(scheme.registry, addr, { events: options.events });
  }
}
