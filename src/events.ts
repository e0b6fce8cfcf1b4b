import type net from "node:net";
import type { EventEmitter } from "node:events";
import type { ObfsHttpConnection } from "./obfs-http/ObfsHttpConnection.ts";
import type { ObfsNode, ObfsRole } from "./pt/types.ts";

export type ConnectionEvents = {
  // raw text of the request head, sent (client) or received (server)
  "handshake-request": { connection: ObfsHttpConnection; head: string };
  // raw text of the response head, received (client) or sent (server)
  "handshake-response": { connection: ObfsHttpConnection; head: string };
  "handshake-complete": { connection: ObfsHttpConnection };
  "handshake-error": { connection: ObfsHttpConnection; err: Error };
};

export type RegistryEvents = {
  "context-initialized": { node: ObfsNode; role: ObfsRole };
  "server-initialized": { node: ObfsNode; url: string };
};

export type ListenerEvents = {
  "listener-start": { address: net.AddressInfo | string | null };
  "listener-close": undefined;
  "connection-accepted": { socket: net.Socket };
  "accept-error": { address: string; socket: net.Socket; err: Error };
};

export type RelayEvents = {
  "relay-start": { address: net.AddressInfo | string | null };
  "relay-end": undefined;
  "connection-opened": { target: string };
  "connection-closed": { target: string };
  "connection-error": { target: string | null; err: Error };
};

export interface TypeSafeEventEmitter<Events extends Record<string, unknown>>
  extends EventEmitter {
  addListener<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  on<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  once<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  removeListener<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  off<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  removeAllListeners<K extends Extract<keyof Events, string>>(
    eventName?: K,
  ): this;
  setMaxListeners(n: number): this;
  getMaxListeners(): number;
  listeners<K extends Extract<keyof Events, string>>(eventName: K): Function[];
  rawListeners<K extends Extract<keyof Events, string>>(
    eventName: K,
  ): Function[];
  emit<K extends Extract<keyof Events, string>>(
    eventName: K,
    arg: Events[K],
  ): boolean;
  listenerCount<K extends Extract<keyof Events, string>>(eventName: K): number;
  prependListener<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
  prependOnceListener<K extends Extract<keyof Events, string>>(
    eventName: K,
    listener: (arg: Events[K]) => void,
  ): this;
}
