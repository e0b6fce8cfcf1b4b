export type {
  ConnectionEvents,
  ListenerEvents,
  RegistryEvents,
  RelayEvents,
  TypeSafeEventEmitter,
} from "./events.ts";
export {
  ObfsHttpConnection,
  type HandshakeState,
  type ObfsHttpConnectionOptions,
} from "./obfs-http/ObfsHttpConnection.ts";
export { ObfsHttpTransporter } from "./obfs-http/ObfsHttpTransporter.ts";
export {
  ObfsHttpListener,
  listenObfsHttp,
} from "./obfs-http/ObfsHttpListener.ts";
export { ContextRegistry } from "./pt/ContextRegistry.ts";
export { clientConnect } from "./pt/client-connect.ts";
export { serverAccept } from "./pt/server-accept.ts";
export { PtTransporter } from "./pt/PtTransporter.ts";
export { PtListener, listenPt } from "./pt/PtListener.ts";
export type * from "./pt/types.ts";
export { createTransporter, listen, type ObfsScheme } from "./schemes.ts";
export { ObfsServer } from "./server.ts";
export { ObfsClient } from "./client.ts";
export { TcpTransporter, dialTcp } from "./tcp/TcpTransporter.ts";
export { TcpListener, listenTcp, bindTcpServer } from "./tcp/TcpListener.ts";
export type * from "./transport.ts";
export * from "./shared/errors.ts";
export {
  createDecoyRequest,
  encodeRequest,
  parseRequestHead,
  parseResponseHead,
  type DecoyRequest,
  type ParsedRequest,
  type ParsedResponse,
} from "./shared/http-message.ts";
export { DEFAULT_USER_AGENT, DEFAULT_DECOY_URL } from "./shared/constants.ts";
export { parseNode } from "./shared/parse-node.ts";
export { splitHostPort } from "./shared/address.ts";
export { connectSockets } from "./shared/connect-sockets.ts";
