import { argv } from "node:process";
import { listenObfsHttp } from "../../src/obfs-http/ObfsHttpListener.ts";
import { ObfsServer } from "../../src/server.ts";

const LISTEN_ADDR = argv[2] ? argv[2] : ":8080";
const TARGET_ADDR = argv[3] ? argv[3] : "127.0.0.1:8081";
const DEBUG = process.env.OBFS_DEBUG === "1";

const listener = await listenObfsHttp(LISTEN_ADDR);

if (DEBUG) {
  listener.connectionEvents.on("handshake-request", ({ connection, head }) => {
    console.log(`[ohttp] ${connection.remoteAddress} -> ${LISTEN_ADDR}\n${head}`);
  });
  listener.connectionEvents.on("handshake-response", ({ connection, head }) => {
    console.log(`[ohttp] ${connection.remoteAddress} <- ${LISTEN_ADDR}\n${head}`);
  });
}
listener.connectionEvents.on("handshake-error", ({ connection, err }) => {
  console.log(`[ohttp] ${connection.remoteAddress} handshake failed:`, err.message);
});

const server = new ObfsServer({ listener, target: TARGET_ADDR });
server.events.on("relay-start", ({ address }) => {
  console.log("HTTP-disguised server listening on", address);
});
server.events.on("connection-error", ({ target, err }) => {
  console.log(`Connection to ${target ?? "<none>"} failed:`, err.message);
});
server.events.on("relay-end", () => {
  console.log("Server stopped");
});
server.start();

process.on("SIGINT", () => {
  server.stop().catch((err) => {
    console.error("Error while stopping server", err);
  });
});
