import { argv } from "node:process";
import { ObfsClient } from "../../src/client.ts";
import { ObfsHttpTransporter } from "../../src/obfs-http/ObfsHttpTransporter.ts";

const LISTEN_ADDR = argv[2] ? argv[2] : "127.0.0.1:1080";
const SERVER_ADDR = argv[3] ? argv[3] : "localhost:8080";
const DEBUG = process.env.OBFS_DEBUG === "1";

const transporter = new ObfsHttpTransporter();

if (DEBUG) {
  transporter.events.on("handshake-request", ({ head }) => {
    console.log(`[ohttp] -> ${SERVER_ADDR}\n${head}`);
  });
  transporter.events.on("handshake-response", ({ head }) => {
    console.log(`[ohttp] <- ${SERVER_ADDR}\n${head}`);
  });
}

const client = new ObfsClient({
  transporter,
  serverAddr: SERVER_ADDR,
  listenAddr: LISTEN_ADDR,
});
client.events.on("relay-start", ({ address }) => {
  console.log("Local listener started on", address, "forwarding to", SERVER_ADDR);
});
client.events.on("connection-error", ({ target, err }) => {
  console.log(`Connection to ${target ?? "<none>"} failed:`, err.message);
});
await client.start();

process.on("SIGINT", () => {
  client.stop().catch((err) => {
    console.error("Error while stopping client", err);
  });
});
