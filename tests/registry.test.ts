import { beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { ContextRegistry } from "../src/pt/ContextRegistry.ts";
import {
  ContextAlreadyInitializedError,
  ContextNotInitializedError,
  ContextRoleMismatchError,
} from "../src/shared/errors.ts";
import { parseNode } from "../src/shared/parse-node.ts";
import { XorTransport } from "./common.ts";

describe("ContextRegistry", () => {
  let transport: XorTransport;
  let registry: ContextRegistry;

  beforeEach(() => {
    transport = new XorTransport();
    registry = new ContextRegistry(transport);
  });

  it("builds a client context from the node options", async () => {
    const node = parseNode(
      "xor+tcp://203.0.113.7:443/?key=7&state-dir=/var/lib/obfs",
    );
    await registry.init(node, false);

    const context = registry.getClientContext("203.0.113.7:443");
    assert.deepEqual(context.clientArgs, { key: 7 });
    assert.equal(context.clientFactory, transport.clientFactories[0]);
    assert.equal(transport.clientFactories[0]?.stateDir, "/var/lib/obfs");
    assert.equal(registry.size, 1);
  });

  it("builds a server context in the current directory by default", async () => {
    const node = parseNode("xor+tcp://127.0.0.1:9443/?key=9");
    await registry.init(node, true);

    const context = registry.getServerContext("127.0.0.1:9443");
    assert.equal(transport.serverFactories[0]?.stateDir, ".");
    assert.equal(context.serverArgs.get("cert"), "test-cert");
    assert.equal(context.serverArgs.get("key"), "9");
  });

  it("refuses a second context for the same address and keeps the first", async () => {
    await registry.init(parseNode("xor+tcp://127.0.0.1:9000/?key=7"), false);

    await assert.rejects(
      registry.init(parseNode("xor+tcp://127.0.0.1:9000/?key=9"), true),
      (err) =>
        err instanceof ContextAlreadyInitializedError &&
        err.message ===
          "obfuscation context already initialized for 127.0.0.1:9000",
    );

    const context = registry.get("127.0.0.1:9000");
    assert.equal(context.role, "client");
    assert.deepEqual(registry.getClientContext("127.0.0.1:9000").clientArgs, {
      key: 7,
    });
    assert.equal(transport.serverFactories.length, 0);
  });

  it("refuses a concurrent init for an address that is still initializing", async () => {
    const node = parseNode("xor+tcp://127.0.0.1:9000/?key=7");
    const first = registry.init(node, false);
    await assert.rejects(registry.init(node, false), ContextAlreadyInitializedError);
    await first;
    assert.equal(transport.clientFactories.length, 1);
  });

  it("stores nothing when the transport rejects the options", async () => {
    const node = parseNode("xor+tcp://127.0.0.1:9000");
    await assert.rejects(registry.init(node, false), {
      message: "xor: missing argument 'key'",
    });
    assert.equal(registry.has("127.0.0.1:9000"), false);

    await registry.init(parseNode("xor+tcp://127.0.0.1:9000/?key=3"), false);
    assert.equal(registry.has("127.0.0.1:9000"), true);
  });

  it("fails lookups of unknown addresses with a distinct error", () => {
    assert.throws(
      () => registry.get("10.0.0.1:1"),
      (err) =>
        err instanceof ContextNotInitializedError &&
        err.address === "10.0.0.1:1" &&
        err.message === "obfuscation context not initialized for 10.0.0.1:1",
    );
  });

  it("reports a role mismatch instead of returning the wrong context", async () => {
    await registry.init(parseNode("xor+tcp://127.0.0.1:9443/?key=9"), true);
    assert.throws(
      () => registry.getClientContext("127.0.0.1:9443"),
      (err) =>
        err instanceof ContextRoleMismatchError &&
        err.expected === "client" &&
        err.actual === "server" &&
        err.message ===
          "obfuscation context for 127.0.0.1:9443 is a server context, expected client",
    );
  });

  it("describes a server endpoint with its sorted public arguments", async () => {
    const node = parseNode("obfs4+tcp://127.0.0.1:9443/?key=7");
    const urls: string[] = [];
    registry.events.on("server-initialized", ({ url }) => urls.push(url));

    await registry.init(node, true);

    const expected = "obfs4+tcp://127.0.0.1:9443/?cert=test-cert&key=7";
    assert.equal(registry.describeServerEndpoint(node), expected);
    assert.deepEqual(urls, [expected]);
  });

  it("announces a context once it is stored, before the server endpoint", async () => {
    const node = parseNode("xor+tcp://127.0.0.1:9443/?key=9");
    const seen: string[] = [];
    registry.events.on("context-initialized", ({ role }) => {
      seen.push(`context ${role} ${registry.getServerContext(node.addr).role}`);
    });
    registry.events.on("server-initialized", ({ url }) => {
      seen.push(`server ${url}`);
    });

    await registry.init(node, true);

    assert.deepEqual(seen, [
      "context server server",
      "server xor+tcp://127.0.0.1:9443/?cert=test-cert&key=9",
    ]);
  });

  it("describes nothing for addresses without a server context", async () => {
    const clientNode = parseNode("obfs4+tcp://127.0.0.1:9000/?key=7");
    await registry.init(clientNode, false);

    assert.equal(registry.describeServerEndpoint(clientNode), "");
    assert.equal(
      registry.describeServerEndpoint(parseNode("obfs4+tcp://127.0.0.1:1")),
      "",
    );
  });
});
