import net from "node:net";
import { once } from "node:events";
import { Duplex } from "node:stream";
import type {
  ClientFactory,
  DialFunction,
  PluggableTransport,
  ServerFactory,
} from "../src/pt/types.ts";

/**
 * One end of an in-memory connection. Whatever is written to it is readable on its peer.
 */
export class MemorySocket extends Duplex {
  peer: MemorySocket | null = null;

  override _read() {}

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ) {
    if (!this.peer || this.peer.destroyed) {
      callback(new Error("peer closed"));
      return;
    }
    this.peer.push(chunk);
    callback();
  }

  override _final(callback: (error?: Error | null) => void) {
    this.peer?.push(null);
    callback();
  }
}

export function createDuplexPair(): [MemorySocket, MemorySocket] {
  const a = new MemorySocket();
  const b = new MemorySocket();
  a.peer = b;
  b.peer = a;
  return [a, b];
}

/**
 * Collects everything that passes through a stream, in arrival order.
 */
export function recordData(stream: Duplex) {
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return {
    chunks,
    text: () => Buffer.concat(chunks).toString("latin1"),
  };
}

/**
 * Resolves with exactly `length` bytes from the stream.
 */
export function readBytes(stream: Duplex, length: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      stream.off("readable", onReadable);
      stream.off("end", onEnd);
      stream.off("error", onError);
    };
    const onReadable = () => {
      const chunk: Buffer | null = stream.read(length);
      if (chunk === null) return;
      cleanup();
      resolve(chunk);
    };
    const onEnd = () => {
      cleanup();
      reject(new Error(`stream ended before ${length} bytes were read`));
    };
    const onError = (err: Error) => {
      cleanup();
      reject(err);
    };
    stream.on("readable", onReadable);
    stream.on("end", onEnd);
    stream.on("error", onError);
    onReadable();
  });
}

export async function onceWithAbort(
  emitter: NodeJS.EventEmitter,
  event: string,
  options: {
    timeout: number;
    message: string;
  },
) {
  try {
    return await once(emitter, event, {
      signal: AbortSignal.timeout(options.timeout),
    });
  } catch (err) {
    throw new Error(options.message);
  }
}

export function getPortOrThrow(address: net.AddressInfo | string | null) {
  if (!address || typeof address === "string") {
    throw new Error("Listener address not found");
  }
  return address.port;
}

/**
 * A TCP service that answers every chunk it receives with the same bytes upper-cased.
 */
export async function startUppercaseServer() {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    socket.on("data", (chunk) => {
      socket.write(chunk.toString("latin1").toUpperCase());
    });
    socket.on("error", () => socket.destroy());
  });
  server.listen(0, "127.0.0.1");
  await once(server, "listening", { signal: AbortSignal.timeout(1000) });
  return {
    server,
    port: getPortOrThrow(server.address()),
    async stop() {
      for (const socket of sockets) socket.destroy();
      server.close();
      await once(server, "close");
    },
  };
}

export async function connectTcp(port: number) {
  const socket = net.createConnection({ host: "127.0.0.1", port });
  await once(socket, "connect", { signal: AbortSignal.timeout(1000) });
  return socket;
}

// Everything below is a stand-in pluggable transport for the tests: it prefixes the
// connection with a preamble and XORs every byte with a key taken from the node options.

export const XOR_PREAMBLE = Buffer.from("XOR1");

export type XorArgs = { key: number };

export class XorConnection extends Duplex {
  readonly socket: Duplex;
  readonly key: number;

  constructor(socket: Duplex, key: number) {
    super();
    this.socket = socket;
    this.key = key;
    this.socket.on("data", (chunk: Buffer) => {
      if (!this.push(this.#xor(chunk))) this.socket.pause();
    });
    this.socket.on("end", () => this.push(null));
    this.socket.on("error", (err: Error) => this.destroy(err));
  }

  #xor(data: Buffer) {
    return Buffer.from(data.map((byte) => byte ^ this.key));
  }

  override _read() {
    this.socket.resume();
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ) {
    this.socket.write(this.#xor(chunk), callback);
  }

  override _final(callback: (error?: Error | null) => void) {
    this.socket.end(() => callback());
  }

  override _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void,
  ) {
    this.socket.destroy();
    callback(error);
  }
}

function parseKey(args: URLSearchParams) {
  const value = args.get("key");
  if (value === null) throw new Error("xor: missing argument 'key'");
  const key = Number(value);
  if (!Number.isInteger(key) || key < 1 || key > 255) {
    throw new Error(`xor: invalid key ${value}`);
  }
  return key;
}

export class XorClientFactory implements ClientFactory<XorArgs> {
  readonly stateDir: string;
  dialCalls: { network: string; address: string; conn: Duplex }[] = [];

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  parseArgs(args: URLSearchParams): XorArgs {
    return { key: parseKey(args) };
  }

  async dial(
    network: string,
    address: string,
    dialFn: DialFunction,
    args: XorArgs,
  ): Promise<Duplex> {
    const conn = await dialFn(network, address);
    this.dialCalls.push({ network, address, conn });
    await new Promise<void>((resolve, reject) => {
      conn.write(XOR_PREAMBLE, (err) => (err ? reject(err) : resolve()));
    });
    return new XorConnection(conn, args.key);
  }
}

export class XorServerFactory implements ServerFactory {
  readonly stateDir: string;
  readonly key: number;

  constructor(stateDir: string, args: URLSearchParams) {
    this.stateDir = stateDir;
    this.key = parseKey(args);
  }

  args() {
    return new URLSearchParams({ key: String(this.key), cert: "test-cert" });
  }

  async wrapConn(conn: Duplex): Promise<Duplex> {
    const preamble = await readBytes(conn, XOR_PREAMBLE.length);
    if (!preamble.equals(XOR_PREAMBLE)) {
      throw new Error("xor: bad preamble");
    }
    return new XorConnection(conn, this.key);
  }
}

export class XorTransport implements PluggableTransport {
  readonly name = "xor";
  clientFactories: XorClientFactory[] = [];
  serverFactories: XorServerFactory[] = [];

  async clientFactory(stateDir: string) {
    const factory = new XorClientFactory(stateDir);
    this.clientFactories.push(factory);
    return factory;
  }

  async serverFactory(stateDir: string, args: URLSearchParams) {
    const factory = new XorServerFactory(stateDir, args);
    this.serverFactories.push(factory);
    return factory;
  }
}
