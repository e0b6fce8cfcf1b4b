import { Duplex } from "node:stream";
import EventEmitter from "node:events";
import type { ConnectionEvents, TypeSafeEventEmitter } from "../events.ts";
import {
  HEAD_TERMINATOR,
  MAX_BODY_LENGTH,
  MAX_HEAD_LENGTH,
  OK_RESPONSE,
} from "../shared/constants.ts";
import { HandshakeError } from "../shared/errors.ts";
import {
  createDecoyRequest,
  encodeRequest,
  getContentLength,
  parseRequestHead,
  parseResponseHead,
  type DecoyRequest,
  type ParsedRequest,
} from "../shared/http-message.ts";
import type { StreamEndpoint } from "../transport.ts";

/**
 * Text of an HTTP message up to, not including, the blank line that ends its head.
 */
function headText(message: Buffer) {
  const end = message.indexOf(HEAD_TERMINATOR);
  return message.subarray(0, end === -1 ? message.length : end).toString("latin1");
}

export type HandshakeState =
  | "uninitialized"
  | "handshaking"
  | "handshaked"
  | "failed";

export type ObfsHttpConnectionOptions = {
  isServer?: boolean;
  /**
   * Client only: request to send instead of the default decoy.
   */
  request?: DecoyRequest;
  events?: TypeSafeEventEmitter<ConnectionEvents>;
};

/**
 * Wraps a connection so that its first bytes look like a plain HTTP exchange.
 *
 * The first read or write runs the handshake: the client sends a request and waits
 * for a `200 OK`, the server reads a request and answers `200 OK`. After that the
 * connection is a transparent pipe to the underlying socket.
 */
export class ObfsHttpConnection extends Duplex {
  public readonly socket: StreamEndpoint;
  public readonly isServer: boolean;
  public readonly request: DecoyRequest | null;
  /**
   * Server only: the request the client disguised the connection with.
   */
  public receivedRequest: ParsedRequest | null = null;
  public events: TypeSafeEventEmitter<ConnectionEvents> = new EventEmitter();

  #state: HandshakeState = "uninitialized";
  #handshakePromise: Promise<void> | null = null;
  /**
   * Bytes received while handshaking that have not been consumed yet.
   * Whatever follows the HTTP head is handed to the reader once the handshake succeeds.
   */
  #receiveBuffer = Buffer.alloc(0);
  #remoteEnded = false;
  #socketError: Error | null = null;
  #wakeUp: (() => void) | null = null;

  constructor(
    socket: StreamEndpoint,
    { isServer = false, request, events }: ObfsHttpConnectionOptions = {},
  ) {
    super();
    this.socket = socket;
    this.isServer = isServer;
    this.request = request ?? null;
    if (events) this.events = events;

    // errors before the first read or write are kept for the handshake
    this.socket.on("error", (err: Error) => {
      if (this.#state === "handshaked") {
        this.destroy(err);
        return;
      }
      this.#socketError = err;
      this.#notify();
    });

    this.socket.on("close", () => {
      if (this.#state === "handshaked") {
        // a close that follows a clean end is handled once the reader drains the data
        if (!this.#remoteEnded && !this.destroyed) this.destroy();
        return;
      }
      this.#remoteEnded = true;
      this.#notify();
    });
  }

  get state() {
    return this.#state;
  }

  get remoteAddress() {
    return this.socket.remoteAddress;
  }

  get remotePort() {
    return this.socket.remotePort;
  }

  get localAddress() {
    return this.socket.localAddress;
  }

  get localPort() {
    return this.socket.localPort;
  }

  /**
   * Runs the disguise exchange once. Every call returns the same promise, so
   * concurrent callers all wait for the single exchange and see the same outcome.
   * A failed handshake is final.
   */
  handshake(): Promise<void> {
    if (!this.#handshakePromise) {
      this.#handshakePromise = this.#runHandshake();
    }
    return this.#handshakePromise;
  }

  async #runHandshake() {
    this.#state = "handshaking";
    this.#attachSocketListeners();

    try {
      if (this.isServer) {
        await this.#serverHandshake();
      } else {
        await this.#clientHandshake();
      }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.#state = "failed";
      this.events.emit("handshake-error", { connection: this, err: error });
      throw error;
    }

    this.#state = "handshaked";
    this.events.emit("handshake-complete", { connection: this });

    if (this.#receiveBuffer.length > 0) {
      const pipelined = this.#receiveBuffer;
      this.#receiveBuffer = Buffer.alloc(0);
      this.push(pipelined);
    }
    if (this.#remoteEnded) {
      this.push(null);
    }
  }

  async #serverHandshake() {
    const head = await this.#readHead();
    this.events.emit("handshake-request", {
      connection: this,
      head: head.toString("latin1"),
    });
    const request = parseRequestHead(head);
    this.receivedRequest = request;
    await this.#discard(getContentLength(request.headers));

    await this.#writeToSocket(OK_RESPONSE);
    this.events.emit("handshake-response", {
      connection: this,
      head: headText(OK_RESPONSE),
    });
  }

  async #clientHandshake() {
    const encodedRequest = encodeRequest(this.request ?? createDecoyRequest());
    await this.#writeToSocket(encodedRequest);
    this.events.emit("handshake-request", {
      connection: this,
      head: headText(encodedRequest),
    });

    const head = await this.#readHead();
    this.events.emit("handshake-response", {
      connection: this,
      head: head.toString("latin1"),
    });
    const response = parseResponseHead(head);
    if (response.statusCode !== 200) {
      throw new HandshakeError(response.status);
    }
    await this.#discard(getContentLength(response.headers));
  }

  #attachSocketListeners() {
    this.socket.on("data", (chunk: Buffer | string) => {
      if (this.#state === "failed") return;
      const data = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      if (this.#state !== "handshaked") {
        this.#receiveBuffer = Buffer.concat([this.#receiveBuffer, data]);
        this.#notify();
        return;
      }
      if (!this.push(data)) {
        this.socket.pause();
      }
    });

    this.socket.on("end", () => {
      this.#remoteEnded = true;
      if (this.#state === "handshaked") {
        this.push(null);
        return;
      }
      this.#notify();
    });
  }

  #notify() {
    const wakeUp = this.#wakeUp;
    this.#wakeUp = null;
    wakeUp?.();
  }

  async #waitForData() {
    if (this.#socketError) throw this.#socketError;
    if (this.#remoteEnded) {
      throw new HandshakeError("Connection closed during handshake");
    }
    await new Promise<void>((resolve) => {
      this.#wakeUp = resolve;
    });
  }

  /**
   * Reads up to the blank line that ends an HTTP head. The returned head excludes it.
   */
  async #readHead(): Promise<Buffer> {
    for (;;) {
      const end = this.#receiveBuffer.indexOf(HEAD_TERMINATOR);
      if (end !== -1) {
        const head = this.#receiveBuffer.subarray(0, end);
        this.#receiveBuffer = this.#receiveBuffer.subarray(
          end + HEAD_TERMINATOR.length,
        );
        return head;
      }
      if (this.#receiveBuffer.length > MAX_HEAD_LENGTH) {
        throw new HandshakeError(
          `HTTP head exceeds ${MAX_HEAD_LENGTH} bytes`,
        );
      }
      await this.#waitForData();
    }
  }

  /**
   * Drops a declared message body as it arrives.
   */
  async #discard(length: number) {
    if (length > MAX_BODY_LENGTH) {
      throw new HandshakeError(
        `HTTP body of ${length} bytes exceeds ${MAX_BODY_LENGTH} bytes`,
      );
    }
    let remaining = length;
    for (;;) {
      const dropped = Math.min(remaining, this.#receiveBuffer.length);
      this.#receiveBuffer = this.#receiveBuffer.subarray(dropped);
      remaining -= dropped;
      if (remaining === 0) return;
      await this.#waitForData();
    }
  }

  #writeToSocket(data: Buffer) {
    return new Promise<void>((resolve, reject) => {
      this.socket.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }

  override _read() {
    if (this.#state === "handshaked") {
      this.socket.resume();
      return;
    }
    this.handshake().then(
      () => this.socket.resume(),
      (err: Error) => this.destroy(err),
    );
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ) {
    if (this.#state === "handshaked") {
      this.socket.write(chunk, callback);
      return;
    }
    this.handshake().then(() => {
      this.socket.write(chunk, callback);
    }, callback);
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
