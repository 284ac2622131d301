/**
 * Low-level UNIX socket communication layer for the compositor's IPC.
 *
 * niri speaks newline-delimited JSON: every request is one line, answered by
 * exactly one reply line, in order. After an `EventStream` request the same
 * connection keeps delivering one event per line until the compositor exits.
 *
 * Key features:
 * - Connection establishment with a connect timeout
 * - Line framing with a bounded receive buffer
 * - In-order request/reply matching without message ids
 * - Unsolicited lines surfaced as `message` events for streaming use
 * - Connection state tracking and statistics
 */

import { EventEmitter } from "node:events";
import type { Socket } from "node:net";
import { connect } from "node:net";

// ============================================================================
// Constants and Configuration
// ============================================================================

const DEFAULT_CONFIG = {
  /** Connection timeout in milliseconds */
  connectionTimeout: 5000,
  /** Maximum size of a partially received line in bytes */
  maxBufferSize: 16 * 1024 * 1024,
} as const;

/** Message delimiter for framing */
const DELIMITER = 0x0a;

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Connection state enumeration.
 */
export enum ConnectionState {
  Disconnected = "disconnected",
  Connecting = "connecting",
  Connected = "connected",
  Closing = "closing",
  Closed = "closed",
  Error = "error",
}

export interface SocketConnectionConfig {
  /** Connection timeout in milliseconds */
  readonly connectionTimeout?: number;
  /** Maximum message buffer size in bytes */
  readonly maxBufferSize?: number;
}

/**
 * Connection statistics for diagnostics.
 */
export interface ConnectionStats {
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly bytesSent: number;
  readonly bytesReceived: number;
  readonly state: ConnectionState;
  readonly lastError?: string;
}

interface MutableConnectionStats {
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  lastError?: string;
}

/** A request waiting for its reply line */
interface PendingReply {
  readonly resolve: (reply: unknown) => void;
  readonly reject: (error: Error) => void;
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base socket communication error.
 */
export class SocketError extends Error {
  public readonly code: string;
  public readonly socketPath?: string;

  constructor(message: string, code: string, socketPath?: string) {
    super(message);
    this.name = "SocketError";
    this.code = code;
    if (socketPath !== undefined) {
      this.socketPath = socketPath;
    }
  }
}

/**
 * Thrown when socket connection attempts exceed the configured timeout.
 */
export class ConnectionTimeoutError extends SocketError {
  constructor(socketPath: string, timeout: number) {
    super(
      `Connection timeout after ${timeout}ms to socket: ${socketPath}`,
      "CONNECTION_TIMEOUT",
      socketPath
    );
    this.name = "ConnectionTimeoutError";
  }
}

/**
 * Thrown when a single line exceeds the configured maximum size.
 */
export class BufferOverflowError extends SocketError {
  constructor(currentSize: number, maxSize: number) {
    super(
      `Buffer overflow: ${currentSize} bytes exceeds maximum ${maxSize} bytes`,
      "BUFFER_OVERFLOW"
    );
    this.name = "BufferOverflowError";
  }
}

// ============================================================================
// Socket Connection Class
// ============================================================================

/**
 * Line-framed JSON connection to a UNIX socket.
 *
 * Emits `message` for lines no request was waiting for, `error` for framing or
 * transport failures not attributable to a pending request, `end` when the
 * peer closes, and `stateChange` on every state transition.
 */
export class SocketConnection extends EventEmitter {
  private socket: Socket | null = null;
  private state: ConnectionState = ConnectionState.Disconnected;
  private readonly config: Required<SocketConnectionConfig>;
  private readonly stats: MutableConnectionStats = {
    messagesSent: 0,
    messagesReceived: 0,
    bytesSent: 0,
    bytesReceived: 0,
  };
  private readonly pendingReplies: PendingReply[] = [];
  private messageBuffer: Buffer = Buffer.alloc(0);

  private readonly socketPath: string;

  /**
   * @param socketPath - Absolute path to the UNIX socket
   * @param config - Optional connection configuration
   */
  constructor(socketPath: string, config: SocketConnectionConfig = {}) {
    super();

    this.socketPath = socketPath;
    this.config = {
      connectionTimeout: config.connectionTimeout ?? DEFAULT_CONFIG.connectionTimeout,
      maxBufferSize: config.maxBufferSize ?? DEFAULT_CONFIG.maxBufferSize,
    };
  }

  /**
   * Establishes the connection.
   *
   * @throws {ConnectionTimeoutError} When connection times out
   * @throws {SocketError} For other connection failures
   */
  async connect(): Promise<void> {
    if (this.state === ConnectionState.Connected) {
      return;
    }
    if (this.state !== ConnectionState.Disconnected) {
      throw new SocketError(
        `Cannot connect from state ${this.state}`,
        "INVALID_STATE",
        this.socketPath
      );
    }

    this.setState(ConnectionState.Connecting);

    try {
      this.socket = await this.establishConnection();
      this.setupSocketHandlers(this.socket);
      this.setState(ConnectionState.Connected);
    } catch (error) {
      this.stats.lastError = error instanceof Error ? error.message : String(error);
      this.setState(ConnectionState.Error);
      throw error;
    }
  }

  /**
   * Sends one JSON value as a line and resolves with the next reply line.
   * Replies are matched to requests strictly in order.
   *
   * @throws {SocketError} When the connection is not usable or closes first
   */
  async request(payload: unknown): Promise<unknown> {
    return new Promise((resolve, reject) => {
      this.pendingReplies.push({ resolve, reject });
      this.write(payload).catch((error: unknown) => {
        const index = this.pendingReplies.findIndex((pending) => pending.resolve === resolve);
        if (index >= 0) {
          this.pendingReplies.splice(index, 1);
        }
        reject(error);
      });
    });
  }

  /**
   * Closes the connection, failing any request still waiting for a reply.
   */
  async close(): Promise<void> {
    if (this.state === ConnectionState.Closed || this.state === ConnectionState.Closing) {
      return;
    }

    this.setState(ConnectionState.Closing);
    this.failPending(new SocketError("Connection closed", "CONNECTION_CLOSED", this.socketPath));

    const socket = this.socket;
    this.socket = null;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        socket.once("close", () => resolve());
        socket.end(() => socket.destroy());
      });
    }

    this.messageBuffer = Buffer.alloc(0);
    this.setState(ConnectionState.Closed);
  }

  getStats(): ConnectionStats {
    return { ...this.stats, state: this.state };
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === ConnectionState.Connected;
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private async establishConnection(): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = connect(this.socketPath);

      const connectionTimeout = setTimeout(() => {
        socket.destroy();
        reject(new ConnectionTimeoutError(this.socketPath, this.config.connectionTimeout));
      }, this.config.connectionTimeout);

      socket.once("connect", () => {
        clearTimeout(connectionTimeout);
        socket.removeAllListeners("error");
        resolve(socket);
      });

      socket.once("error", (error) => {
        clearTimeout(connectionTimeout);
        reject(
          new SocketError(
            `Connection failed: ${error.message}`,
            "CONNECTION_FAILED",
            this.socketPath
          )
        );
      });
    });
  }

  private setupSocketHandlers(socket: Socket): void {
    socket.on("data", (data: Buffer) => this.handleData(data));
    socket.on("error", (error: Error) => this.handleSocketError(error));
    socket.on("end", () => this.handleSocketEnd());
  }

  private async write(payload: unknown): Promise<void> {
    const socket = this.socket;
    if (this.state !== ConnectionState.Connected || !socket) {
      throw new SocketError(
        "Cannot send message: socket not connected",
        "NOT_CONNECTED",
        this.socketPath
      );
    }

    const buffer = Buffer.from(`${JSON.stringify(payload)}\n`);

    return new Promise<void>((resolve, reject) => {
      socket.write(buffer, (error) => {
        if (error) {
          reject(
            new SocketError(
              `Failed to send message: ${error.message}`,
              "SEND_FAILED",
              this.socketPath
            )
          );
          return;
        }
        this.stats.messagesSent++;
        this.stats.bytesSent += buffer.length;
        resolve();
      });
    });
  }

  /**
   * Handles incoming data with line framing.
   */
  private handleData(data: Buffer): void {
    this.stats.bytesReceived += data.length;
    this.messageBuffer =
      this.messageBuffer.length === 0 ? data : Buffer.concat([this.messageBuffer, data]);

    let delimiterIndex = this.messageBuffer.indexOf(DELIMITER);
    while (delimiterIndex !== -1) {
      const line = this.messageBuffer.subarray(0, delimiterIndex);
      this.messageBuffer = this.messageBuffer.subarray(delimiterIndex + 1);
      if (line.length > 0) {
        this.handleLine(line);
      }
      delimiterIndex = this.messageBuffer.indexOf(DELIMITER);
    }

    if (this.messageBuffer.length > this.config.maxBufferSize) {
      const overflow = new BufferOverflowError(
        this.messageBuffer.length,
        this.config.maxBufferSize
      );
      this.messageBuffer = Buffer.alloc(0);
      this.deliverError(overflow);
    }
  }

  private handleLine(line: Buffer): void {
    this.stats.messagesReceived++;

    let message: unknown;
    try {
      message = JSON.parse(line.toString("utf8"));
    } catch (error) {
      this.deliverError(
        new SocketError(
          `Failed to deserialize message: ${error instanceof Error ? error.message : String(error)}`,
          "DESERIALIZE_FAILED",
          this.socketPath
        )
      );
      return;
    }

    const pending = this.pendingReplies.shift();
    if (pending) {
      pending.resolve(message);
    } else {
      this.emit("message", message);
    }
  }

  /**
   * Routes an error to the oldest waiting request, or to `error` listeners.
   */
  private deliverError(error: SocketError): void {
    this.stats.lastError = error.message;
    const pending = this.pendingReplies.shift();
    if (pending) {
      pending.reject(error);
    } else if (this.listenerCount("error") > 0) {
      this.emit("error", error);
    }
  }

  private handleSocketError(error: Error): void {
    const socketError = new SocketError(
      `Socket error: ${error.message}`,
      "SOCKET_ERROR",
      this.socketPath
    );
    this.stats.lastError = socketError.message;
    this.setState(ConnectionState.Error);
    this.failPending(socketError);
    if (this.listenerCount("error") > 0) {
      this.emit("error", socketError);
    }
  }

  private handleSocketEnd(): void {
    if (this.state === ConnectionState.Closing || this.state === ConnectionState.Closed) {
      return;
    }
    this.failPending(
      new SocketError("Connection closed by peer", "CONNECTION_CLOSED", this.socketPath)
    );
    this.setState(ConnectionState.Disconnected);
    this.socket?.destroy();
    this.socket = null;
    this.emit("end");
  }

  private failPending(error: SocketError): void {
    for (const pending of this.pendingReplies.splice(0)) {
      pending.reject(error);
    }
  }

  private setState(newState: ConnectionState): void {
    const oldState = this.state;
    this.state = newState;
    if (oldState !== newState) {
      this.emit("stateChange", newState, oldState);
    }
  }
}
