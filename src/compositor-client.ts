/**
 * Compositor Client: typed request/response access to niri's IPC socket.
 *
 * Every request opens its own connection, sends one line, reads one reply and
 * closes. The event stream is the only long-lived connection. Nothing here
 * retries; a failed request is reported once to the caller.
 */

import { EventEmitter } from "node:events";
import { CompositorError, UnexpectedReplyError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { SocketConnection, type SocketConnectionConfig, SocketError } from "./socket-communication.js";
import type {
  CompositorAction,
  CompositorEvent,
  CompositorRequest,
  Window,
  Workspace,
} from "./types.js";
import {
  isCompositorReply,
  validateCompositorEvent,
  validateNiriWindow,
  validateNiriWindowArray,
  validateNiriWorkspaceArray,
} from "./validation.js";

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Operations the daemon needs from the compositor.
 * The state mirror is fed by {@link eventStream}; the query methods exist for
 * one-off lookups and diagnostics.
 */
export interface CompositorClient {
  windows(): Promise<readonly Window[]>;
  workspaces(): Promise<readonly Workspace[]>;
  focusedWindow(): Promise<Window | undefined>;
  /** Performs an action; resolves once the compositor replied `Handled` */
  performAction(action: CompositorAction): Promise<void>;
  /** Opens the persistent event stream */
  eventStream(): Promise<CompositorEventStream>;
}

// ============================================================================
// Event Stream
// ============================================================================

/**
 * Decoded view of the compositor's event feed.
 *
 * Emits `event` with a {@link CompositorEvent} per valid line, `invalid` with
 * an Error for a line that does not decode, `error` for transport failures and
 * `end` once when the feed terminates.
 *
 * The stream starts paused: everything received before {@link resume} is
 * queued, so a consumer attaching its listeners late loses nothing.
 */
export class CompositorEventStream extends EventEmitter {
  private ended = false;
  private paused = true;
  private readonly queued: Array<() => void> = [];
  private readonly closeFn: () => Promise<void>;

  constructor(closeFn: () => Promise<void> = async () => undefined) {
    super();
    this.closeFn = closeFn;
  }

  /**
   * Feeds a stream from an event-stream connection. The feed ends when the
   * peer closes, and also after a transport error that left the connection
   * unusable.
   */
  static fromConnection(connection: SocketConnection): CompositorEventStream {
    const stream = new CompositorEventStream(() => connection.close());
    connection.on("message", (message: unknown) => stream.accept(message));
    connection.on("error", (error: SocketError) => {
      stream.fail(error);
      if (!connection.isConnected()) {
        stream.finish();
      }
    });
    connection.on("end", () => stream.finish());
    return stream;
  }

  /** Decodes one raw event line and emits it */
  accept(raw: unknown): void {
    const result = validateCompositorEvent(raw);
    if (result.success && result.data) {
      const event: CompositorEvent = result.data;
      this.dispatch(() => this.emit("event", event));
    } else {
      const error = new Error(`Invalid event: ${result.errors?.join(", ")}`);
      this.dispatch(() => this.emit("invalid", error));
    }
  }

  /** Reports a transport failure without ending the stream */
  fail(error: Error): void {
    this.dispatch(() => {
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
    });
  }

  /** Marks the feed as terminated */
  finish(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    this.dispatch(() => this.emit("end"));
  }

  /** Starts delivery, flushing everything queued so far in order */
  resume(): void {
    this.paused = false;
    for (const deliver of this.queued.splice(0)) {
      deliver();
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  async close(): Promise<void> {
    await this.closeFn();
  }

  private dispatch(deliver: () => void): void {
    if (this.paused) {
      this.queued.push(deliver);
    } else {
      deliver();
    }
  }
}

// ============================================================================
// niri Client
// ============================================================================

export interface NiriClientConfig extends SocketConnectionConfig {
  /** Path of niri's IPC socket, usually `$NIRI_SOCKET` */
  readonly socketPath: string;
}

/**
 * Compositor client speaking niri's JSON protocol.
 */
export class NiriClient implements CompositorClient {
  private readonly config: NiriClientConfig;
  private readonly logger: Logger;

  constructor(config: NiriClientConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: "compositor-client" });
  }

  async windows(): Promise<readonly Window[]> {
    const payload = expectVariant(await this.send("Windows"), "Windows");
    const result = validateNiriWindowArray(payload);
    if (!result.success || !result.data) {
      throw new UnexpectedReplyError({ Windows: payload });
    }
    return result.data;
  }

  async workspaces(): Promise<readonly Workspace[]> {
    const payload = expectVariant(await this.send("Workspaces"), "Workspaces");
    const result = validateNiriWorkspaceArray(payload);
    if (!result.success || !result.data) {
      throw new UnexpectedReplyError({ Workspaces: payload });
    }
    return result.data;
  }

  async focusedWindow(): Promise<Window | undefined> {
    const payload = expectVariant(await this.send("FocusedWindow"), "FocusedWindow");
    if (payload === null) {
      return undefined;
    }
    const result = validateNiriWindow(payload);
    if (!result.success || !result.data) {
      throw new UnexpectedReplyError({ FocusedWindow: payload });
    }
    return result.data;
  }

  async performAction(action: CompositorAction): Promise<void> {
    const response = await this.send({ Action: action });
    if (response !== "Handled") {
      throw new UnexpectedReplyError(response);
    }
  }

  /**
   * Subscribes to the event stream on a dedicated connection.
   *
   * @throws {UnexpectedReplyError} When niri does not acknowledge the subscription
   */
  async eventStream(): Promise<CompositorEventStream> {
    const connection = new SocketConnection(this.config.socketPath, this.config);
    await connection.connect();

    // Listeners go on before the request: events may share a chunk with the reply
    const stream = CompositorEventStream.fromConnection(connection);

    let response: unknown;
    try {
      response = unwrapReply(await connection.request("EventStream"));
    } catch (error) {
      await connection.close();
      throw error;
    }
    if (response !== "Handled") {
      await connection.close();
      throw new UnexpectedReplyError(response);
    }

    this.logger.debug("Subscribed to compositor event stream");
    return stream;
  }

  /**
   * Sends one request on a fresh connection and unwraps the reply envelope.
   */
  async send(request: CompositorRequest): Promise<unknown> {
    const connection = new SocketConnection(this.config.socketPath, this.config);
    try {
      await connection.connect();
      const reply = await connection.request(request);
      this.logger.trace({ request, reply }, "Compositor round trip");
      return unwrapReply(reply);
    } catch (error) {
      if (error instanceof SocketError) {
        this.logger.error({ err: error, request }, `Cannot talk to compositor: ${errorMessage(error)}`);
      }
      throw error;
    } finally {
      await connection.close();
    }
  }
}

// ============================================================================
// Reply Helpers
// ============================================================================

/**
 * Unwraps niri's `{"Ok": ...}` / `{"Err": ...}` envelope.
 *
 * @throws {CompositorError} For an `Err` reply, with its message verbatim
 * @throws {UnexpectedReplyError} When the value is not an envelope at all
 */
export function unwrapReply(reply: unknown): unknown {
  if (!isCompositorReply(reply)) {
    throw new UnexpectedReplyError(reply);
  }
  if ("Err" in reply) {
    throw new CompositorError(reply.Err);
  }
  return reply.Ok;
}

/**
 * Extracts the payload of a single-key response variant such as
 * `{"Windows": [...]}`.
 *
 * @throws {UnexpectedReplyError} When the response is a different variant
 */
export function expectVariant(response: unknown, variant: string): unknown {
  if (typeof response !== "object" || response === null || Array.isArray(response)) {
    throw new UnexpectedReplyError(response);
  }
  const entry = Object.entries(response).find(([key]) => key === variant);
  if (!entry) {
    throw new UnexpectedReplyError(response);
  }
  return entry[1];
}
