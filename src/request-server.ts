/**
 * Request Server: accepts commands on the daemon's local socket.
 *
 * One connection carries one command: the client writes a JSON command and
 * half-closes, the daemon answers with a JSON result and closes its side.
 * Connections are served one at a time, in the order they were accepted.
 *
 * Emits:
 * - `listening` (socketPath) once bound
 * - `request` (command, result) after each served command
 * - `fatal` (error) when command execution hits a poisoned store
 */

import { EventEmitter } from "node:events";
import { rm } from "node:fs/promises";
import { type Server, type Socket, createServer } from "node:net";
import type { CommandEngine } from "./command-engine.js";
import { Mutex } from "./concurrency.js";
import { InvalidCommandError, StatePoisonedError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Command, CommandResult } from "./types.js";
import { validateCommand } from "./validation.js";

const DEFAULT_CONFIG = {
  /** Largest command accepted, in bytes */
  maxRequestSize: 64 * 1024,
} as const;

export interface RequestServerOptions {
  readonly socketPath: string;
  readonly engine: CommandEngine;
  readonly logger: Logger;
  readonly maxRequestSize?: number;
}

/**
 * Reads everything the peer sends until it half-closes.
 */
export async function readToEnd(socket: Socket, limit: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    socket.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new InvalidCommandError(`request exceeds ${limit} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    socket.once("end", () => resolve(Buffer.concat(chunks)));
    socket.once("error", reject);
  });
}

/**
 * Decodes a raw request into a command.
 *
 * @throws {InvalidCommandError} When the request is not valid JSON or not a command
 */
export function parseRequest(raw: Buffer): Command {
  let value: unknown;
  try {
    value = JSON.parse(raw.toString("utf8"));
  } catch (error) {
    throw new InvalidCommandError(errorMessage(error));
  }
  const result = validateCommand(value);
  if (!result.success || !result.data) {
    throw new InvalidCommandError(result.errors?.join(", ") ?? "malformed");
  }
  return result.data;
}

export class RequestServer extends EventEmitter {
  private readonly socketPath: string;
  private readonly engine: CommandEngine;
  private readonly logger: Logger;
  private readonly maxRequestSize: number;
  private readonly connectionMutex = new Mutex();
  private server: Server | null = null;

  constructor(options: RequestServerOptions) {
    super();
    this.socketPath = options.socketPath;
    this.engine = options.engine;
    this.logger = options.logger.child({ component: "request-server" });
    this.maxRequestSize = options.maxRequestSize ?? DEFAULT_CONFIG.maxRequestSize;
  }

  /**
   * Binds the socket, removing a stale socket file first.
   */
  async listen(): Promise<void> {
    if (this.server) {
      return;
    }

    await rm(this.socketPath, { force: true });

    const server = createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.socketPath, () => {
        server.off("error", reject);
        resolve();
      });
    });

    server.on("error", (error: Error) => {
      this.logger.error({ err: error }, "Request server error");
    });
    this.server = server;

    this.logger.info({ socketPath: this.socketPath }, "Listening for commands");
    this.emit("listening", this.socketPath);
  }

  /**
   * Stops accepting connections and removes the socket file.
   */
  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await rm(this.socketPath, { force: true });
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private accept(socket: Socket): void {
    this.connectionMutex
      .withLock(() => this.serve(socket))
      .catch((error: unknown) => {
        socket.destroy();
        if (error instanceof StatePoisonedError) {
          this.logger.fatal({ err: error }, "State store poisoned");
          this.emit("fatal", error);
          return;
        }
        this.logger.warn({ err: error }, `Dropped connection: ${errorMessage(error)}`);
      });
  }

  private async serve(socket: Socket): Promise<void> {
    let command: Command;
    try {
      command = parseRequest(await readToEnd(socket, this.maxRequestSize));
    } catch (error) {
      if (error instanceof InvalidCommandError) {
        this.logger.warn({ err: error }, "Rejected request");
        await this.reply(socket, { ok: false, message: error.message });
        return;
      }
      throw error;
    }

    this.logger.debug({ command }, "Received command");
    const result = await this.engine.execute(command);
    await this.reply(socket, result);
    this.emit("request", command, result);
  }

  private async reply(socket: Socket, result: CommandResult): Promise<void> {
    await new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
      socket.end(JSON.stringify(result), () => resolve());
    });
  }
}
