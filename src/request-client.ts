/**
 * Client side of the daemon's command socket.
 */

import { createConnection } from "node:net";
import { errorMessage } from "./errors.js";
import { SocketError } from "./socket-communication.js";
import type { Command, CommandResult } from "./types.js";
import { validateCommandResult } from "./validation.js";

const DEFAULT_CONFIG = {
  /** How long to wait for the daemon's answer, in milliseconds */
  timeout: 30000,
} as const;

export interface RequestClientOptions {
  readonly timeout?: number;
}

/** Where the exit contract writes */
export interface OutputStreams {
  readonly stdout: { write(chunk: string): unknown };
  readonly stderr: { write(chunk: string): unknown };
}

function invalidResponse(socketPath: string, reason: string): SocketError {
  return new SocketError(`invalid response from daemon: ${reason}`, "DESERIALIZE_FAILED", socketPath);
}

/**
 * Sends one command and waits for the daemon's result.
 *
 * The request is written in full and the write side closed; the daemon
 * answers once it sees the end of the request.
 *
 * @throws {SocketError} When the daemon is unreachable, times out or answers
 * with something that is not a result
 */
export async function sendCommand(
  socketPath: string,
  command: Command,
  options: RequestClientOptions = {}
): Promise<CommandResult> {
  const timeout = options.timeout ?? DEFAULT_CONFIG.timeout;

  return new Promise((resolve, reject) => {
    const socket = createConnection({ path: socketPath, allowHalfOpen: true });
    const chunks: Buffer[] = [];

    socket.on("connect", () => {
      socket.end(JSON.stringify(command));
    });

    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });

    socket.on("end", () => {
      socket.destroy();
      const raw = Buffer.concat(chunks).toString("utf8");
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch (error) {
        reject(invalidResponse(socketPath, errorMessage(error)));
        return;
      }
      const result = validateCommandResult(value);
      if (!result.success || !result.data) {
        reject(invalidResponse(socketPath, result.errors?.join(", ") ?? "malformed"));
        return;
      }
      resolve(result.data);
    });

    socket.on("error", (error) => {
      reject(
        new SocketError(
          `cannot connect to daemon at ${socketPath}: ${error.message}`,
          "CONNECTION_FAILED",
          socketPath
        )
      );
    });

    socket.setTimeout(timeout, () => {
      socket.destroy();
      reject(
        new SocketError(
          `timeout waiting for daemon response (${Math.ceil(timeout / 1000)}s)`,
          "CONNECTION_TIMEOUT",
          socketPath
        )
      );
    });
  });
}

/**
 * Writes a result the way the client reports it and returns the exit code.
 *
 * Success prints a non-empty message to stdout and exits 0. Failure prints a
 * non-empty message to stderr and exits 1. Messages are trimmed first.
 */
export function reportResult(result: CommandResult, output: OutputStreams): number {
  const message = result.message.trim();
  if (result.ok) {
    if (message.length > 0) {
      output.stdout.write(`${message}\n`);
    }
    return 0;
  }
  if (message.length > 0) {
    output.stderr.write(`${message}\n`);
  }
  return 1;
}
