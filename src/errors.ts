/**
 * Error hierarchy shared by the daemon's components.
 *
 * Every error carries a stable `code`. Domain errors (subclasses of
 * `CommandError`) are reported to the client as the command's failure message;
 * `NoMatchingWindowError` is the one the spawn fallbacks look for.
 */

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for the daemon.
 */
export class PilotError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "PilotError";
    this.code = code;
  }
}

// ============================================================================
// Protocol Errors
// ============================================================================

/**
 * Error reply sent by the compositor, message kept verbatim.
 */
export class CompositorError extends PilotError {
  constructor(message: string) {
    super(message, "COMPOSITOR_ERROR");
    this.name = "CompositorError";
  }
}

/**
 * Reply variant that does not fit the request that was sent.
 */
export class UnexpectedReplyError extends PilotError {
  public readonly reply: unknown;

  constructor(reply: unknown) {
    super(`received unexpected reply: ${JSON.stringify(reply)}`, "UNEXPECTED_REPLY");
    this.name = "UnexpectedReplyError";
    this.reply = reply;
  }
}

// ============================================================================
// Domain Errors
// ============================================================================

/**
 * Base class of failures a command reports to its client.
 */
export class CommandError extends PilotError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = "CommandError";
  }
}

export class NoMatchingWindowError extends CommandError {
  constructor() {
    super("No matching window", "NO_MATCHING_WINDOW");
    this.name = "NoMatchingWindowError";
  }
}

export class NoFocusedWindowError extends CommandError {
  constructor() {
    super("No focused window", "NO_FOCUSED_WINDOW");
    this.name = "NoFocusedWindowError";
  }
}

export class NoFocusedWorkspaceError extends CommandError {
  constructor() {
    super("No focused workspace", "NO_FOCUSED_WORKSPACE");
    this.name = "NoFocusedWorkspaceError";
  }
}

export class UnknownMarkError extends CommandError {
  public readonly mark: string;

  constructor(mark: string) {
    super(`Unknown mark '${mark}'`, "UNKNOWN_MARK");
    this.name = "UnknownMarkError";
    this.mark = mark;
  }
}

export class NoMarkedWindowError extends CommandError {
  constructor(mark: string) {
    super(`No other window marked with '${mark}'`, "NO_MARKED_WINDOW");
    this.name = "NoMarkedWindowError";
  }
}

export class EmptyScratchpadError extends CommandError {
  constructor() {
    super("Scratchpad is empty", "EMPTY_SCRATCHPAD");
    this.name = "EmptyScratchpadError";
  }
}

export class NoWorkspaceError extends CommandError {
  constructor(output: string | undefined) {
    super(`No workspace on output '${output ?? "unknown"}'`, "NO_WORKSPACE");
    this.name = "NoWorkspaceError";
  }
}

export class InvalidFilterError extends CommandError {
  constructor(filter: string, reason: string) {
    super(`invalid filter '${filter}': ${reason}`, "INVALID_FILTER");
    this.name = "InvalidFilterError";
  }
}

export class InvalidCommandError extends CommandError {
  constructor(reason: string) {
    super(`invalid command: ${reason}`, "INVALID_COMMAND");
    this.name = "InvalidCommandError";
  }
}

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * Raised by every store operation once a write critical section has failed
 * unexpectedly. The daemon exits when it sees this.
 */
export class StatePoisonedError extends PilotError {
  constructor(cause: unknown) {
    super(
      `state store is poisoned: ${cause instanceof Error ? cause.message : String(cause)}`,
      "STATE_POISONED"
    );
    this.name = "StatePoisonedError";
  }
}

/**
 * Invalid or missing configuration.
 */
export class ConfigurationError extends PilotError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
