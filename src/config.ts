/**
 * Configuration and socket path resolution.
 *
 * The compositor socket comes from `$NIRI_SOCKET`. The daemon's own command
 * socket lives in `$XDG_RUNTIME_DIR` and is named after `$WAYLAND_DISPLAY`, so
 * one daemon per compositor session never collides with another.
 */

import { join } from "node:path";
import { ConfigurationError } from "./errors.js";
import { type LogLevel, isLogLevel } from "./logger.js";
import type { ValidationResult } from "./types.js";

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_CONFIG = {
  /** Used when XDG_RUNTIME_DIR is unset */
  runtimeDir: "/tmp",
  /** Used when WAYLAND_DISPLAY is unset */
  display: "unknown",
  logLevel: "info",
  /** Compositor connection timeout in milliseconds */
  connectionTimeout: 5000,
} as const;

/** Environment variables read by {@link resolveConfig} */
export const ENV = {
  compositorSocket: "NIRI_SOCKET",
  runtimeDir: "XDG_RUNTIME_DIR",
  display: "WAYLAND_DISPLAY",
  logLevel: "NIRI_PILOT_LOG",
  commandSocket: "NIRI_PILOT_SOCKET",
} as const;

// ============================================================================
// Types
// ============================================================================

export interface PilotConfig {
  /** Path of the compositor's IPC socket */
  readonly compositorSocketPath: string;
  /** Path of the daemon's command socket */
  readonly commandSocketPath: string;
  readonly logLevel: LogLevel;
  readonly connectionTimeout: number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Computes the daemon's command socket path.
 * `$NIRI_PILOT_SOCKET` wins when set.
 */
export function resolveCommandSocketPath(env: Environment = process.env): string {
  const explicit = env[ENV.commandSocket];
  if (explicit) {
    return explicit;
  }

  const runtimeDir = env[ENV.runtimeDir] || DEFAULT_CONFIG.runtimeDir;
  const display = env[ENV.display] || DEFAULT_CONFIG.display;
  return join(runtimeDir, `niri-pilot-${display}.sock`);
}

/**
 * Validates a configuration object field by field.
 */
export function validateConfig(value: Partial<PilotConfig>): ValidationResult<PilotConfig> {
  const errors: string[] = [];

  if (!value.compositorSocketPath) {
    errors.push(`compositor socket path is not set (is $${ENV.compositorSocket} exported?)`);
  }
  if (!value.commandSocketPath) {
    errors.push("command socket path must not be empty");
  }
  if (value.logLevel === undefined || !isLogLevel(value.logLevel)) {
    errors.push(`log level must be one of fatal, error, warn, info, debug, trace, silent`);
  }
  if (
    value.connectionTimeout === undefined ||
    !Number.isFinite(value.connectionTimeout) ||
    value.connectionTimeout <= 0
  ) {
    errors.push("connection timeout must be a positive number");
  }

  if (
    errors.length > 0 ||
    !value.compositorSocketPath ||
    !value.commandSocketPath ||
    value.logLevel === undefined ||
    value.connectionTimeout === undefined
  ) {
    return { success: false, data: undefined, errors };
  }

  return {
    success: true,
    data: {
      compositorSocketPath: value.compositorSocketPath,
      commandSocketPath: value.commandSocketPath,
      logLevel: value.logLevel,
      connectionTimeout: value.connectionTimeout,
    },
    errors: undefined,
  };
}

/**
 * Builds the configuration from the environment, with explicit overrides
 * taking precedence.
 *
 * @throws {ConfigurationError} When the result does not validate
 */
export function resolveConfig(
  env: Environment = process.env,
  overrides: Partial<PilotConfig> = {}
): PilotConfig {
  const rawLevel = env[ENV.logLevel];
  const candidate: Partial<PilotConfig> = {
    compositorSocketPath: overrides.compositorSocketPath ?? env[ENV.compositorSocket] ?? "",
    commandSocketPath: overrides.commandSocketPath ?? resolveCommandSocketPath(env),
    logLevel:
      overrides.logLevel ??
      (rawLevel === undefined ? DEFAULT_CONFIG.logLevel : isLogLevel(rawLevel) ? rawLevel : undefined),
    connectionTimeout: overrides.connectionTimeout ?? DEFAULT_CONFIG.connectionTimeout,
  };

  const result = validateConfig(candidate);
  if (!result.success || !result.data) {
    throw new ConfigurationError(`Invalid configuration: ${result.errors?.join("; ")}`);
  }
  return result.data;
}
