/**
 * niri-pilot
 * Window navigation helpers for the niri compositor: a daemon mirroring the
 * compositor's state and a client sending it commands.
 */

// Export all type definitions
export * from "./types.js";

// Export error classes
export * from "./errors.js";

// Export validation utilities
export * from "./validation.js";

// Export configuration and logging
export * from "./config.js";
export * from "./logger.js";

// Export socket communication layer
export * from "./socket-communication.js";

// Export compositor client
export * from "./compositor-client.js";

// Export concurrency utilities
export * from "./concurrency.js";

// Export state mirror and its store
export * from "./state.js";
export * from "./state-store.js";

// Export window matching and command execution
export * from "./window-matching.js";
export * from "./command-engine.js";

// Export event synchronization
export * from "./event-system.js";

// Export command socket server and client
export * from "./request-server.js";
export * from "./request-client.js";

// Export daemon and command-line entry points
export * from "./daemon.js";
export * from "./cli.js";
