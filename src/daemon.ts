/**
 * Daemon wiring: one state store shared by the event synchronizer and the
 * request server.
 */

import { CommandEngine } from "./command-engine.js";
import { type CompositorClient, NiriClient } from "./compositor-client.js";
import { type Environment, type PilotConfig, resolveConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { EventSynchronizer } from "./event-system.js";
import { type Logger, createLogger } from "./logger.js";
import { RequestServer } from "./request-server.js";
import { StateStore } from "./state-store.js";

export interface DaemonOptions {
  readonly config: PilotConfig;
  readonly logger: Logger;
  /** Defaults to a niri client on the configured socket */
  readonly compositor?: CompositorClient;
}

export interface Daemon {
  readonly store: StateStore;
  readonly engine: CommandEngine;
  readonly synchronizer: EventSynchronizer;
  readonly server: RequestServer;
  stop(): Promise<void>;
}

/**
 * Subscribes to the compositor's events, then starts serving commands.
 *
 * @throws When the event stream cannot be opened or the socket cannot be bound
 */
export async function startDaemon(options: DaemonOptions): Promise<Daemon> {
  const { config, logger } = options;
  const compositor =
    options.compositor ??
    new NiriClient(
      { socketPath: config.compositorSocketPath, connectionTimeout: config.connectionTimeout },
      logger
    );

  const store = new StateStore();
  const engine = new CommandEngine({ store, compositor, logger });
  const synchronizer = new EventSynchronizer({ store, compositor, logger });
  const server = new RequestServer({ socketPath: config.commandSocketPath, engine, logger });

  await synchronizer.start();
  try {
    await server.listen();
  } catch (error) {
    await synchronizer.stop();
    throw error;
  }

  return {
    store,
    engine,
    synchronizer,
    server,
    async stop() {
      await server.close();
      await synchronizer.stop();
    },
  };
}

/**
 * Process entry point of `niri-pilotd`. Resolves with the exit code once the
 * daemon should exit: 0 when the compositor's feed ends or on a signal, 1 on
 * startup failure or a poisoned state store.
 */
export async function runDaemon(env: Environment = process.env): Promise<number> {
  let config: PilotConfig;
  try {
    config = resolveConfig(env);
  } catch (error) {
    process.stderr.write(`niri-pilotd: ${errorMessage(error)}\n`);
    return 1;
  }

  const logger = createLogger({ level: config.logLevel, name: "niri-pilotd" });

  let daemon: Daemon;
  try {
    daemon = await startDaemon({ config, logger });
  } catch (error) {
    logger.fatal({ err: error }, `Cannot start daemon: ${errorMessage(error)}`);
    return 1;
  }

  const code = await new Promise<number>((resolve) => {
    daemon.synchronizer.once("terminated", () => resolve(0));
    daemon.synchronizer.once("fatal", () => resolve(1));
    daemon.server.once("fatal", () => resolve(1));
    process.once("SIGINT", () => resolve(0));
    process.once("SIGTERM", () => resolve(0));
  });

  logger.info({ code }, "Shutting down");
  await daemon.stop();
  return code;
}
