/**
 * Event Synchronizer: keeps the state store in line with the compositor's
 * event feed for the lifetime of the daemon.
 *
 * Events are applied strictly in arrival order. A malformed line or a failing
 * event is logged and skipped; the end of the feed is reported as
 * `terminated`, after every event received before it has been applied.
 *
 * Emits:
 * - `event` (event, summary) after each applied event
 * - `terminated` once the feed ends
 * - `fatal` (error) when the state store is poisoned
 */

import { EventEmitter } from "node:events";
import type { CompositorClient, CompositorEventStream } from "./compositor-client.js";
import { Mutex } from "./concurrency.js";
import { StatePoisonedError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { StateStore } from "./state-store.js";
import type { CompositorEvent } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface EventSynchronizerOptions {
  readonly store: StateStore;
  readonly compositor: CompositorClient;
  readonly logger: Logger;
}

export interface EventSynchronizerStats {
  readonly eventsReceived: number;
  readonly eventsApplied: number;
  readonly eventsFailed: number;
  readonly invalidEvents: number;
}

interface MutableStats {
  eventsReceived: number;
  eventsApplied: number;
  eventsFailed: number;
  invalidEvents: number;
}

// ============================================================================
// Event Synchronizer
// ============================================================================

export class EventSynchronizer extends EventEmitter {
  private readonly store: StateStore;
  private readonly compositor: CompositorClient;
  private readonly logger: Logger;
  private readonly processingMutex = new Mutex();
  private readonly stats: MutableStats = {
    eventsReceived: 0,
    eventsApplied: 0,
    eventsFailed: 0,
    invalidEvents: 0,
  };
  private stream: CompositorEventStream | null = null;

  constructor(options: EventSynchronizerOptions) {
    super();
    this.store = options.store;
    this.compositor = options.compositor;
    this.logger = options.logger.child({ component: "event-synchronizer" });
  }

  /**
   * Subscribes to the event feed and starts applying events.
   *
   * @throws When the subscription is refused; the daemon cannot run without it
   */
  async start(): Promise<void> {
    if (this.stream) {
      return;
    }

    const stream = await this.compositor.eventStream();
    this.stream = stream;

    stream.on("event", (event: CompositorEvent) => this.enqueue(event));
    stream.on("invalid", (error: Error) => {
      this.stats.invalidEvents++;
      this.logger.warn({ err: error }, "Skipping malformed event");
    });
    stream.on("error", (error: Error) => {
      this.logger.error({ err: error }, "Event stream error");
    });
    stream.on("end", () => {
      this.processingMutex
        .withLock(() => {
          this.logger.info("Compositor event stream ended");
          this.emit("terminated");
        })
        .catch((error: unknown) => this.reportFailure(error));
    });
    stream.resume();

    this.logger.info("Event synchronizer started");
  }

  /**
   * Closes the event feed connection.
   */
  async stop(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (stream) {
      await stream.close();
    }
  }

  /**
   * Resolves once every event received so far has been applied.
   */
  async idle(): Promise<void> {
    await this.processingMutex.withLock(() => undefined);
  }

  getStats(): EventSynchronizerStats {
    return { ...this.stats };
  }

  /**
   * Applies one event to the state store.
   *
   * @returns A short description of what was done
   */
  async apply(event: CompositorEvent): Promise<string> {
    switch (event.kind) {
      case "window-opened-or-changed":
        await this.store.upsertWindow(event.window);
        return `Updated window ${event.window.id}`;
      case "windows-changed":
        await this.store.replaceWindows(event.windows);
        return `Replaced ${event.windows.length} windows`;
      case "window-closed": {
        const remaining = await this.store.removeWindow(event.id);
        return `Removed window ${event.id}, ${remaining} left`;
      }
      case "window-focus-changed":
        await this.store.setFocus(event.id);
        return event.id === null ? "Cleared window focus" : `Focused window ${event.id}`;
      case "workspaces-changed":
        await this.store.replaceWorkspaces(event.workspaces);
        return `Replaced ${event.workspaces.length} workspaces`;
      case "workspace-activated":
        if (!event.focused) {
          await this.store.activateWorkspace(event.id);
          return `Activated workspace ${event.id}`;
        }
        return this.followToWorkspace(event.id);
      case "other":
        return `Ignored ${event.name}`;
      default: {
        const exhaustive: never = event;
        throw new Error(`Unhandled event: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  // ============================================================================
  // Private Implementation Methods
  // ============================================================================

  private enqueue(event: CompositorEvent): void {
    this.stats.eventsReceived++;
    this.processingMutex
      .withLock(() => this.apply(event))
      .then((summary) => {
        this.stats.eventsApplied++;
        this.logger.debug({ event: event.kind }, summary);
        this.emit("event", event, summary);
      })
      .catch((error: unknown) => {
        this.stats.eventsFailed++;
        this.reportFailure(error);
      });
  }

  /**
   * Focuses the workspace and brings every follow-mode window along.
   * A window that fails to move does not stop the others.
   */
  private async followToWorkspace(workspaceId: number): Promise<string> {
    await this.store.focusWorkspace(workspaceId);
    const followers = await this.store.followMode();

    let moved = 0;
    for (const windowId of followers) {
      try {
        await this.compositor.performAction({
          MoveWindowToWorkspace: {
            window_id: windowId,
            reference: { Id: workspaceId },
            focus: true,
          },
        });
        moved++;
      } catch (error) {
        this.logger.warn(
          { err: error, windowId, workspaceId },
          `Cannot move follow-mode window: ${errorMessage(error)}`
        );
      }
    }

    return `Focused workspace ${workspaceId}, moved ${moved} follow-mode windows`;
  }

  private reportFailure(error: unknown): void {
    if (error instanceof StatePoisonedError) {
      this.logger.fatal({ err: error }, "State store poisoned");
      this.emit("fatal", error);
      return;
    }
    this.logger.error({ err: error }, `Failed to apply event: ${errorMessage(error)}`);
  }
}
