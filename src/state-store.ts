/**
 * State Store: the single shared {@link DaemonState}, guarded by a
 * read-write lock.
 *
 * Critical sections are synchronous callbacks, so no compositor I/O can
 * happen while a lock is held. A write section that throws anything other
 * than a {@link CommandError} leaves the state in an unknown shape; the store
 * is then poisoned and every later operation fails with
 * {@link StatePoisonedError}.
 */

import { ReadWriteLock } from "./concurrency.js";
import { CommandError, StatePoisonedError } from "./errors.js";
import { DaemonState, type StateView } from "./state.js";
import type { Command, Window, Workspace } from "./types.js";

export class StateStore {
  private readonly lock = new ReadWriteLock();
  private readonly state: DaemonState;
  private poisoned: StatePoisonedError | undefined;

  constructor(state: DaemonState = new DaemonState()) {
    this.state = state;
  }

  /**
   * Runs `fn` with shared access. Any number of readers proceed together.
   */
  async read<T>(fn: (state: StateView) => T): Promise<T> {
    return this.lock.withReadLock(() => {
      this.assertHealthy();
      return fn(this.state);
    });
  }

  /**
   * Runs `fn` with exclusive access.
   *
   * @throws {StatePoisonedError} When `fn` fails with a non-command error, or
   * an earlier write did
   */
  async write<T>(fn: (state: DaemonState) => T): Promise<T> {
    return this.lock.withWriteLock(() => {
      this.assertHealthy();
      try {
        return fn(this.state);
      } catch (error) {
        if (error instanceof CommandError) {
          throw error;
        }
        this.poisoned = new StatePoisonedError(error);
        throw this.poisoned;
      }
    });
  }

  isPoisoned(): boolean {
    return this.poisoned !== undefined;
  }

  // ============================================================================
  // Convenience Operations
  // ============================================================================

  async upsertWindow(window: Window): Promise<void> {
    await this.write((state) => state.upsertWindow(window));
  }

  async removeWindow(id: number): Promise<number> {
    return this.write((state) => state.removeWindow(id));
  }

  async replaceWindows(windows: readonly Window[]): Promise<void> {
    await this.write((state) => state.replaceWindows(windows));
  }

  async setFocus(id: number | null): Promise<void> {
    await this.write((state) => state.setFocus(id));
  }

  async replaceWorkspaces(workspaces: readonly Workspace[]): Promise<void> {
    await this.write((state) => state.replaceWorkspaces(workspaces));
  }

  async focusWorkspace(id: number): Promise<void> {
    await this.write((state) => state.focusWorkspace(id));
  }

  async activateWorkspace(id: number): Promise<void> {
    await this.write((state) => state.activateWorkspace(id));
  }

  async recordCommand(command: Command): Promise<boolean> {
    return this.write((state) => state.recordCommand(command));
  }

  async windows(): Promise<readonly Window[]> {
    return this.read((state) => [...state.getWindows()]);
  }

  async workspaces(): Promise<readonly Workspace[]> {
    return this.read((state) => [...state.getWorkspaces()]);
  }

  async followMode(): Promise<readonly number[]> {
    return this.read((state) => [...state.getFollowMode()]);
  }

  private assertHealthy(): void {
    if (this.poisoned) {
      throw this.poisoned;
    }
  }
}
