/**
 * In-memory mirror of the compositor plus the daemon's own bookkeeping:
 * marks, follow-mode, scratchpad, cycle memory and the last command.
 *
 * Everything here is synchronous and unsynchronized; {@link StateStore}
 * wraps one instance behind a read-write lock.
 */

import { isDeepStrictEqual } from "node:util";
import { NoWorkspaceError } from "./errors.js";
import type { Command, Window, Workspace } from "./types.js";

/** Mark used when a command names none */
export const DEFAULT_MARK = "__default__";

// ============================================================================
// Read-Only View
// ============================================================================

/**
 * Queries available to read-locked callers.
 */
export interface StateView {
  /** Windows, least recently focused first */
  getWindows(): readonly Window[];
  getWindow(id: number): Window | undefined;
  focusedWindow(): Window | undefined;
  getWorkspaces(): readonly Workspace[];
  getWorkspace(id: number): Workspace | undefined;
  focusedWorkspace(): Workspace | undefined;
  /**
   * The workspace with the highest index on `output`.
   *
   * @throws {NoWorkspaceError} When the output has no workspaces
   */
  findBottomWorkspace(output: string | undefined): Workspace;
  /** Mark names with their window ids, in creation order */
  getMarks(): ReadonlyMap<string, readonly number[]>;
  getMark(name: string): readonly number[] | undefined;
  getFollowMode(): readonly number[];
  getScratchpad(): readonly number[];
  getCycleMemory(): readonly number[];
  getLastCommand(): Command | undefined;
}

// ============================================================================
// Helpers
// ============================================================================

/** Removes `id` from `ids` in place, keeping the order of the rest */
function removeId(ids: number[], id: number): boolean {
  const index = ids.indexOf(id);
  if (index < 0) {
    return false;
  }
  ids.splice(index, 1);
  return true;
}

/** Adds `id` if absent, removes it if present. Returns true when added. */
function toggleId(ids: number[], id: number): boolean {
  if (removeId(ids, id)) {
    return false;
  }
  ids.push(id);
  return true;
}

// ============================================================================
// Daemon State
// ============================================================================

export class DaemonState implements StateView {
  private windows: Window[] = [];
  private workspaces: Workspace[] = [];
  private readonly marks = new Map<string, number[]>();
  private readonly followMode: number[] = [];
  private readonly scratchpad: number[] = [];
  private readonly cycleMemory: number[] = [];
  private lastCommand: Command | undefined;

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  getWindows(): readonly Window[] {
    return this.windows;
  }

  getWindow(id: number): Window | undefined {
    return this.windows.find((window) => window.id === id);
  }

  focusedWindow(): Window | undefined {
    return this.windows.find((window) => window.isFocused);
  }

  getWorkspaces(): readonly Workspace[] {
    return this.workspaces;
  }

  getWorkspace(id: number): Workspace | undefined {
    return this.workspaces.find((workspace) => workspace.id === id);
  }

  focusedWorkspace(): Workspace | undefined {
    return this.workspaces.find((workspace) => workspace.isFocused);
  }

  findBottomWorkspace(output: string | undefined): Workspace {
    let bottom: Workspace | undefined;
    for (const workspace of this.workspaces) {
      if (output !== undefined && workspace.output === output) {
        if (!bottom || workspace.index > bottom.index) {
          bottom = workspace;
        }
      }
    }
    if (!bottom) {
      throw new NoWorkspaceError(output);
    }
    return bottom;
  }

  getMarks(): ReadonlyMap<string, readonly number[]> {
    return this.marks;
  }

  getMark(name: string): readonly number[] | undefined {
    return this.marks.get(name);
  }

  getFollowMode(): readonly number[] {
    return this.followMode;
  }

  getScratchpad(): readonly number[] {
    return this.scratchpad;
  }

  getCycleMemory(): readonly number[] {
    return this.cycleMemory;
  }

  getLastCommand(): Command | undefined {
    return this.lastCommand;
  }

  // --------------------------------------------------------------------------
  // Windows
  // --------------------------------------------------------------------------

  /**
   * Inserts a window or replaces the one with the same id in place.
   * A focused newcomer takes the focus from every other window.
   */
  upsertWindow(window: Window): void {
    if (window.isFocused) {
      this.clearWindowFocus();
    }

    const index = this.windows.findIndex((existing) => existing.id === window.id);
    if (index >= 0) {
      this.windows[index] = window;
    } else {
      this.windows.push(window);
    }
  }

  /**
   * Deletes a window and purges its id from marks, follow-mode, scratchpad
   * and cycle memory.
   *
   * @returns Number of remaining windows
   */
  removeWindow(id: number): number {
    this.windows = this.windows.filter((window) => window.id !== id);
    this.purgeId(id);
    return this.windows.length;
  }

  /**
   * Replaces the whole window list, purging ids of windows that disappeared.
   */
  replaceWindows(windows: readonly Window[]): void {
    const present = new Set(windows.map((window) => window.id));
    const vanished = this.windows.filter((window) => !present.has(window.id));

    this.windows = [];
    for (const window of windows) {
      this.upsertWindow(window);
    }
    for (const window of vanished) {
      this.purgeId(window.id);
    }
  }

  /**
   * Moves the focus to `id`, or nowhere for `null`. The newly focused window
   * becomes the last entry of the window list.
   */
  setFocus(id: number | null): void {
    this.clearWindowFocus();
    if (id === null) {
      return;
    }

    const index = this.windows.findIndex((window) => window.id === id);
    const window = this.windows[index];
    if (index < 0 || !window) {
      return;
    }
    this.windows.splice(index, 1);
    this.windows.push({ ...window, isFocused: true });
  }

  // --------------------------------------------------------------------------
  // Workspaces
  // --------------------------------------------------------------------------

  replaceWorkspaces(workspaces: readonly Workspace[]): void {
    this.workspaces = [...workspaces];
  }

  /**
   * Focuses workspace `id`, which also makes it the active one of its output.
   */
  focusWorkspace(id: number): void {
    const target = this.getWorkspace(id);
    this.workspaces = this.workspaces.map((workspace) => ({
      ...workspace,
      isFocused: workspace.id === id,
      isActive:
        target !== undefined && workspace.output === target.output
          ? workspace.id === id
          : workspace.isActive,
    }));
  }

  /**
   * Makes workspace `id` the active one of its output without moving focus.
   */
  activateWorkspace(id: number): void {
    const target = this.getWorkspace(id);
    if (!target) {
      return;
    }
    this.workspaces = this.workspaces.map((workspace) =>
      workspace.output === target.output
        ? { ...workspace, isActive: workspace.id === id }
        : workspace
    );
  }

  // --------------------------------------------------------------------------
  // Marks, Follow-Mode, Scratchpad
  // --------------------------------------------------------------------------

  /**
   * Toggles `id` in the follow-mode set.
   *
   * @returns True when the window was enrolled, false when it was removed
   */
  toggleFollowMode(id: number): boolean {
    return toggleId(this.followMode, id);
  }

  /**
   * Toggles `id` in mark `name`. A mark left empty by the toggle is deleted.
   *
   * @returns True when the window was marked, false when it was unmarked
   */
  toggleMark(name: string, id: number): boolean {
    const ids = this.marks.get(name) ?? [];
    const added = toggleId(ids, id);
    if (ids.length === 0) {
      this.marks.delete(name);
    } else {
      this.marks.set(name, ids);
    }
    return added;
  }

  /**
   * Drops ids of windows that no longer exist from mark `name`.
   *
   * @returns The remaining ids, or undefined for an unknown mark
   */
  pruneMark(name: string): readonly number[] | undefined {
    const ids = this.marks.get(name);
    if (!ids) {
      return undefined;
    }
    const pruned = ids.filter((id) => this.getWindow(id) !== undefined);
    this.marks.set(name, pruned);
    return pruned;
  }

  /**
   * Toggles `id` in the scratchpad set.
   *
   * @returns True when the window was added, false when it was removed
   */
  toggleScratchpad(id: number): boolean {
    return toggleId(this.scratchpad, id);
  }

  // --------------------------------------------------------------------------
  // Cycle Memory
  // --------------------------------------------------------------------------

  rememberVisited(id: number): void {
    if (!this.cycleMemory.includes(id)) {
      this.cycleMemory.push(id);
    }
  }

  clearCycleMemory(): void {
    this.cycleMemory.length = 0;
  }

  /**
   * Records `command` as the last command. Cycle memory is cleared exactly
   * when it differs structurally from the previous one.
   *
   * @returns True when the cycle memory was reset
   */
  recordCommand(command: Command): boolean {
    const changed = !isDeepStrictEqual(this.lastCommand, command);
    if (changed) {
      this.clearCycleMemory();
    }
    this.lastCommand = command;
    return changed;
  }

  // --------------------------------------------------------------------------
  // Private
  // --------------------------------------------------------------------------

  private clearWindowFocus(): void {
    this.windows = this.windows.map((window) =>
      window.isFocused ? { ...window, isFocused: false } : window
    );
  }

  private purgeId(id: number): void {
    for (const [name, ids] of [...this.marks]) {
      removeId(ids, id);
      if (ids.length === 0) {
        this.marks.delete(name);
      }
    }
    removeId(this.followMode, id);
    removeId(this.scratchpad, id);
    removeId(this.cycleMemory, id);
  }
}
