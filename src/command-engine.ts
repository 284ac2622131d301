/**
 * Command Engine: turns client commands into compositor actions and state
 * mutations.
 *
 * Selection happens inside a store critical section; the resulting compositor
 * requests are issued only after the lock is released.
 */

import type { CompositorClient } from "./compositor-client.js";
import {
  CommandError,
  CompositorError,
  EmptyScratchpadError,
  NoFocusedWindowError,
  NoFocusedWorkspaceError,
  NoMarkedWindowError,
  NoMatchingWindowError,
  StatePoisonedError,
  UnexpectedReplyError,
  UnknownMarkError,
  errorMessage,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { SocketError } from "./socket-communication.js";
import { DEFAULT_MARK, type DaemonState, type StateView } from "./state.js";
import type { StateStore } from "./state-store.js";
import type { Command, CommandResult, MatchOptions, Window, Workspace } from "./types.js";
import { type WindowMatcher, compileMatcher } from "./window-matching.js";

// ============================================================================
// Selection
// ============================================================================

/**
 * Picks the next window of a focus cycle and records it as visited.
 *
 * Candidates are ordered with the focused window last, unvisited windows
 * before visited ones, then by ascending id. Once every candidate has been
 * visited the cycle memory starts over.
 *
 * @throws {NoMatchingWindowError} When nothing matches
 */
export function selectCycleCandidate(state: DaemonState, matcher: WindowMatcher): number {
  const candidates = state.getWindows().filter(matcher);
  if (candidates.length === 0) {
    throw new NoMatchingWindowError();
  }

  if (candidates.every((window) => state.getCycleMemory().includes(window.id))) {
    state.clearCycleMemory();
  }

  const visited = new Set(state.getCycleMemory());
  const rank = (window: Window): number =>
    (window.isFocused ? 2 : 0) + (visited.has(window.id) ? 1 : 0);
  const [chosen] = [...candidates].sort((a, b) => rank(a) - rank(b) || a.id - b.id);
  if (!chosen) {
    throw new NoMatchingWindowError();
  }

  state.rememberVisited(chosen.id);
  return chosen.id;
}

/**
 * Picks the next marked window, in mark insertion order. The focused window
 * always counts as visited.
 *
 * @throws {UnknownMarkError} When the mark does not exist
 * @throws {NoMarkedWindowError} When no other marked window is left
 */
export function selectMarkedCandidate(state: DaemonState, mark: string): number {
  const ids = state.pruneMark(mark);
  if (ids === undefined) {
    throw new UnknownMarkError(mark);
  }

  const focusedId = state.focusedWindow()?.id;
  const isVisited = (id: number): boolean =>
    id === focusedId || state.getCycleMemory().includes(id);

  if (ids.length > 0 && ids.every(isVisited)) {
    state.clearCycleMemory();
  }

  const next = ids.find((id) => !isVisited(id));
  if (next === undefined) {
    throw new NoMarkedWindowError(mark);
  }

  state.rememberVisited(next);
  return next;
}

/**
 * Renders a window as one tab-separated line: id, app id, title, workspace.
 */
export function formatWindowLine(window: Window): string {
  return [
    String(window.id),
    window.appId ?? "-",
    window.title ?? "-",
    window.workspaceId === undefined ? "-" : String(window.workspaceId),
  ].join("\t");
}

function bottomWorkspaceOfFocusedOutput(state: StateView): Workspace {
  const focused = state.focusedWorkspace();
  if (!focused) {
    throw new NoFocusedWorkspaceError();
  }
  return state.findBottomWorkspace(focused.output);
}

function existingWindows(state: StateView, ids: readonly number[]): Window[] {
  const windows: Window[] = [];
  for (const id of ids) {
    const window = state.getWindow(id);
    if (window) {
      windows.push(window);
    }
  }
  return windows;
}

// ============================================================================
// Command Engine
// ============================================================================

export interface CommandEngineOptions {
  readonly store: StateStore;
  readonly compositor: CompositorClient;
  readonly logger: Logger;
}

interface ScratchpadPlan {
  readonly windowId: number;
  readonly added: boolean;
  readonly target?: Workspace;
  readonly windows: readonly Window[];
}

type ShowPlan =
  | { readonly hide: Window; readonly target: Workspace }
  | { readonly show: number; readonly workspaceId: number };

export class CommandEngine {
  private readonly store: StateStore;
  private readonly compositor: CompositorClient;
  private readonly logger: Logger;

  constructor(options: CommandEngineOptions) {
    this.store = options.store;
    this.compositor = options.compositor;
    this.logger = options.logger.child({ component: "command-engine" });
  }

  /**
   * Executes a command and folds the outcome into a result for the client.
   *
   * @throws {StatePoisonedError} The only error that escapes; it is fatal
   */
  async execute(command: Command): Promise<CommandResult> {
    try {
      const message = await this.run(command);
      this.logger.debug({ command, message }, "Command succeeded");
      return { ok: true, message };
    } catch (error) {
      if (error instanceof StatePoisonedError) {
        throw error;
      }
      if (
        error instanceof CommandError ||
        error instanceof CompositorError ||
        error instanceof UnexpectedReplyError ||
        error instanceof SocketError
      ) {
        this.logger.info({ command, err: error }, `Command failed: ${error.message}`);
      } else {
        this.logger.error({ command, err: error }, "Command failed unexpectedly");
      }
      return { ok: false, message: errorMessage(error) };
    }
  }

  /**
   * Executes a command, resolving with its result message.
   */
  async run(command: Command): Promise<string> {
    await this.store.recordCommand(command);

    switch (command.kind) {
      case "focus":
        return this.focus(command.match);
      case "focus-or-spawn":
        return this.orSpawn(() => this.focus(command.match), command.command);
      case "move-to-current-workspace":
        return this.moveToCurrentWorkspace(command.match, command.focus);
      case "move-to-current-workspace-or-spawn":
        return this.orSpawn(
          () => this.moveToCurrentWorkspace(command.match, command.focus),
          command.command
        );
      case "toggle-follow-mode":
        return this.toggleFollowMode();
      case "toggle-mark":
        return this.toggleMark(command.mark ?? DEFAULT_MARK);
      case "focus-marked":
        return this.focusMarked(command.mark ?? DEFAULT_MARK);
      case "list-marked":
        return command.all ? this.listAllMarked() : this.listMarked(command.mark ?? DEFAULT_MARK);
      case "scratchpad-toggle":
        return this.scratchpadToggle();
      case "scratchpad-show":
        return this.scratchpadShow();
      case "nop":
        return "";
      default: {
        const exhaustive: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  // ============================================================================
  // Focus and Move
  // ============================================================================

  private async focus(match: MatchOptions): Promise<string> {
    const matcher = compileMatcher(match);
    const id = await this.store.write((state) => selectCycleCandidate(state, matcher));
    return this.focusWindow(id);
  }

  private async focusWindow(id: number): Promise<string> {
    await this.compositor.performAction({ FocusWindow: { id } });
    return `Focused window with id ${id}`;
  }

  private async orSpawn(primary: () => Promise<string>, command: readonly string[]): Promise<string> {
    try {
      return await primary();
    } catch (error) {
      if (!(error instanceof NoMatchingWindowError)) {
        throw error;
      }
    }

    this.logger.debug({ command }, "No matching window, spawning");
    await this.compositor.performAction({ Spawn: { command } });
    return "Spawned successfully";
  }

  private async moveToCurrentWorkspace(match: MatchOptions, focus: boolean): Promise<string> {
    const matcher = compileMatcher(match);
    const { windowId, workspaceId } = await this.store.read((state) => {
      const workspace = state.focusedWorkspace();
      if (!workspace) {
        throw new NoFocusedWorkspaceError();
      }
      const [candidate] = state
        .getWindows()
        .filter((window) => matcher(window) && window.workspaceId !== workspace.id)
        .sort((a, b) => a.id - b.id);
      if (!candidate) {
        throw new NoMatchingWindowError();
      }
      return { windowId: candidate.id, workspaceId: workspace.id };
    });

    await this.moveWindow(windowId, workspaceId, false);
    if (focus) {
      await this.compositor.performAction({ FocusWindow: { id: windowId } });
    }
    return `Moved window ${windowId} to workspace ${workspaceId}`;
  }

  private async moveWindow(windowId: number, workspaceId: number, focus: boolean): Promise<void> {
    await this.compositor.performAction({
      MoveWindowToWorkspace: { window_id: windowId, reference: { Id: workspaceId }, focus },
    });
  }

  // ============================================================================
  // Follow-Mode and Marks
  // ============================================================================

  private async toggleFollowMode(): Promise<string> {
    const { id, enabled } = await this.store.write((state) => {
      const focused = state.focusedWindow();
      if (!focused) {
        throw new NoFocusedWindowError();
      }
      return { id: focused.id, enabled: state.toggleFollowMode(focused.id) };
    });
    return enabled ? `Enabled follow-mode for window ${id}` : `Disabled follow-mode for window ${id}`;
  }

  private async toggleMark(mark: string): Promise<string> {
    const { id, marked } = await this.store.write((state) => {
      const focused = state.focusedWindow();
      if (!focused) {
        throw new NoFocusedWindowError();
      }
      return { id: focused.id, marked: state.toggleMark(mark, focused.id) };
    });
    return marked ? `Marked window ${id} with '${mark}'` : `Unmarked window ${id} from '${mark}'`;
  }

  private async focusMarked(mark: string): Promise<string> {
    const id = await this.store.write((state) => selectMarkedCandidate(state, mark));
    return this.focusWindow(id);
  }

  private async listMarked(mark: string): Promise<string> {
    return this.store.write((state) => {
      const ids = state.pruneMark(mark);
      if (ids === undefined) {
        throw new UnknownMarkError(mark);
      }
      return existingWindows(state, ids).map(formatWindowLine).join("\n");
    });
  }

  private async listAllMarked(): Promise<string> {
    return this.store.write((state) => {
      const lines: string[] = [];
      for (const mark of [...state.getMarks().keys()]) {
        const ids = state.pruneMark(mark) ?? [];
        lines.push(`${mark}:`);
        for (const window of existingWindows(state, ids)) {
          lines.push(`  ${formatWindowLine(window)}`);
        }
      }
      return lines.join("\n");
    });
  }

  // ============================================================================
  // Scratchpad
  // ============================================================================

  private async scratchpadToggle(): Promise<string> {
    const plan = await this.store.write((state): ScratchpadPlan => {
      const focused = state.focusedWindow();
      if (!focused) {
        throw new NoFocusedWindowError();
      }
      if (state.getScratchpad().includes(focused.id)) {
        state.toggleScratchpad(focused.id);
        return { windowId: focused.id, added: false, windows: [] };
      }

      // Resolved before the set changes
      const target = bottomWorkspaceOfFocusedOutput(state);
      state.toggleScratchpad(focused.id);
      return {
        windowId: focused.id,
        added: true,
        target,
        windows: existingWindows(state, state.getScratchpad()),
      };
    });

    if (!plan.added || !plan.target) {
      return `Removed window ${plan.windowId} from scratchpad`;
    }

    for (const window of plan.windows) {
      await this.stash(window, plan.target);
    }
    return `Moved window ${plan.windowId} to scratchpad`;
  }

  private async scratchpadShow(): Promise<string> {
    const plan = await this.store.read((state): ShowPlan => {
      const scratchpad = state.getScratchpad();
      const [first] = existingWindows(state, scratchpad);
      if (!first) {
        throw new EmptyScratchpadError();
      }

      const focused = state.focusedWindow();
      if (focused && scratchpad.includes(focused.id)) {
        return { hide: focused, target: bottomWorkspaceOfFocusedOutput(state) };
      }

      const workspace = state.focusedWorkspace();
      if (!workspace) {
        throw new NoFocusedWorkspaceError();
      }
      return { show: first.id, workspaceId: workspace.id };
    });

    if ("hide" in plan) {
      await this.stash(plan.hide, plan.target);
      return `Hid scratchpad window ${plan.hide.id}`;
    }

    await this.moveWindow(plan.show, plan.workspaceId, false);
    await this.compositor.performAction({ FocusWindow: { id: plan.show } });
    return `Showed scratchpad window ${plan.show}`;
  }

  /** Floats a window and parks it on `target` without following it */
  private async stash(window: Window, target: Workspace): Promise<void> {
    if (!window.isFloating) {
      await this.compositor.performAction({ ToggleWindowFloating: { id: window.id } });
    }
    await this.moveWindow(window.id, target.id, false);
  }
}
