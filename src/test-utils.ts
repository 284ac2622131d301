/**
 * Test utilities and fixtures shared by the test suites.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { createServer } from "node:net";
import type { Server, Socket } from "node:net";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type CompositorClient, CompositorEventStream } from "./compositor-client.js";
import { CommandEngine } from "./command-engine.js";
import { createSilentLogger } from "./logger.js";
import { DaemonState } from "./state.js";
import { StateStore } from "./state-store.js";
import type {
  CompositorAction,
  NiriWindow,
  NiriWorkspace,
  Window,
  Workspace,
} from "./types.js";

// ============================================================================
// Test Data Generators
// ============================================================================

/** Generate a window as kept by the state store */
export function createMockWindow(overrides: Partial<Window> = {}): Window {
  return {
    id: 1,
    appId: "org.example.Terminal",
    title: "Terminal",
    workspaceId: 1,
    isFocused: false,
    isFloating: false,
    ...overrides,
  };
}

/** Generate a workspace as kept by the state store */
export function createMockWorkspace(overrides: Partial<Workspace> = {}): Workspace {
  return {
    id: 1,
    index: 1,
    output: "DP-1",
    isActive: true,
    isFocused: true,
    ...overrides,
  };
}

/** Generate a window object in niri's wire format */
export function createMockNiriWindow(overrides: Partial<NiriWindow> = {}): NiriWindow {
  return {
    id: 1,
    title: "Terminal",
    app_id: "org.example.Terminal",
    pid: 4242,
    workspace_id: 1,
    is_focused: false,
    is_floating: false,
    is_urgent: false,
    ...overrides,
  };
}

/** Generate a workspace object in niri's wire format */
export function createMockNiriWorkspace(overrides: Partial<NiriWorkspace> = {}): NiriWorkspace {
  return {
    id: 1,
    idx: 1,
    name: null,
    output: "DP-1",
    is_urgent: false,
    is_active: true,
    is_focused: true,
    active_window_id: null,
    ...overrides,
  };
}

/**
 * A typical layout: workspaces 1 (focused) and 2 on DP-1, the empty trailing
 * workspace 3 below them, and workspace 4 alone on HDMI-A-1.
 */
export function createWorkspaceLayout(): Workspace[] {
  return [
    createMockWorkspace({ id: 1, index: 1, output: "DP-1", isActive: true, isFocused: true }),
    createMockWorkspace({ id: 2, index: 2, output: "DP-1", isActive: false, isFocused: false }),
    createMockWorkspace({ id: 3, index: 3, output: "DP-1", isActive: false, isFocused: false }),
    createMockWorkspace({ id: 4, index: 1, output: "HDMI-A-1", isActive: true, isFocused: false }),
  ];
}

/** Build a state holding the given windows and workspaces */
export function createState(
  windows: readonly Window[] = [],
  workspaces: readonly Workspace[] = createWorkspaceLayout()
): DaemonState {
  const state = new DaemonState();
  state.replaceWorkspaces(workspaces);
  for (const window of windows) {
    state.upsertWindow(window);
  }
  return state;
}

// ============================================================================
// Fake Compositor
// ============================================================================

/**
 * In-process stand-in for the compositor. Records every action and answers
 * queries from plain arrays.
 */
export class FakeCompositor implements CompositorClient {
  readonly actions: CompositorAction[] = [];
  stream = new CompositorEventStream();
  windowList: Window[] = [];
  workspaceList: Workspace[] = [];
  /** Returns an error to reject an action with, or undefined to accept it */
  failWith: (action: CompositorAction) => Error | undefined = () => undefined;
  streamOpened = false;

  async windows(): Promise<readonly Window[]> {
    return this.windowList;
  }

  async workspaces(): Promise<readonly Workspace[]> {
    return this.workspaceList;
  }

  async focusedWindow(): Promise<Window | undefined> {
    return this.windowList.find((window) => window.isFocused);
  }

  async performAction(action: CompositorAction): Promise<void> {
    const error = this.failWith(action);
    if (error) {
      throw error;
    }
    this.actions.push(action);
  }

  async eventStream(): Promise<CompositorEventStream> {
    this.streamOpened = true;
    return this.stream;
  }
}

/** Engine over a fresh store and fake compositor */
export function createEngineFixture(state: DaemonState = createState()): {
  engine: CommandEngine;
  store: StateStore;
  state: DaemonState;
  compositor: FakeCompositor;
} {
  const store = new StateStore(state);
  const compositor = new FakeCompositor();
  const engine = new CommandEngine({ store, compositor, logger: createSilentLogger() });
  return { engine, store, state, compositor };
}

// ============================================================================
// Temporary Sockets
// ============================================================================

/** Creates a temporary directory for UNIX sockets */
export async function createSocketDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(join(tmpdir(), "niri-pilot-test-"));
  return {
    dir,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

export type LineHandler = (line: string, socket: Socket) => void;
export type LineServerConnectionHandler = (socket: Socket) => void;

export interface LineServer {
  readonly server: Server;
  readonly sockets: Socket[];
  /** Every line received so far, across connections */
  readonly lines: string[];
  close(): Promise<void>;
}

/**
 * Listens on a UNIX socket and hands every received line to `onLine`.
 * Stands in for the compositor in socket-level tests.
 */
export async function startLineServer(
  socketPath: string,
  onLine: LineHandler,
  onConnection: LineServerConnectionHandler = () => undefined
): Promise<LineServer> {
  const sockets: Socket[] = [];
  const lines: string[] = [];
  const server = createServer((socket) => {
    sockets.push(socket);
    let buffered = "";
    socket.on("data", (chunk: Buffer) => {
      buffered += chunk.toString("utf8");
      let newline = buffered.indexOf("\n");
      while (newline !== -1) {
        const line = buffered.slice(0, newline);
        buffered = buffered.slice(newline + 1);
        lines.push(line);
        onLine(line, socket);
        newline = buffered.indexOf("\n");
      }
    });
    socket.on("error", () => socket.destroy());
    onConnection(socket);
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => resolve());
  });

  return {
    server,
    sockets,
    lines,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) {
          socket.destroy();
        }
        server.close(() => resolve());
      }),
  };
}

/** Wait for a condition to become true */
export async function waitFor(
  condition: () => boolean,
  timeout = 1000,
  interval = 5
): Promise<void> {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeout) {
      throw new Error(`Condition not met within ${timeout}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
}
