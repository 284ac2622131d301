/**
 * Core type definitions for the niri IPC interface and the daemon's own
 * command protocol.
 *
 * Wire types mirror niri's JSON (snake_case, externally tagged enums);
 * domain types are what the state store keeps.
 */

// ============================================================================
// Domain Types
// ============================================================================

/** A window as mirrored by the state store */
export interface Window {
  /** Unique id assigned by the compositor */
  readonly id: number;
  /** Application id (Wayland app_id) */
  readonly appId?: string;
  readonly title?: string;
  /** Workspace the window lives on, absent while unmapped */
  readonly workspaceId?: number;
  readonly isFocused: boolean;
  readonly isFloating: boolean;
}

/** A workspace as mirrored by the state store */
export interface Workspace {
  readonly id: number;
  /** Position within its output, 1-based */
  readonly index: number;
  readonly name?: string;
  /** Output (monitor connector) the workspace belongs to */
  readonly output?: string;
  /** Whether the workspace is the visible one on its output */
  readonly isActive: boolean;
  readonly isFocused: boolean;
}

// ============================================================================
// niri Wire Types
// ============================================================================

/** Window object as sent by niri */
export interface NiriWindow {
  readonly id: number;
  readonly title: string | null;
  readonly app_id: string | null;
  readonly pid?: number | null;
  readonly workspace_id: number | null;
  readonly is_focused: boolean;
  readonly is_floating?: boolean | null;
  readonly is_urgent?: boolean;
}

/** Workspace object as sent by niri */
export interface NiriWorkspace {
  readonly id: number;
  readonly idx: number;
  readonly name: string | null;
  readonly output: string | null;
  readonly is_urgent?: boolean;
  readonly is_active: boolean;
  readonly is_focused: boolean;
  readonly active_window_id?: number | null;
}

/** Target of a move-window-to-workspace action */
export type WorkspaceReference =
  | { readonly Id: number }
  | { readonly Index: number }
  | { readonly Name: string };

/** Actions the daemon performs through the compositor */
export type CompositorAction =
  | { readonly FocusWindow: { readonly id: number } }
  | { readonly Spawn: { readonly command: readonly string[] } }
  | {
      readonly MoveWindowToWorkspace: {
        readonly window_id: number | null;
        readonly reference: WorkspaceReference;
        readonly focus: boolean;
      };
    }
  | { readonly ToggleWindowFloating: { readonly id: number | null } };

/** Requests understood by the compositor */
export type CompositorRequest =
  | "Windows"
  | "Workspaces"
  | "FocusedWindow"
  | "EventStream"
  | { readonly Action: CompositorAction };

/** Successful reply payloads */
export type CompositorResponse =
  | "Handled"
  | { readonly Windows: readonly NiriWindow[] }
  | { readonly Workspaces: readonly NiriWorkspace[] }
  | { readonly FocusedWindow: NiriWindow | null };

/** Reply envelope: niri serializes `Result<Response, String>` */
export type CompositorReply =
  | { readonly Ok: CompositorResponse }
  | { readonly Err: string };

/** Events delivered on the event stream, narrowed to the kinds the daemon reads */
export type CompositorEvent =
  | { readonly kind: "window-opened-or-changed"; readonly window: Window }
  | { readonly kind: "windows-changed"; readonly windows: readonly Window[] }
  | { readonly kind: "window-closed"; readonly id: number }
  | { readonly kind: "window-focus-changed"; readonly id: number | null }
  | { readonly kind: "workspaces-changed"; readonly workspaces: readonly Workspace[] }
  | { readonly kind: "workspace-activated"; readonly id: number; readonly focused: boolean }
  | { readonly kind: "other"; readonly name: string };

// ============================================================================
// Daemon Command Protocol
// ============================================================================

/** Regular-expression filters selecting windows */
export interface MatchOptions {
  readonly appId?: string;
  readonly title?: string;
}

/** Commands sent by the client, one per connection */
export type Command =
  | { readonly kind: "focus"; readonly match: MatchOptions }
  | {
      readonly kind: "focus-or-spawn";
      readonly match: MatchOptions;
      readonly command: readonly string[];
    }
  | {
      readonly kind: "move-to-current-workspace";
      readonly match: MatchOptions;
      readonly focus: boolean;
    }
  | {
      readonly kind: "move-to-current-workspace-or-spawn";
      readonly match: MatchOptions;
      readonly focus: boolean;
      readonly command: readonly string[];
    }
  | { readonly kind: "toggle-follow-mode" }
  | { readonly kind: "toggle-mark"; readonly mark?: string }
  | { readonly kind: "focus-marked"; readonly mark?: string }
  | { readonly kind: "list-marked"; readonly mark?: string; readonly all: boolean }
  | { readonly kind: "scratchpad-toggle" }
  | { readonly kind: "scratchpad-show" }
  | { readonly kind: "nop" };

export type CommandKind = Command["kind"];

/** Result written back to the client */
export interface CommandResult {
  readonly ok: boolean;
  readonly message: string;
}

// ============================================================================
// Validation
// ============================================================================

/** Runtime type validation result */
export interface ValidationResult<T = unknown> {
  readonly success: boolean;
  readonly data: T | undefined;
  readonly errors: readonly string[] | undefined;
}

/** Type predicate function */
export type TypePredicate<T> = (value: unknown) => value is T;
