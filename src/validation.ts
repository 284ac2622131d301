/**
 * Runtime type validation utilities for compositor replies, events and
 * client commands.
 * Validators convert niri's wire objects into the daemon's domain types.
 */

import type {
  Command,
  CommandResult,
  CompositorEvent,
  CompositorReply,
  MatchOptions,
  NiriWindow,
  NiriWorkspace,
  TypePredicate,
  ValidationResult,
  Window,
  Workspace,
} from "./types.js";

// ============================================================================
// Utility Functions
// ============================================================================

/** Check if value is a non-null object */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Check if value is a non-negative integer, the shape of every niri id */
function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/** Check if value is a string */
function isString(value: unknown): value is string {
  return typeof value === "string";
}

/** Check if value is a boolean */
function isBoolean(value: unknown): value is boolean {
  return typeof value === "boolean";
}

function isOptional<T>(value: unknown, guard: TypePredicate<T>): value is T | null | undefined {
  return value === undefined || value === null || guard(value);
}

/** Check if value is an array of strings */
function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(isString);
}

/** Create a successful validation result */
function createSuccessResult<T>(data: T): ValidationResult<T> {
  return {
    success: true,
    data,
    errors: undefined,
  };
}

/** Create a failed validation result */
function createFailureResult<T>(errors: readonly string[]): ValidationResult<T> {
  return {
    success: false,
    data: undefined,
    errors,
  };
}

// ============================================================================
// Type Guards
// ============================================================================

/** Type guard for NiriWindow */
export const isNiriWindow: TypePredicate<NiriWindow> = (value): value is NiriWindow => {
  if (!isObject(value)) {
    return false;
  }

  return (
    isId(value["id"]) &&
    isOptional(value["title"], isString) &&
    isOptional(value["app_id"], isString) &&
    isOptional(value["workspace_id"], isId) &&
    isBoolean(value["is_focused"]) &&
    isOptional(value["is_floating"], isBoolean)
  );
};

/** Type guard for NiriWorkspace */
export const isNiriWorkspace: TypePredicate<NiriWorkspace> = (
  value
): value is NiriWorkspace => {
  if (!isObject(value)) {
    return false;
  }

  return (
    isId(value["id"]) &&
    isId(value["idx"]) &&
    isOptional(value["name"], isString) &&
    isOptional(value["output"], isString) &&
    isBoolean(value["is_active"]) &&
    isBoolean(value["is_focused"])
  );
};

/** Type guard for the `{"Ok": ...}` / `{"Err": ...}` reply envelope */
export const isCompositorReply: TypePredicate<CompositorReply> = (
  value
): value is CompositorReply => {
  if (!isObject(value)) {
    return false;
  }

  return ("Ok" in value && value["Ok"] !== undefined) || isString(value["Err"]);
};

// ============================================================================
// Converters
// ============================================================================

/** Convert a wire window to the domain window */
export function toWindow(window: NiriWindow): Window {
  return {
    id: window.id,
    ...(typeof window.app_id === "string" && { appId: window.app_id }),
    ...(typeof window.title === "string" && { title: window.title }),
    ...(typeof window.workspace_id === "number" && { workspaceId: window.workspace_id }),
    isFocused: window.is_focused,
    isFloating: window.is_floating ?? false,
  };
}

/** Convert a wire workspace to the domain workspace */
export function toWorkspace(workspace: NiriWorkspace): Workspace {
  return {
    id: workspace.id,
    index: workspace.idx,
    ...(typeof workspace.name === "string" && { name: workspace.name }),
    ...(typeof workspace.output === "string" && { output: workspace.output }),
    isActive: workspace.is_active,
    isFocused: workspace.is_focused,
  };
}

// ============================================================================
// Validators
// ============================================================================

/** Validate a niri window and convert it, with detailed error reporting */
export const validateNiriWindow = (value: unknown): ValidationResult<Window> => {
  const errors: string[] = [];

  if (!isObject(value)) {
    return createFailureResult(["Value must be an object"]);
  }

  if (!isId(value["id"])) {
    errors.push("id must be a non-negative integer");
  }
  if (!isOptional(value["title"], isString)) {
    errors.push("title must be a string or null");
  }
  if (!isOptional(value["app_id"], isString)) {
    errors.push("app_id must be a string or null");
  }
  if (!isOptional(value["workspace_id"], isId)) {
    errors.push("workspace_id must be a non-negative integer or null");
  }
  if (!isBoolean(value["is_focused"])) {
    errors.push("is_focused must be a boolean");
  }
  if (!isOptional(value["is_floating"], isBoolean)) {
    errors.push("is_floating must be a boolean");
  }

  if (errors.length > 0 || !isNiriWindow(value)) {
    return createFailureResult(errors);
  }

  return createSuccessResult(toWindow(value));
};

/** Validate a niri workspace and convert it, with detailed error reporting */
export const validateNiriWorkspace = (value: unknown): ValidationResult<Workspace> => {
  const errors: string[] = [];

  if (!isObject(value)) {
    return createFailureResult(["Value must be an object"]);
  }

  if (!isId(value["id"])) {
    errors.push("id must be a non-negative integer");
  }
  if (!isId(value["idx"])) {
    errors.push("idx must be a non-negative integer");
  }
  if (!isOptional(value["name"], isString)) {
    errors.push("name must be a string or null");
  }
  if (!isOptional(value["output"], isString)) {
    errors.push("output must be a string or null");
  }
  if (!isBoolean(value["is_active"])) {
    errors.push("is_active must be a boolean");
  }
  if (!isBoolean(value["is_focused"])) {
    errors.push("is_focused must be a boolean");
  }

  if (errors.length > 0 || !isNiriWorkspace(value)) {
    return createFailureResult(errors);
  }

  return createSuccessResult(toWorkspace(value));
};

/** Validate an array of niri windows */
export const validateNiriWindowArray = (value: unknown): ValidationResult<readonly Window[]> => {
  return validateArray(value, validateNiriWindow, "Window");
};

/** Validate an array of niri workspaces */
export const validateNiriWorkspaceArray = (
  value: unknown
): ValidationResult<readonly Workspace[]> => {
  return validateArray(value, validateNiriWorkspace, "Workspace");
};

function validateArray<T>(
  value: unknown,
  validate: (item: unknown) => ValidationResult<T>,
  label: string
): ValidationResult<readonly T[]> {
  if (!Array.isArray(value)) {
    return createFailureResult(["Value must be an array"]);
  }

  const errors: string[] = [];
  const validated: T[] = [];

  for (let i = 0; i < value.length; i++) {
    const result = validate(value[i]);
    if (!result.success) {
      errors.push(`${label} at index ${i}: ${result.errors?.join(", ")}`);
    } else if (result.data !== undefined) {
      validated.push(result.data);
    }
  }

  if (errors.length > 0) {
    return createFailureResult(errors);
  }

  return createSuccessResult(validated);
}

/**
 * Validate one line of niri's event stream.
 * Events are externally tagged objects with a single key; kinds the daemon
 * does not track come back as `{ kind: "other" }`.
 */
export const validateCompositorEvent = (value: unknown): ValidationResult<CompositorEvent> => {
  if (!isObject(value)) {
    return createFailureResult(["Event must be an object"]);
  }

  const names = Object.keys(value);
  const name = names[0];
  if (names.length !== 1 || name === undefined) {
    return createFailureResult(["Event must have exactly one variant key"]);
  }

  const body = value[name];
  if (!isObject(body)) {
    return createFailureResult<CompositorEvent>([`${name} payload must be an object`]);
  }

  switch (name) {
    case "WindowOpenedOrChanged": {
      const window = validateNiriWindow(body["window"]);
      return window.success && window.data
        ? createSuccessResult<CompositorEvent>({ kind: "window-opened-or-changed", window: window.data })
        : createFailureResult<CompositorEvent>([`${name}: ${window.errors?.join(", ")}`]);
    }
    case "WindowsChanged": {
      const windows = validateNiriWindowArray(body["windows"]);
      return windows.success && windows.data
        ? createSuccessResult<CompositorEvent>({ kind: "windows-changed", windows: windows.data })
        : createFailureResult<CompositorEvent>([`${name}: ${windows.errors?.join(", ")}`]);
    }
    case "WindowClosed": {
      const id = body["id"];
      return isId(id)
        ? createSuccessResult<CompositorEvent>({ kind: "window-closed", id })
        : createFailureResult<CompositorEvent>([`${name}: id must be a non-negative integer`]);
    }
    case "WindowFocusChanged": {
      const id = body["id"];
      if (id === null || id === undefined) {
        return createSuccessResult<CompositorEvent>({ kind: "window-focus-changed", id: null });
      }
      return isId(id)
        ? createSuccessResult<CompositorEvent>({ kind: "window-focus-changed", id })
        : createFailureResult<CompositorEvent>([`${name}: id must be a non-negative integer or null`]);
    }
    case "WorkspacesChanged": {
      const workspaces = validateNiriWorkspaceArray(body["workspaces"]);
      return workspaces.success && workspaces.data
        ? createSuccessResult<CompositorEvent>({ kind: "workspaces-changed", workspaces: workspaces.data })
        : createFailureResult<CompositorEvent>([`${name}: ${workspaces.errors?.join(", ")}`]);
    }
    case "WorkspaceActivated": {
      const id = body["id"];
      const focused = body["focused"];
      return isId(id) && isBoolean(focused)
        ? createSuccessResult<CompositorEvent>({ kind: "workspace-activated", id, focused })
        : createFailureResult<CompositorEvent>([`${name}: expected numeric id and boolean focused`]);
    }
    default:
      return createSuccessResult<CompositorEvent>({ kind: "other", name });
  }
};

// ============================================================================
// Command Protocol
// ============================================================================

function validateMatchOptions(value: unknown, errors: string[]): MatchOptions {
  if (value === undefined) {
    return {};
  }
  if (!isObject(value)) {
    errors.push("match must be an object");
    return {};
  }

  const appId = value["appId"];
  const title = value["title"];
  if (!isOptional(appId, isString)) {
    errors.push("match.appId must be a string");
  }
  if (!isOptional(title, isString)) {
    errors.push("match.title must be a string");
  }

  return {
    ...(isString(appId) && { appId }),
    ...(isString(title) && { title }),
  };
}

function validateSpawnCommand(value: unknown, errors: string[]): readonly string[] {
  if (!isStringArray(value) || value.length === 0) {
    errors.push("command must be a non-empty array of strings");
    return [];
  }
  return [...value];
}

function validateMark(value: unknown, errors: string[]): { mark?: string } {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isString(value) || value.length === 0) {
    errors.push("mark must be a non-empty string");
    return {};
  }
  return { mark: value };
}

/**
 * Validate a command received from a client.
 * The returned command carries only the known keys, so two equal commands
 * compare equal structurally.
 */
export const validateCommand = (value: unknown): ValidationResult<Command> => {
  if (!isObject(value)) {
    return createFailureResult(["Command must be an object"]);
  }

  const errors: string[] = [];
  let command: Command | undefined;

  const kind = value["kind"];
  switch (kind) {
    case "focus":
      command = { kind: "focus", match: validateMatchOptions(value["match"], errors) };
      break;
    case "focus-or-spawn":
      command = {
        kind: "focus-or-spawn",
        match: validateMatchOptions(value["match"], errors),
        command: validateSpawnCommand(value["command"], errors),
      };
      break;
    case "move-to-current-workspace":
      command = {
        kind: "move-to-current-workspace",
        match: validateMatchOptions(value["match"], errors),
        focus: value["focus"] === true,
      };
      break;
    case "move-to-current-workspace-or-spawn":
      command = {
        kind: "move-to-current-workspace-or-spawn",
        match: validateMatchOptions(value["match"], errors),
        focus: value["focus"] === true,
        command: validateSpawnCommand(value["command"], errors),
      };
      break;
    case "toggle-mark":
      command = { kind: "toggle-mark", ...validateMark(value["mark"], errors) };
      break;
    case "focus-marked":
      command = { kind: "focus-marked", ...validateMark(value["mark"], errors) };
      break;
    case "list-marked":
      command = {
        kind: "list-marked",
        ...validateMark(value["mark"], errors),
        all: value["all"] === true,
      };
      break;
    case "toggle-follow-mode":
      command = { kind: "toggle-follow-mode" };
      break;
    case "scratchpad-toggle":
      command = { kind: "scratchpad-toggle" };
      break;
    case "scratchpad-show":
      command = { kind: "scratchpad-show" };
      break;
    case "nop":
      command = { kind: "nop" };
      break;
    default:
      errors.push(`unknown command kind ${JSON.stringify(kind)}`);
  }

  if (errors.length > 0 || command === undefined) {
    return createFailureResult(errors);
  }

  return createSuccessResult(command);
};

/** Validate the result the daemon writes back */
export const validateCommandResult = (value: unknown): ValidationResult<CommandResult> => {
  if (!isObject(value) || !isBoolean(value["ok"]) || !isString(value["message"])) {
    return createFailureResult(["Result must be an object with boolean ok and string message"]);
  }
  return createSuccessResult({ ok: value["ok"], message: value["message"] });
};
