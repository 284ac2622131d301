/**
 * Command-line front end of the client: argument parsing and the exit
 * contract.
 */

import { type Environment, resolveCommandSocketPath } from "./config.js";
import { PilotError, errorMessage } from "./errors.js";
import { type OutputStreams, reportResult, sendCommand } from "./request-client.js";
import type { Command, CommandKind, MatchOptions } from "./types.js";

const USAGE = `Usage: niri-pilot <command> [options] [mark | -- program args...]

Commands:
  focus                               Cycle focus through matching windows
  focus-or-spawn <program...>         Focus a match, or spawn the program
  move-to-current-workspace           Bring the lowest-id match to this workspace
  move-to-current-workspace-or-spawn <program...>
  toggle-follow-mode                  Make the focused window follow workspace switches
  toggle-mark [mark]                  Mark or unmark the focused window
  focus-marked [mark]                 Cycle focus through marked windows
  list-marked [mark] [--all]          List marked windows
  scratchpad-toggle                   Stash or unstash the focused window
  scratchpad-show                     Show or hide a scratchpad window
  nop                                 Do nothing

Options:
  -a, --app-id <regex>                Match windows by app id
  -t, --title <regex>                 Match windows by title
      --focus                         Focus the moved window
      --all                           List every mark
  -h, --help                          Show this help
`;

const MATCH_KINDS: ReadonlySet<CommandKind> = new Set([
  "focus",
  "focus-or-spawn",
  "move-to-current-workspace",
  "move-to-current-workspace-or-spawn",
]);
const SPAWN_KINDS: ReadonlySet<CommandKind> = new Set([
  "focus-or-spawn",
  "move-to-current-workspace-or-spawn",
]);
const MOVE_KINDS: ReadonlySet<CommandKind> = new Set([
  "move-to-current-workspace",
  "move-to-current-workspace-or-spawn",
]);
const MARK_KINDS: ReadonlySet<CommandKind> = new Set(["toggle-mark", "focus-marked", "list-marked"]);
const LIST_KINDS: ReadonlySet<CommandKind> = new Set(["list-marked"]);

const COMMAND_KINDS: readonly CommandKind[] = [
  "focus",
  "focus-or-spawn",
  "move-to-current-workspace",
  "move-to-current-workspace-or-spawn",
  "toggle-follow-mode",
  "toggle-mark",
  "focus-marked",
  "list-marked",
  "scratchpad-toggle",
  "scratchpad-show",
  "nop",
];

function isCommandKind(value: string): value is CommandKind {
  return COMMAND_KINDS.some((kind) => kind === value);
}

/**
 * Malformed command line.
 */
export class UsageError extends PilotError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

export type ParsedArgs = { readonly help: true } | { readonly help: false; readonly command: Command };

interface RawOptions {
  appId?: string;
  title?: string;
  focus: boolean;
  all: boolean;
  positionals: string[];
}

/**
 * Parses the arguments following the program name.
 *
 * @throws {UsageError} When the arguments do not form a command
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const [name, ...rest] = args;
  if (name === undefined) {
    throw new UsageError("missing command");
  }
  if (name === "-h" || name === "--help" || name === "help") {
    return { help: true };
  }
  if (!isCommandKind(name)) {
    throw new UsageError(`unknown command '${name}'`);
  }

  const options = collectOptions(name, rest);
  if (options === "help") {
    return { help: true };
  }
  return { help: false, command: buildCommand(name, options) };
}

function collectOptions(kind: CommandKind, args: readonly string[]): RawOptions | "help" {
  const options: RawOptions = { focus: false, all: false, positionals: [] };
  const takesProgram = SPAWN_KINDS.has(kind);

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined) {
      throw new UsageError(`option ${flag} needs a value`);
    }
    return value;
  };
  const requireKind = (flag: string, allowed: ReadonlySet<CommandKind>): void => {
    if (!allowed.has(kind)) {
      throw new UsageError(`option ${flag} is not valid for ${kind}`);
    }
  };

  for (let index = 0; index < args.length; index++) {
    const arg = args[index] ?? "";

    // Everything from the program name on belongs to the program
    if (arg === "--" || (takesProgram && !arg.startsWith("-"))) {
      options.positionals.push(...args.slice(arg === "--" ? index + 1 : index));
      break;
    }

    const equals = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equals >= 0 ? arg.slice(0, equals) : arg;
    const inline = equals >= 0 ? arg.slice(equals + 1) : undefined;

    switch (flag) {
      case "-h":
      case "--help":
        return "help";
      case "-a":
      case "--app-id":
        requireKind(flag, MATCH_KINDS);
        options.appId = inline ?? valueOf(flag, index);
        if (inline === undefined) {
          index++;
        }
        break;
      case "-t":
      case "--title":
        requireKind(flag, MATCH_KINDS);
        options.title = inline ?? valueOf(flag, index);
        if (inline === undefined) {
          index++;
        }
        break;
      case "--focus":
        requireKind(flag, MOVE_KINDS);
        options.focus = true;
        break;
      case "--all":
        requireKind(flag, LIST_KINDS);
        options.all = true;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown option '${arg}'`);
        }
        options.positionals.push(arg);
    }
  }

  return options;
}

function buildCommand(kind: CommandKind, options: RawOptions): Command {
  const match: MatchOptions = {
    ...(options.appId !== undefined ? { appId: options.appId } : {}),
    ...(options.title !== undefined ? { title: options.title } : {}),
  };
  const { positionals } = options;

  if (SPAWN_KINDS.has(kind) && positionals.length === 0) {
    throw new UsageError(`${kind} needs a program to spawn`);
  }
  if (MARK_KINDS.has(kind) && positionals.length > 1) {
    throw new UsageError(`${kind} takes at most one mark`);
  }
  if (!SPAWN_KINDS.has(kind) && !MARK_KINDS.has(kind) && positionals.length > 0) {
    throw new UsageError(`unexpected argument '${positionals[0]}'`);
  }

  const [mark] = positionals;
  if (mark === "") {
    throw new UsageError("mark must not be empty");
  }

  switch (kind) {
    case "focus":
      return { kind, match };
    case "focus-or-spawn":
      return { kind, match, command: positionals };
    case "move-to-current-workspace":
      return { kind, match, focus: options.focus };
    case "move-to-current-workspace-or-spawn":
      return { kind, match, focus: options.focus, command: positionals };
    case "toggle-mark":
      return mark === undefined ? { kind } : { kind, mark };
    case "focus-marked":
      return mark === undefined ? { kind } : { kind, mark };
    case "list-marked":
      return mark === undefined ? { kind, all: options.all } : { kind, mark, all: options.all };
    case "toggle-follow-mode":
      return { kind };
    case "scratchpad-toggle":
      return { kind };
    case "scratchpad-show":
      return { kind };
    case "nop":
      return { kind };
  }
}

// ============================================================================
// Entry Point
// ============================================================================

export interface CliContext extends OutputStreams {
  readonly env: Environment;
}

/**
 * Runs the client and returns the process exit code: 0 on success, 1 when
 * the command failed or the daemon is unreachable, 2 on a usage error.
 */
export async function runCli(args: readonly string[], context: CliContext): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      context.stderr.write(`niri-pilot: ${error.message}\nTry 'niri-pilot --help'.\n`);
      return 2;
    }
    throw error;
  }

  if (parsed.help) {
    context.stdout.write(USAGE);
    return 0;
  }

  try {
    const result = await sendCommand(resolveCommandSocketPath(context.env), parsed.command);
    return reportResult(result, context);
  } catch (error) {
    context.stderr.write(`niri-pilot: ${errorMessage(error)}\n`);
    return 1;
  }
}
