/**
 * Gateway responsible for spawning the external CLI. The factory validates the
 * command and its arguments and always spawns without a shell, so prompt text
 * travels through the platform's argv semantics and is never interpolated into
 * a command string. The child inherits the server's environment.
 */
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";

import { omitUndefinedEntries } from "../utils/object.js";

/** Options accepted by {@link ChildProcessGateway.spawn}. */
export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to {@link nodeSpawn}. */
  readonly args?: readonly string[];
  /** Optional working directory of the child process. */
  readonly cwd?: string;
  /** Spawn stdio configuration (defaults to `pipe`). */
  readonly stdio?: SpawnOptions["stdio"];
}

/** Error raised when the requested command name is invalid. */
export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

/** Error raised when an argument is not a valid string. */
export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Contract exposed by the child process gateway. */
export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): ChildProcess;
}

/** Spawn signature used by the gateway; Node's {@link nodeSpawn} satisfies it. */
export type SpawnImplementation = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

/** Internal dependencies accepted by {@link createChildProcessGateway}. */
interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImplementation;
}

/**
 * Factory returning the child process gateway. Tests can inject a recording
 * {@link spawnImpl} to observe the wiring without launching real commands.
 */
export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): ChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args);

      const spawnOptions: SpawnOptions = omitUndefinedEntries({
        cwd: options.cwd,
        stdio: options.stdio ?? "pipe",
        shell: false,
        windowsVerbatimArguments: false,
      });

      return spawnImpl(command, args, spawnOptions);
    },
  };
}

/**
 * Ensures the argument list exclusively contains strings while returning a
 * copy so later mutation by the caller cannot affect the spawned process.
 */
function normaliseArgs(args: SpawnChildProcessOptions["args"]): string[] {
  if (args === undefined) {
    return [];
  }

  return args.map((value: unknown, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}
