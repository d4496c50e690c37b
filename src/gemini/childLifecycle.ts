import type { ChildProcess } from "node:child_process";
import type { Readable } from "node:stream";

/** Exit status reported by Node once the child terminated. */
export interface ChildExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}

/** The surface the supervisor needs: two pipes and the eventual exit status. */
export interface SupervisedChild {
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exit: Promise<ChildExit>;
}

/** A live child owned by the runner for the duration of one invocation. */
export interface ChildHandle extends SupervisedChild {
  readonly pid: number | null;
  /** Whether the exit status has been observed. */
  readonly exited: boolean;
  /**
   * Sends SIGKILL unless the child already exited, waits for Node to reap it,
   * then releases the pipes. Safe to call more than once.
   */
  terminate(): Promise<void>;
}

export function describeExit(exit: ChildExit): string {
  if (exit.code !== null) {
    return `exit code ${exit.code}`;
  }
  return exit.signal ? `signal ${exit.signal}` : "unknown exit status";
}

/**
 * Resolves once the child emitted `spawn`, rejects with the `error` emitted
 * instead when the executable cannot be started.
 */
export function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off("error", onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off("spawn", onSpawn);
      reject(error);
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

/**
 * Wraps a freshly spawned child into a {@link ChildHandle}. Must be called
 * synchronously after spawning so the `exit` event cannot be missed.
 */
export function trackChild(child: ChildProcess): ChildHandle {
  const { stdout, stderr } = child;
  if (!stdout || !stderr) {
    child.kill("SIGKILL");
    throw new Error("Gemini child process must expose stdout/stderr pipes");
  }

  let exited = false;
  const exit = new Promise<ChildExit>((resolve) => {
    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      exited = true;
      resolve({ code, signal });
    });
  });

  let termination: Promise<void> | null = null;

  return {
    stdout,
    stderr,
    exit,
    get pid(): number | null {
      return child.pid ?? null;
    },
    get exited(): boolean {
      return exited;
    },
    terminate(): Promise<void> {
      if (termination === null) {
        termination = (async () => {
          if (!exited) {
            child.kill("SIGKILL");
            await exit;
          }
          stdout.destroy();
          stderr.destroy();
        })();
      }
      return termination;
    },
  };
}
