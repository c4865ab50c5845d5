import { constants } from 'node:os';
import { execa } from 'execa';

export interface CapturedProcess {
  exitCode: number;
  stdout: string;
  notFound: boolean;
}

export interface InheritedProcess {
  exitCode: number;
  signal: string | null;
  notFound: boolean;
}

export interface InheritedHandle {
  exited: Promise<InheritedProcess>;
  kill: (signal: NodeJS.Signals) => void;
}

// Exit status a POSIX shell reports for a child killed by `signal`.
export function signalExitCode(signal: string): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  return entry ? 128 + entry[1] : 1;
}

/**
 * Run a command with stdout captured and stderr passed through to the user.
 * When `input` is given it is written to the child's stdin.
 */
export async function spawnCaptured(cmd: string[], input?: string): Promise<CapturedProcess> {
  const res = await execa(cmd[0], cmd.slice(1), {
    input: input ?? '',
    stdout: 'pipe',
    stderr: 'inherit',
    reject: false,
  });
  const notFound = res.exitCode === undefined && !res.isTerminated;
  return {
    exitCode: res.exitCode ?? (notFound ? 127 : 1),
    stdout: res.stdout ?? '',
    notFound,
  };
}

/**
 * Start a command attached to the current terminal. `exited` resolves with the
 * child's exit status; a child killed by a signal maps to 128 + signal number.
 */
export function spawnInherited(cmd: string[]): InheritedHandle {
  const child = execa(cmd[0], cmd.slice(1), {
    stdin: 'inherit',
    stdout: 'inherit',
    stderr: 'inherit',
    reject: false,
  });

  const exited = child.then((res): InheritedProcess => {
    const signal = res.signal ?? null;
    const notFound = res.exitCode === undefined && !res.isTerminated;
    let exitCode: number;
    if (res.exitCode !== undefined) {
      exitCode = res.exitCode;
    } else if (signal) {
      exitCode = signalExitCode(signal);
    } else {
      exitCode = notFound ? 127 : 1;
    }
    return { exitCode, signal, notFound };
  });

  return {
    exited,
    kill: (signal: NodeJS.Signals) => {
      child.kill(signal);
    },
  };
}

// Cheap probe used by preflight checks; never throws.
export async function canExecute(cmd: string[]): Promise<boolean> {
  const res = await execa(cmd[0], cmd.slice(1), {
    stdin: 'ignore',
    stdout: 'ignore',
    stderr: 'ignore',
    reject: false,
  });
  return res.exitCode === 0;
}
