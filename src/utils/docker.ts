import * as path from 'node:path';
import chalk from 'chalk';
import type {
  HostIdentity,
  ImageDefinition,
  RuntimeEnvironmentCheck,
  SudoPolicy,
  WrapperConfig,
} from '../types/index.js';
import { createSpinner, printCommand, printStep, printWarning } from './output-formatter.js';
import { canExecute, spawnCaptured, spawnInherited } from './spawn.js';
import { ImageBuildError, RuntimeNotFoundError } from './wrapper-error.js';

export const TOOLCHAIN_BINARY = 'cargo';
export const TOOLCHAIN_HOME_VAR = 'CARGO_HOME';
export const TOOLCHAIN_HOME_DIR = '.cargo';

const RELAYED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export function renderImageDefinition(def: ImageDefinition): string {
  return `FROM ${def.baseImage}\nRUN ${def.setup}\n`;
}

/**
 * Numeric uid/gid of the current process, or null on hosts (Windows) that
 * have no POSIX ids.
 */
export function getHostIdentity(): HostIdentity | null {
  const uid = process.getuid?.();
  const gid = process.getgid?.();
  if (uid === undefined || gid === undefined) return null;
  return { uid, gid };
}

export function shouldUseSudo(policy: SudoPolicy, identity: HostIdentity | null): boolean {
  switch (policy) {
    case 'always':
      return true;
    case 'never':
      return false;
    case 'auto':
      return identity !== null && identity.uid !== 0;
  }
}

// Leading argv for every runtime call: `sudo docker` or just `docker`.
export function runtimeInvocation(config: WrapperConfig, identity: HostIdentity | null): string[] {
  return shouldUseSudo(config.sudo, identity) ? ['sudo', config.runtime] : [config.runtime];
}

export function buildImageArgs(invocation: string[]): string[] {
  return [...invocation, 'build', '--quiet', '-'];
}

export interface BindMount {
  source: string;
  target: string;
}

// --mount takes a CSV list; quote a field that holds a comma or quote.
function csvField(field: string): string {
  return /[",]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

// Unlike `-v src:dst`, this survives colons in either path.
export function formatBindMount(mount: BindMount): string {
  return ['type=bind', `source=${mount.source}`, `target=${mount.target}`]
    .map(csvField)
    .join(',');
}

export interface DockerRunOptions {
  image: string;
  command: string[];
  workdir?: string;
  mounts?: BindMount[];
  environment?: Record<string, string>;
  user?: HostIdentity | null;
  interactive?: boolean;
  tty?: boolean;
}

export function buildRunArgs(invocation: string[], options: DockerRunOptions): string[] {
  const args = [...invocation, 'run', '--rm'];

  if (options.user) {
    args.push('--user', `${options.user.uid}:${options.user.gid}`);
  }

  if (options.mounts) {
    for (const mount of options.mounts) {
      args.push('--mount', formatBindMount(mount));
    }
  }

  if (options.workdir) {
    args.push('-w', options.workdir);
  }

  if (options.environment) {
    for (const [key, value] of Object.entries(options.environment)) {
      args.push('-e', `${key}=${value}`);
    }
  }

  if (options.interactive) {
    args.push('-i');
  }
  if (options.tty) {
    args.push('-t');
  }

  args.push(options.image, ...options.command);
  return args;
}

/**
 * Run options for one toolchain invocation: the host directory mounted at
 * the configured path, the toolchain's home redirected under it, and the
 * forwarded arguments appended after the toolchain binary.
 */
export function toolchainRunOptions(
  config: WrapperConfig,
  image: string,
  hostDir: string,
  args: string[],
  user: HostIdentity | null,
  tty: boolean
): DockerRunOptions {
  return {
    image,
    command: [TOOLCHAIN_BINARY, ...args],
    workdir: config.mountPath,
    mounts: [{ source: hostDir, target: config.mountPath }],
    environment: {
      [TOOLCHAIN_HOME_VAR]: path.posix.join(config.mountPath, TOOLCHAIN_HOME_DIR),
    },
    user,
    interactive: true,
    tty,
  };
}

export async function checkRuntimeEnvironment(runtime: string): Promise<RuntimeEnvironmentCheck> {
  const errors: string[] = [];
  const setupInstructions: string[] = [];

  if (!(await canExecute([runtime, '--version']))) {
    errors.push(`Container runtime "${runtime}" is not installed or not in PATH`);
    setupInstructions.push(
      chalk.bold('Install Docker:'),
      '  Visit https://docs.docker.com/get-docker/ for installation instructions',
      '  ',
      chalk.bold('Or point the wrapper at another runtime:'),
      '  export CARGO_BOX_RUNTIME=podman'
    );
  }

  return {
    isValid: errors.length === 0,
    errors,
    setupInstructions,
  };
}

/**
 * Build the toolchain image from its inline definition and return the
 * identifier the runtime prints. The runtime's layer cache makes repeated
 * builds of an unchanged definition cheap.
 */
export async function buildImage(
  invocation: string[],
  definition: ImageDefinition,
  verbose = false
): Promise<string> {
  const cmd = buildImageArgs(invocation);
  if (verbose) {
    printStep(`Building image from ${chalk.cyan(definition.baseImage)}`);
    printCommand(cmd);
  }

  const spinner = verbose ? createSpinner('Building toolchain image...') : null;
  spinner?.start();
  const proc = await spawnCaptured(cmd, renderImageDefinition(definition));
  spinner?.stop();

  if (proc.notFound) {
    throw new RuntimeNotFoundError(invocation[0]);
  }
  if (proc.exitCode !== 0) {
    throw new ImageBuildError(proc.exitCode);
  }

  const image = proc.stdout.trim();
  if (!image) {
    throw new ImageBuildError(0);
  }
  if (verbose) {
    printStep(`Using image ${chalk.cyan(image)}`);
  }
  return image;
}

/**
 * Run a container attached to the current terminal and resolve with its exit
 * status.
 *
 * Signals sent to the wrapper are relayed to the runtime client, which
 * forwards them into the container; the wrapper stays alive until the client
 * exits so it can report the container's status.
 */
export async function runContainer(
  invocation: string[],
  options: DockerRunOptions,
  verbose = false
): Promise<number> {
  const cmd = buildRunArgs(invocation, options);
  if (verbose) {
    printStep('Starting container');
    printCommand(cmd);
  }

  const subprocess = spawnInherited(cmd);
  const onSignal = (signal: NodeJS.Signals) => {
    subprocess.kill(signal);
  };
  for (const signal of RELAYED_SIGNALS) process.on(signal, onSignal);

  try {
    const proc = await subprocess.exited;
    if (proc.notFound) {
      throw new RuntimeNotFoundError(invocation[0]);
    }
    if (proc.signal && verbose) {
      printWarning(`Container runtime was terminated by ${proc.signal}`);
    }
    return proc.exitCode;
  } finally {
    for (const signal of RELAYED_SIGNALS) process.off(signal, onSignal);
  }
}
