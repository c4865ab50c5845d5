import type { WrapperConfig } from '../types/index.js';
import {
  buildImage,
  checkRuntimeEnvironment,
  getHostIdentity,
  runContainer,
  runtimeInvocation,
  toolchainRunOptions,
} from '../utils/docker.js';
import { printInfo, printWarning } from '../utils/output-formatter.js';
import { RuntimeNotFoundError } from '../utils/wrapper-error.js';

// A reference without a tag or digest resolves to :latest.
export function isFloatingImageTag(image: string): boolean {
  if (image.includes('@')) return false;
  const name = image.slice(image.lastIndexOf('/') + 1);
  return !name.includes(':') || name.endsWith(':latest');
}

export interface CargoCommandContext {
  cwd?: string;
  interactiveTerminal?: boolean;
}

/**
 * Build the toolchain image, then run the toolchain in a throw-away
 * container with `args` forwarded unchanged. Resolves with the exit status
 * the wrapper should end with.
 */
export async function cargoCommand(
  config: WrapperConfig,
  args: string[],
  context: CargoCommandContext = {}
): Promise<number> {
  const cwd = context.cwd ?? process.cwd();
  const tty =
    context.interactiveTerminal ?? Boolean(process.stdin.isTTY && process.stdout.isTTY);

  if (!config.skipCheck) {
    const check = await checkRuntimeEnvironment(config.runtime);
    if (!check.isValid) {
      throw new RuntimeNotFoundError(config.runtime, check.setupInstructions, check.errors[0]);
    }
  }

  const identity = getHostIdentity();
  const invocation = runtimeInvocation(config, identity);

  if (config.verbose) {
    printInfo(
      identity
        ? `Running as ${identity.uid}:${identity.gid} with ${invocation.join(' ')}`
        : `Running with ${invocation.join(' ')}`
    );
    if (isFloatingImageTag(config.baseImage)) {
      printWarning(
        `Base image ${config.baseImage} is not pinned; set CARGO_BOX_BASE_IMAGE to a tag or digest for reproducible builds`
      );
    }
  }

  const image = await buildImage(
    invocation,
    { baseImage: config.baseImage, setup: config.setup },
    config.verbose
  );

  return runContainer(
    invocation,
    toolchainRunOptions(config, image, cwd, args, identity, tty),
    config.verbose
  );
}
