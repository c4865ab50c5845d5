import * as path from 'node:path';
import { z } from 'zod';
import type { WrapperConfig } from '../types/index.js';
import { ConfigError } from './wrapper-error.js';

export const ENV_PREFIX = 'CARGO_BOX_';

export const DEFAULT_CONFIG: WrapperConfig = {
  runtime: 'docker',
  baseImage: 'rust:latest',
  setup: 'rustup component add clippy',
  sudo: 'always',
  mountPath: '/workspace',
  verbose: false,
  skipCheck: false,
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['', '0', 'false', 'no', 'off']);

const flag = z
  .string()
  .transform((v) => v.trim().toLowerCase())
  .refine((v) => TRUE_VALUES.has(v) || FALSE_VALUES.has(v), {
    message: 'expected one of 1, true, yes, on, 0, false, no, off',
  })
  .transform((v) => TRUE_VALUES.has(v));

const word = z.string().trim().min(1, 'must not be empty');

const envSchema = z.object({
  RUNTIME: word.default(DEFAULT_CONFIG.runtime),
  BASE_IMAGE: word.default(DEFAULT_CONFIG.baseImage),
  SETUP: word.default(DEFAULT_CONFIG.setup),
  SUDO: z
    .string()
    .transform((v) => v.trim().toLowerCase())
    .pipe(z.enum(['always', 'never', 'auto']))
    .default(DEFAULT_CONFIG.sudo),
  MOUNT_PATH: word
    .refine((v) => path.posix.isAbsolute(v), { message: 'must be an absolute path' })
    .transform((v) => (v.length > 1 ? v.replace(/\/+$/, '') : v))
    .default(DEFAULT_CONFIG.mountPath),
  VERBOSE: flag.default('0'),
  SKIP_CHECK: flag.default('0'),
});

const ENV_KEYS = [
  'RUNTIME',
  'BASE_IMAGE',
  'SETUP',
  'SUDO',
  'MOUNT_PATH',
  'VERBOSE',
  'SKIP_CHECK',
] as const satisfies ReadonlyArray<keyof typeof envSchema.shape>;

type EnvKey = (typeof ENV_KEYS)[number];

/**
 * Read wrapper settings from CARGO_BOX_* environment variables.
 * Unset variables fall back to DEFAULT_CONFIG.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WrapperConfig {
  const raw: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[`${ENV_PREFIX}${key}`];
    if (value !== undefined) raw[key] = value;
  }

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = `${ENV_PREFIX}${String(issue.path[0] ?? '')}`;
    throw new ConfigError(variable, issue.message);
  }

  const cfg = parsed.data;
  return {
    runtime: cfg.RUNTIME,
    baseImage: cfg.BASE_IMAGE,
    setup: cfg.SETUP,
    sudo: cfg.SUDO,
    mountPath: cfg.MOUNT_PATH,
    verbose: cfg.VERBOSE,
    skipCheck: cfg.SKIP_CHECK,
  };
}
