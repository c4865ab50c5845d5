import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../src/utils/config.js';
import { ConfigError } from '../src/utils/wrapper-error.js';

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ PATH: '/usr/bin', SUDO: 'never' })).toEqual(DEFAULT_CONFIG);
  });

  it('reads every CARGO_BOX_ variable', () => {
    expect(
      loadConfig({
        CARGO_BOX_RUNTIME: 'podman',
        CARGO_BOX_BASE_IMAGE: 'rust:1.80-slim',
        CARGO_BOX_SETUP: 'rustup component add rustfmt',
        CARGO_BOX_SUDO: 'NEVER',
        CARGO_BOX_MOUNT_PATH: '/src/',
        CARGO_BOX_VERBOSE: 'yes',
        CARGO_BOX_SKIP_CHECK: 'On',
      })
    ).toEqual({
      runtime: 'podman',
      baseImage: 'rust:1.80-slim',
      setup: 'rustup component add rustfmt',
      sudo: 'never',
      mountPath: '/src',
      verbose: true,
      skipCheck: true,
    });
  });

  it('treats an empty flag as off', () => {
    expect(loadConfig({ CARGO_BOX_VERBOSE: '' }).verbose).toBe(false);
  });

  it('rejects an unknown sudo policy', () => {
    const err = configError({ CARGO_BOX_SUDO: 'sometimes' });
    expect(err.variable).toBe('CARGO_BOX_SUDO');
    expect(err.exitCode).toBe(2);
  });

  it('rejects a relative mount path', () => {
    const err = configError({ CARGO_BOX_MOUNT_PATH: 'workspace' });
    expect(err.variable).toBe('CARGO_BOX_MOUNT_PATH');
    expect(err.message).toBe('Invalid CARGO_BOX_MOUNT_PATH: must be an absolute path');
  });

  it('rejects a blank runtime', () => {
    const err = configError({ CARGO_BOX_RUNTIME: '   ' });
    expect(err.message).toBe('Invalid CARGO_BOX_RUNTIME: must not be empty');
  });

  it('rejects a flag it cannot read', () => {
    expect(configError({ CARGO_BOX_VERBOSE: 'maybe' }).variable).toBe('CARGO_BOX_VERBOSE');
  });
});
