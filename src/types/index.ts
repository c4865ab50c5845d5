export type SudoPolicy = 'always' | 'never' | 'auto';

export interface WrapperConfig {
  runtime: string;
  baseImage: string;
  setup: string;
  sudo: SudoPolicy;
  mountPath: string;
  verbose: boolean;
  skipCheck: boolean;
}

export interface ImageDefinition {
  baseImage: string;
  setup: string;
}

export interface HostIdentity {
  uid: number;
  gid: number;
}

export interface RuntimeEnvironmentCheck {
  isValid: boolean;
  errors: string[];
  setupInstructions: string[];
}
