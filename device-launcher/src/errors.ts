import { EXIT_COMMAND_NOT_FOUND, EXIT_CONFIG_ERROR, EXIT_FAILURE } from './config.js';

export type RequiredVariable = 'PROJECT_ID' | 'MY_REGION';

export class LauncherError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

// Missing required environment; terminal before anything is spawned
export class ConfigError extends LauncherError {
  readonly missing: RequiredVariable[];

  constructor(missing: RequiredVariable[]) {
    super(`PROJECT_ID or MY_REGION were empty (missing: ${missing.join(', ')})`, EXIT_CONFIG_ERROR);
    this.missing = missing;
  }
}

export class HostnameError extends LauncherError {
  constructor(detail: string) {
    super(`could not determine local hostname for device id: ${detail}`, EXIT_FAILURE);
  }
}

export class LaunchError extends LauncherError {
  readonly command: string;
  readonly code: string | undefined;

  constructor(command: string, cause: unknown) {
    const code = errorCode(cause);
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      code === 'ENOENT' ? `${command}: command not found` : `failed to start ${command}: ${detail}`,
      code === 'ENOENT' ? EXIT_COMMAND_NOT_FOUND : EXIT_FAILURE,
    );
    this.command = command;
    this.code = code;
  }
}

function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  return typeof e.code === 'string' ? e.code : undefined;
}
