import {
  ALGORITHM,
  DEFAULT_KEY_FILE,
  DEFAULT_REGISTRY,
  DEFAULT_SAMPLE_INTERPRETER,
  DEFAULT_SAMPLE_SCRIPT,
  MESSAGE_TYPE,
} from './config.js';
import { ConfigError, HostnameError, type RequiredVariable } from './errors.js';
import { shortHostname, type HostnameProvider } from './hostname.js';

export type Env = Record<string, string | undefined>;

/**
 * Parameters handed to the sample client for one invocation.
 * Built once, never mutated.
 */
export interface LaunchConfig {
  readonly projectId: string;
  readonly region: string;
  readonly registry: string;
  readonly deviceId: string;
  readonly keyFile: string;
  readonly messageType: typeof MESSAGE_TYPE;
  readonly algorithm: typeof ALGORITHM;
}

/** How the sample client is started: `<interpreter> <script> [flags...]` */
export interface SampleProgram {
  readonly interpreter: string;
  readonly script: string;
}

export type ResolveResult =
  | { ok: true; config: LaunchConfig }
  | { ok: false; error: ConfigError | HostnameError };

// Unset, empty and whitespace-only all count as absent
function present(value: string | undefined): string | undefined {
  const v = value?.trim();
  return v ? v : undefined;
}

/**
 * Validate required variables and fill in defaults.
 *
 * Reads only what it is given: `env` stands in for the process environment,
 * `args` for the positional arguments (the first one is the registry).
 * The hostname is looked up only when HOST is absent and validation passed.
 */
export function resolveLaunchConfig(
  env: Env,
  args: readonly string[],
  hostname: HostnameProvider = shortHostname,
): ResolveResult {
  const projectId = present(env.PROJECT_ID);
  const region = present(env.MY_REGION);
  if (!projectId || !region) {
    const missing: RequiredVariable[] = [];
    if (!projectId) missing.push('PROJECT_ID');
    if (!region) missing.push('MY_REGION');
    return { ok: false, error: new ConfigError(missing) };
  }

  let deviceId = present(env.HOST);
  if (!deviceId) {
    try {
      deviceId = present(hostname());
    } catch (e) {
      return { ok: false, error: new HostnameError(e instanceof Error ? e.message : String(e)) };
    }
    if (!deviceId) return { ok: false, error: new HostnameError('hostname is empty') };
  }

  return {
    ok: true,
    config: {
      projectId,
      region,
      registry: present(args[0]) ?? DEFAULT_REGISTRY,
      deviceId,
      keyFile: present(env.KEY_FILE) ?? DEFAULT_KEY_FILE,
      messageType: MESSAGE_TYPE,
      algorithm: ALGORITHM,
    },
  };
}

export function resolveSampleProgram(env: Env): SampleProgram {
  return {
    interpreter: present(env.SAMPLE_INTERPRETER) ?? DEFAULT_SAMPLE_INTERPRETER,
    script: present(env.SAMPLE_SCRIPT) ?? DEFAULT_SAMPLE_SCRIPT,
  };
}
