import dotenv from 'dotenv';
import { buildInvocation, formatInvocation } from './command.js';
import { SERVICE } from './config.js';
import { LauncherError } from './errors.js';
import type { HostnameProvider } from './hostname.js';
import { exitStatusOf, launch, type LaunchOptions } from './launch.js';
import { resolveLaunchConfig, resolveSampleProgram, type Env } from './resolve.js';

export interface RunOptions {
  // Defaults to `.env` in the working directory; a missing file is not an error
  envFile?: string;
  hostname?: HostnameProvider;
  launch?: Omit<LaunchOptions, 'env'>;
}

// Values from the env file only fill gaps; the real environment wins
export function loadEnv(env: Env, envFile?: string): Env {
  const { parsed } = dotenv.config({ path: envFile, processEnv: {} });
  return { ...parsed, ...env };
}

/**
 * One launcher invocation: resolve, start the sample client, wait.
 * Resolves with the status this process should exit with.
 */
export async function run(env: Env, argv: readonly string[], opts: RunOptions = {}): Promise<number> {
  const merged = loadEnv(env, opts.envFile);
  const resolved = resolveLaunchConfig(merged, argv, opts.hostname);
  if (!resolved.ok) {
    console.error(`[${SERVICE}] ${resolved.error.message}`);
    return resolved.error.exitCode;
  }

  const { config } = resolved;
  const invocation = buildInvocation(config, resolveSampleProgram(merged));
  console.log(`[${SERVICE}] connecting ${config.deviceId} to registry ${config.registry} (${config.projectId}/${config.region})`);
  console.log(`[${SERVICE}] exec: ${formatInvocation(invocation)}`);

  try {
    const status = exitStatusOf(await launch(invocation, { ...opts.launch, env: merged }));
    if (status !== 0) console.error(`[${SERVICE}] sample client exited with status ${status}`);
    return status;
  } catch (e) {
    if (!(e instanceof LauncherError)) throw e;
    console.error(`[${SERVICE}] ${e.message}`);
    return e.exitCode;
  }
}
