import { spawn, type SpawnOptions } from 'child_process';
import { constants } from 'os';
import { isatty } from 'tty';
import type { Invocation } from './command.js';
import { EXIT_FAILURE } from './config.js';
import { LaunchError } from './errors.js';

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

// The subset of ChildProcess the launcher relies on
export interface ChildHandle {
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown;
  off(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface LaunchOptions {
  spawn?: SpawnFn;
  // Where termination signals are received; defaults to this process
  signals?: SignalSource;
  env?: NodeJS.ProcessEnv;
  // Attached to a terminal; defaults to whether fd 0 is a TTY
  interactive?: boolean;
}

export const HANDLED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

// On a terminal the foreground process group already delivers SIGINT and SIGHUP to the child
export function forwardsSignal(sig: NodeJS.Signals, interactive: boolean): boolean {
  return !interactive || sig === 'SIGTERM';
}

/**
 * Run the sample client in the foreground and wait for it to exit.
 * Termination signals received meanwhile do not stop the launcher; they are
 * passed on to the child unless it already got them from the terminal.
 * The child decides when to stop, the launcher only reports how it ended.
 */
export function launch(inv: Invocation, opts: LaunchOptions = {}): Promise<ChildExit> {
  const doSpawn: SpawnFn = opts.spawn ?? spawn;
  const signals: SignalSource = opts.signals ?? process;
  const interactive = opts.interactive ?? isatty(0);

  return new Promise<ChildExit>((resolve, reject) => {
    let child: ChildHandle;
    try {
      child = doSpawn(inv.command, inv.args, { stdio: 'inherit', env: opts.env ?? process.env });
    } catch (e) {
      reject(new LaunchError(inv.command, e));
      return;
    }

    const forwards = HANDLED_SIGNALS.map((sig) => {
      const listener = () => {
        if (forwardsSignal(sig, interactive)) child.kill(sig);
      };
      signals.on(sig, listener);
      return { sig, listener };
    });
    const detach = () => {
      for (const { sig, listener } of forwards) signals.off(sig, listener);
    };

    child.once('error', (err) => {
      detach();
      reject(new LaunchError(inv.command, err));
    });
    child.once('exit', (code, signal) => {
      detach();
      resolve({ code, signal });
    });
  });
}

// Shell convention: a child killed by signal N reports 128 + N
export function exitStatusOf(exit: ChildExit): number {
  if (exit.code !== null) return exit.code;
  if (exit.signal) {
    const num: unknown = Reflect.get(constants.signals, exit.signal);
    if (typeof num === 'number') return 128 + num;
  }
  return EXIT_FAILURE;
}
