import test from 'node:test';
import assert from 'node:assert/strict';
import type { SpawnOptions } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Invocation } from '../src/command.js';
import { LaunchError } from '../src/errors.js';
import { exitStatusOf, forwardsSignal, launch, type SpawnFn } from '../src/launch.js';

class FakeChild extends EventEmitter {
  readonly killed: NodeJS.Signals[] = [];

  kill(signal?: NodeJS.Signals): boolean {
    if (signal) this.killed.push(signal);
    return true;
  }
}

interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

function fakeSpawn(child: FakeChild): { spawn: SpawnFn; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    return child;
  };
  return { spawn, calls };
}

const inv: Invocation = { command: 'python3', args: ['my-sample.py', '--project_id=p'] };

test('launch spawns once with inherited stdio and resolves with the exit', async () => {
  const child = new FakeChild();
  const { spawn, calls } = fakeSpawn(child);
  const env = { PROJECT_ID: 'p' };
  const pending = launch(inv, { spawn, signals: new EventEmitter(), env });
  child.emit('exit', 3, null);

  assert.deepEqual(await pending, { code: 3, signal: null });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].command, 'python3');
  assert.deepEqual(calls[0].args, ['my-sample.py', '--project_id=p']);
  assert.equal(calls[0].options.stdio, 'inherit');
  assert.equal(calls[0].options.env, env);
});

test('launch forwards termination signals to the child', async () => {
  const child = new FakeChild();
  const signals = new EventEmitter();
  const pending = launch(inv, { spawn: fakeSpawn(child).spawn, signals, interactive: false });

  signals.emit('SIGTERM');
  signals.emit('SIGINT');
  assert.deepEqual(child.killed, ['SIGTERM', 'SIGINT']);

  child.emit('exit', null, 'SIGTERM');
  assert.deepEqual(await pending, { code: null, signal: 'SIGTERM' });
});

test('launch on a terminal forwards only SIGTERM but still outlives SIGINT and SIGHUP', async () => {
  const child = new FakeChild();
  const signals = new EventEmitter();
  const pending = launch(inv, { spawn: fakeSpawn(child).spawn, signals, interactive: true });

  signals.emit('SIGINT');
  signals.emit('SIGHUP');
  signals.emit('SIGTERM');
  assert.deepEqual(child.killed, ['SIGTERM']);
  assert.equal(signals.listenerCount('SIGINT'), 1);

  child.emit('exit', 130, null);
  assert.deepEqual(await pending, { code: 130, signal: null });
});

test('forwardsSignal skips terminal-delivered signals only when interactive', () => {
  assert.equal(forwardsSignal('SIGINT', false), true);
  assert.equal(forwardsSignal('SIGHUP', false), true);
  assert.equal(forwardsSignal('SIGINT', true), false);
  assert.equal(forwardsSignal('SIGHUP', true), false);
  assert.equal(forwardsSignal('SIGTERM', true), true);
});

test('launch removes its signal handlers once the child exits', async () => {
  const child = new FakeChild();
  const signals = new EventEmitter();
  const pending = launch(inv, { spawn: fakeSpawn(child).spawn, signals });
  assert.equal(signals.listenerCount('SIGINT'), 1);

  child.emit('exit', 0, null);
  await pending;
  assert.equal(signals.listenerCount('SIGINT'), 0);
  assert.equal(signals.listenerCount('SIGTERM'), 0);
  assert.equal(signals.listenerCount('SIGHUP'), 0);
});

test('launch reports a missing interpreter as exit 127', async () => {
  const child = new FakeChild();
  const signals = new EventEmitter();
  const pending = launch(inv, { spawn: fakeSpawn(child).spawn, signals });
  child.emit('error', Object.assign(new Error('spawn python3 ENOENT'), { code: 'ENOENT' }));

  await assert.rejects(pending, (err: unknown) => {
    if (!(err instanceof LaunchError)) return false;
    assert.equal(err.exitCode, 127);
    assert.equal(err.code, 'ENOENT');
    assert.equal(err.message, 'python3: command not found');
    return true;
  });
  assert.equal(signals.listenerCount('SIGTERM'), 0);
});

test('launch wraps a synchronous spawn failure', async () => {
  const spawn: SpawnFn = () => {
    throw new TypeError('bad args');
  };
  await assert.rejects(launch(inv, { spawn, signals: new EventEmitter() }), (err: unknown) => {
    if (!(err instanceof LaunchError)) return false;
    assert.equal(err.exitCode, 1);
    assert.equal(err.message, 'failed to start python3: bad args');
    return true;
  });
});

test('exitStatusOf passes numeric codes through', () => {
  assert.equal(exitStatusOf({ code: 0, signal: null }), 0);
  assert.equal(exitStatusOf({ code: 2, signal: null }), 2);
});

test('exitStatusOf maps signals to 128 + N', () => {
  assert.equal(exitStatusOf({ code: null, signal: 'SIGINT' }), 130);
  assert.equal(exitStatusOf({ code: null, signal: 'SIGTERM' }), 143);
});

test('exitStatusOf never reports an unknown ending as success', () => {
  assert.equal(exitStatusOf({ code: null, signal: null }), 1);
});
