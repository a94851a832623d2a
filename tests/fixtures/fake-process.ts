/**
 * In-process stand-in for a spawned child process
 *
 * @module tests/fixtures/fake-process
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { vi } from 'vitest';
import type { SpawnedProcess } from '../../src/services/compression/compressor.js';

export class FakeProcess extends EventEmitter implements SpawnedProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly killSignals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    return true;
  }

  writeStdout(text: string): void {
    this.stdout.emit('data', Buffer.from(text));
  }

  writeStderr(text: string): void {
    this.stderr.emit('data', Buffer.from(text));
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('close', code, signal);
  }
}

/**
 * A spawn replacement that records every call and hands out FakeProcesses
 */
export function createFakeSpawn() {
  const processes: FakeProcess[] = [];
  const spawn = vi.fn((_command: string, _args: readonly string[]): SpawnedProcess => {
    const proc = new FakeProcess();
    processes.push(proc);
    return proc;
  });
  return { spawn, processes };
}
