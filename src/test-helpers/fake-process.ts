/**
 * In-process stand-in for a spawned tesseract.
 *
 * Tests mock `child_process.spawn` to return a FakeChildProcess, then script
 * its output and exit status. No real binary is ever started.
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

export interface FakeOutcome {
  stdout?: string | Buffer;
  stderr?: string | Buffer;
  code?: number | null;
}

export class FakeChildProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  killSignal: string | number | undefined;
  private readonly input: Buffer[] = [];

  constructor() {
    super();
    this.stdin.on('data', (chunk: Buffer) => this.input.push(chunk));
  }

  kill(signal?: string | number): boolean {
    this.killSignal = signal;
    return true;
  }

  /** Bytes written to stdin so far. */
  received(): Buffer {
    return Buffer.concat(this.input);
  }

  /** Write the scripted output, then emit `close` once both pipes drained. */
  finish({ stdout = '', stderr = '', code = 0 }: FakeOutcome = {}): void {
    let open = 2;
    const drained = (): void => {
      open -= 1;
      if (open === 0) this.emit('close', code);
    };
    this.stdout.once('end', drained);
    this.stderr.once('end', drained);
    this.stdout.end(stdout);
    this.stderr.end(stderr);
  }

  /** Emit a spawn failure such as ENOENT. */
  fail(code: string): void {
    this.emit('error', Object.assign(new Error(`spawn ${code}`), { code }));
  }
}

export interface SpawnCall {
  cmd: string;
  args: string[];
  proc: FakeChildProcess;
}

/**
 * Build a `spawn` implementation that returns a fresh FakeChildProcess per
 * call and finishes it with `outcome` on the next turn of the event loop.
 * Pass `null` to leave the process hanging.
 */
export function scriptedSpawn(outcome: FakeOutcome | null, calls: SpawnCall[] = []) {
  return (cmd: string, args: string[]): FakeChildProcess => {
    const proc = new FakeChildProcess();
    calls.push({ cmd, args, proc });
    if (outcome) {
      setImmediate(() => proc.finish(outcome));
    }
    return proc;
  };
}
