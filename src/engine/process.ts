/**
 * Subprocess invocation helper.
 *
 * One call spawns one tesseract process, feeds it the image on stdin,
 * collects stdout/stderr and waits for it to exit. The wait is bounded by
 * `timeoutMs`; when it elapses the process is killed and the promise
 * rejects. No pooling and no retries.
 */

import { spawn } from 'child_process';
import { MAX_TIMEOUT_MS } from './constants.js';
import {
  ConfigurationError,
  TesseractNotFoundError,
  TesseractRuntimeError,
  TesseractTimeoutError,
} from '../errors/index.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('Process');

export interface ExecuteOptions {
  /** Binary to run. */
  cmd: string;
  timeoutMs: number;
}

export interface CheckedExecuteOptions extends ExecuteOptions {
  /** Used to decode stderr into the runtime error message. */
  encoding: BufferEncoding;
}

export interface ProcessResult {
  stdout: Buffer;
  stderr: Buffer;
  /** Null when the process was ended by a signal. */
  exitCode: number | null;
}

export function execute(
  args: readonly string[],
  input: Uint8Array | undefined,
  options: ExecuteOptions
): Promise<ProcessResult> {
  const { cmd, timeoutMs } = options;

  return new Promise<ProcessResult>((resolve, reject) => {
    // setTimeout fires almost at once for delays outside 1..MAX_TIMEOUT_MS
    if (!(timeoutMs > 0 && timeoutMs <= MAX_TIMEOUT_MS)) {
      reject(
        new ConfigurationError(`timeoutMs must be between 1 and ${MAX_TIMEOUT_MS}, got: ${timeoutMs}`, { timeoutMs })
      );
      return;
    }

    log.debug(`spawn ${cmd} ${args.join(' ')}`);
    const proc = spawn(cmd, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    const timer = setTimeout(() => {
      settle(() => {
        log.debug(`timeout after ${timeoutMs}ms, killing pid ${proc.pid ?? '?'}`);
        proc.kill('SIGKILL');
        reject(new TesseractTimeoutError(timeoutMs, { args: [...args] }));
      });
    }, timeoutMs);

    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    proc.on('error', (err: NodeJS.ErrnoException) => {
      settle(() => {
        reject(err.code === 'ENOENT' ? new TesseractNotFoundError(cmd, { args: [...args] }) : err);
      });
    });

    proc.on('close', (code: number | null) => {
      settle(() => {
        log.debug(`${cmd} exited with ${code}`);
        resolve({ stdout: Buffer.concat(stdout), stderr: Buffer.concat(stderr), exitCode: code });
      });
    });

    // The engine may exit before reading all of stdin (bad image, --version).
    // The exit status decides the outcome, not the broken pipe.
    proc.stdin.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EPIPE') return;
      settle(() => {
        proc.kill('SIGKILL');
        reject(err);
      });
    });

    if (input) {
      proc.stdin.end(input);
    } else {
      proc.stdin.end();
    }
  });
}

/**
 * Like `execute`, but a nonzero exit status rejects with a
 * `TesseractRuntimeError` carrying the engine's stderr.
 */
export async function executeChecked(
  args: readonly string[],
  input: Uint8Array | undefined,
  options: CheckedExecuteOptions
): Promise<ProcessResult> {
  const result = await execute(args, input, options);
  if (result.exitCode !== 0) {
    throw new TesseractRuntimeError(result.stderr.toString(options.encoding), result.exitCode, {
      args: [...args],
    });
  }
  return result;
}
