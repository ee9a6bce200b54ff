/**
 * Command Execution Wrapper
 * 
 * Wrappers for running external commands with:
 * - Timeout handling
 * - Output capture
 * - Exit tracking for long-running processes
 */

import { spawn, SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Execute an external command and wait for it to exit
 * 
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    if (signal) {
      signal.addEventListener('abort', () => {
        child.kill('SIGTERM');
      });
    }

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * A detached view of a running process. `exitCode` stays null until the
 * process has exited; a spawn failure is reported as exit code 127.
 */
export interface RunningProcess {
  readonly pid: number | undefined;
  readonly exitCode: number | null;
  readonly stderr: string;
  readonly stdout: string;
  readonly spawnError: Error | undefined;
  readonly exited: Promise<number>;
  kill(): void;
}

/**
 * Start an external command without waiting for it.
 * The caller observes completion through `exitCode` or `exited`.
 */
export function startProcess(
  command: string,
  args: string[],
  options: Omit<CommandOptions, 'timeout'> = {}
): RunningProcess {
  const {
    cwd = process.cwd(),
    env = process.env,
    maxOutputSize = 64 * 1024,
  } = options;

  const child = spawn(command, args, {
    cwd,
    env,
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  let exitCode: number | null = null;
  let spawnError: Error | undefined;
  let stdout = '';
  let stderr = '';

  child.stdout?.on('data', (data: Buffer) => {
    if (stdout.length < maxOutputSize) {
      stdout += data.toString();
    }
  });

  child.stderr?.on('data', (data: Buffer) => {
    if (stderr.length < maxOutputSize) {
      stderr += data.toString();
    }
  });

  const exited = new Promise<number>((resolve) => {
    child.on('close', (code, exitSignal) => {
      exitCode ??= code ?? (exitSignal ? 128 : 1);
      resolve(exitCode);
    });
    child.on('error', (error) => {
      spawnError = error;
      exitCode = 127;
      resolve(exitCode);
    });
  });

  if (options.signal) {
    options.signal.addEventListener('abort', () => {
      child.kill('SIGTERM');
    });
  }

  return {
    pid: child.pid,
    get exitCode() {
      return exitCode;
    },
    get stdout() {
      return stdout;
    },
    get stderr() {
      return stderr;
    },
    get spawnError() {
      return spawnError;
    },
    exited,
    kill: () => {
      child.kill('SIGTERM');
    },
  };
}
