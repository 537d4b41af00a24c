import { spawn, type ChildProcess } from 'child_process';
import * as fs from 'fs';
import type { ReplayConfig } from '../types/replay-config';
import { fileExists } from '../utils/file-utils';

/**
 * varnishlog writes request bytes as it received them. latin1 maps each byte
 * to one code point, so URLs and header values reach the target unchanged.
 */
export const LOG_ENCODING: BufferEncoding = 'latin1';

export interface LogSource {
  description: string;
  stream: NodeJS.ReadableStream;
  /** Settles when the producer is finished; rejects if it failed */
  done: Promise<void>;
  close(): void;
}

/**
 * Start varnishlog and resolve once the process is running.
 * Rejects if the binary cannot be started.
 */
export async function startVarnishlog(binary: string, args: string[]): Promise<LogSource> {
  const child = spawn(binary, args, {
    stdio: ['ignore', 'pipe', 'inherit'],
  });

  await new Promise<void>((resolve, reject) => {
    child.once('spawn', () => resolve());
    child.once('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new Error(`${binary} not found. Install Varnish or pass --varnishlog <path>`));
      } else {
        reject(new Error(`Failed to start ${binary}: ${error.message}`));
      }
    });
  });

  const stdout = child.stdout;
  if (!stdout) {
    child.kill();
    throw new Error(`Failed to open output pipe of ${binary}`);
  }
  stdout.setEncoding(LOG_ENCODING);

  return {
    description: [binary, ...args].join(' '),
    stream: stdout,
    done: waitForExit(child, binary),
    close: () => {
      child.kill();
    },
  };
}

function waitForExit(child: ChildProcess, binary: string): Promise<void> {
  return new Promise((resolve, reject) => {
    child.on('error', (error) => {
      reject(new Error(`${binary} failed: ${error.message}`));
    });

    child.on('exit', (code, signal) => {
      if (code === 0) {
        resolve();
      } else if (signal) {
        reject(new Error(`${binary} was terminated by ${signal}`));
      } else {
        reject(new Error(`${binary} exited with code ${code}`));
      }
    });
  });
}

/**
 * Read a previously captured varnishlog output file
 */
export async function openLogFile(filePath: string): Promise<LogSource> {
  if (!(await fileExists(filePath))) {
    throw new Error(`Log file not found: ${filePath}`);
  }

  const stream = fs.createReadStream(filePath, { encoding: LOG_ENCODING });
  return {
    description: filePath,
    stream,
    done: Promise.resolve(),
    close: () => {
      stream.destroy();
    },
  };
}

export function openStdin(): LogSource {
  process.stdin.setEncoding(LOG_ENCODING);
  return {
    description: 'stdin',
    stream: process.stdin,
    done: Promise.resolve(),
    close: () => {
      process.stdin.destroy();
    },
  };
}

export async function openLogSource(config: ReplayConfig): Promise<LogSource> {
  switch (config.source) {
    case 'varnishlog':
      return startVarnishlog(config.varnishlogBinary, config.varnishlogArgs);
    case 'file':
      if (!config.inputPath) {
        throw new Error('No input file given');
      }
      return openLogFile(config.inputPath);
    case 'stdin':
      return openStdin();
  }
}
