import * as readline from 'readline';
import type { RequestRecord } from '../types/request-record';
import { RequestAssembler } from './request-assembler';
import type { ReplayLogger } from './replay-logger';

export interface RecordReplayer {
  replay(record: RequestRecord): Promise<unknown>;
}

export interface StreamDriverOptions {
  replayer: RecordReplayer;
  logger: ReplayLogger;
}

export interface DriverStats {
  lines: number;
  records: number;
  abandoned: number;
  malformedHeaders: number;
}

/**
 * Reads the log feed line by line and starts one replay task per completed
 * record. Tasks are never awaited by the read loop.
 */
export class StreamDriver {
  private replayer: RecordReplayer;
  private logger: ReplayLogger;
  private inFlight = new Set<Promise<void>>();
  private stats: DriverStats = { lines: 0, records: 0, abandoned: 0, malformedHeaders: 0 };

  constructor(options: StreamDriverOptions) {
    this.replayer = options.replayer;
    this.logger = options.logger;
  }

  /**
   * Resolves at end of stream, rejects if reading fails
   */
  run(input: NodeJS.ReadableStream): Promise<DriverStats> {
    const assembler = new RequestAssembler({
      onMalformedHeader: (value) => {
        this.stats.malformedHeaders++;
        this.logger.warn(`Ignoring malformed header line: ${value}`);
      },
      onAbandoned: (record) => {
        this.stats.abandoned++;
        this.logger.debug(`Discarding incomplete request: ${record.method ?? '?'} ${record.path ?? '?'}`);
      },
    });

    return new Promise((resolve, reject) => {
      const rl = readline.createInterface({
        input,
        crlfDelay: Infinity,
      });

      let failed = false;

      // readline re-emits input stream errors on the interface; close() then
      // emits 'close' synchronously, which must not resolve the run
      rl.on('error', (error: Error) => {
        failed = true;
        reject(new Error(`Failed to read log stream: ${error.message}`));
        rl.close();
      });

      rl.on('line', (line) => {
        this.stats.lines++;
        assembler.processLine(line, (record) => this.spawn(record));
      });

      rl.on('close', () => {
        if (failed) return;
        resolve({ ...this.stats });
      });
    });
  }

  /**
   * Number of replay tasks still running
   */
  get activeTasks(): number {
    return this.inFlight.size;
  }

  /**
   * Wait for every task started so far
   */
  async pending(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private spawn(record: RequestRecord): void {
    this.stats.records++;

    const task: Promise<void> = this.replayer
      .replay(record)
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.warn(`Replay failed: ${error instanceof Error ? error.message : String(error)}`);
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }
}
