import chalk from 'chalk';
import { configManager, type ReplayCliOptions } from '../lib/config-manager';
import { openLogSource } from '../lib/log-source';
import { ReplayLogger } from '../lib/replay-logger';
import { Dispatcher } from '../lib/dispatcher';
import { StreamDriver, type DriverStats } from '../lib/stream-driver';

export async function replayCommand(host: string, options: ReplayCliOptions): Promise<void> {
  const config = await configManager.resolve(host, options);

  const logger = new ReplayLogger({
    verbose: config.verbose,
    color: config.color,
    jsonLogPath: config.jsonLogPath,
  });
  const dispatcher = new Dispatcher({
    targetHost: config.targetHost,
    logger,
    requestTimeout: config.requestTimeout,
  });
  const driver = new StreamDriver({ replayer: dispatcher, logger });

  const source = await openLogSource(config);

  console.error(chalk.blue(`🔁 Replaying ${source.description} → ${config.targetHost}`));

  // A live varnishlog never ends on its own; in-flight requests are abandoned
  if (config.source === 'varnishlog') {
    const stop = () => {
      source.close();
      process.exit(0);
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  }

  let stats: DriverStats;
  try {
    [stats] = await Promise.all([driver.run(source.stream), source.done]);
  } catch (error) {
    source.close();
    throw error;
  }
  await driver.pending();

  logger.debug(
    `Read ${stats.lines} lines, replayed ${stats.records} requests ` +
      `(${stats.abandoned} incomplete, ${stats.malformedHeaders} malformed headers)`
  );
}
