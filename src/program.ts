import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { replayCommand } from './commands/replay';
import type { ReplayCliOptions } from './lib/config-manager';

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Build the varnish-replay command. The entry point parses process.argv;
 * tests call `exitOverride()` on the result to observe usage errors.
 */
export function createProgram(): Command {
  const program = new Command();
  program
    .name('varnish-replay')
    .description('Replay live varnishlog client traffic against another host')
    .version('1.0.0')
    .argument('<host>', 'Target host to send requests to (host or host:port)')
    .option('--varnishlog <path>', 'varnishlog binary (default: varnishlog)')
    .option('-i, --input <file>', 'Replay a captured varnishlog output file ("-" for stdin)')
    .option('--json-log <path>', 'Append each result as a JSON line to this file')
    .option('--timeout <ms>', 'Socket timeout per request (default: transport default)', parsePositiveInt)
    .option('--no-color', 'Disable colored output')
    .option('-v, --verbose', 'Log discarded records')
    .allowExcessArguments(false)
    .showHelpAfterError()
    .action(async (host: string, options: ReplayCliOptions) => {
      try {
        await replayCommand(host, options);
      } catch (error) {
        console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return program;
}
