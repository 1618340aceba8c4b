/**
 * cachesim run <config> --trace <file>: replay a trace and print the report.
 *
 * Exit codes: 0 = success, 1 = trace or runtime failure, 2 = configuration error.
 */

import { Option, type Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { initLogger } from '../../logging/index.js';
import { REPORT_FORMATS, formatReport, type ReportFormat } from '../../report/formatter.js';
import { Simulator } from '../../simulator/simulator.js';
import { readTraceFile } from '../../trace/trace-parser.js';
import { reportFailure } from '../failure.js';

interface RunOptions {
  trace: string;
  format: ReportFormat;
  onError?: 'skip' | 'abort';
  dump?: boolean;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <config>')
    .description('Replay a trace file against the configured hierarchy')
    .requiredOption('-t, --trace <file>', 'Trace file, one "<R|W> <address>" per line')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(REPORT_FORMATS).default('text'))
    .addOption(new Option('--on-error <mode>', 'What to do with a bad trace line').choices(['skip', 'abort']))
    .option('-d, --dump', 'Include the final contents of every level')
    .action(async (configPath: string, opts: RunOptions) => {
      try {
        const config = await loadConfig({ configPath, overrides: { onError: opts.onError } });
        const logger = initLogger({ simulation: config.name }, config.logging);

        const simulator = new Simulator(config, { logger });
        await simulator.runAsync(readTraceFile(opts.trace));

        process.stdout.write(formatReport(simulator.report(opts.dump === true), opts.format));
        process.exitCode = 0;
      } catch (err) {
        reportFailure(err);
      }
    });
}
