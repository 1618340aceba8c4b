/**
 * cachesim validate <config>: check a hierarchy file and print each level's geometry.
 */

import type { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import { CacheHierarchy } from '../../hierarchy/cache-hierarchy.js';
import { createModuleLogger, withTiming } from '../../logging/index.js';
import { formatGeometry } from '../../report/formatter.js';
import { StatsCollector } from '../../stats/stats-collector.js';
import { reportFailure } from '../failure.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <config>')
    .description('Validate a hierarchy configuration file')
    .action(async (configPath: string) => {
      const logger = createModuleLogger('cli');

      try {
        const config = await loadConfig({ configPath });
        const hierarchy = withTiming(logger, 'build-hierarchy', () =>
          CacheHierarchy.fromConfig(config, { notifier: new StatsCollector(), logger })
        );

        process.stdout.write(`✓ Valid hierarchy: ${hierarchy.name}\n`);
        process.stdout.write(formatGeometry(hierarchy.levels));
        process.exitCode = 0;
      } catch (err) {
        reportFailure(err);
      }
    });
}
