/**
 * Doctor command for crosscheck CLI
 * Checks that the agent CLIs the configured roles need are on PATH
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  checkAvailability,
  missingTools,
  requiredTools,
  type BinaryLocator,
} from '../../agents/availability.js';
import { TOOL_KEYS } from '../../agents/types.js';
import { resolveConfig } from '../../core/config/crosscheck-config.js';
import {
  getErrorMessage,
  getUserFriendlyMessage,
  isCrosscheckError,
} from '../../core/errors/index.js';
import { ConsoleDisplay } from '../display.js';

export interface DoctorCommandDeps {
  locate?: BinaryLocator;
  display?: ConsoleDisplay;
  cwd?: () => string;
  env?: NodeJS.ProcessEnv;
}

export function createDoctorCommand(deps: DoctorCommandDeps = {}): Command {
  return new Command('doctor')
    .description('Check that the agent CLIs for the configured roles are installed')
    .option('-a, --all', 'Check every supported agent, not only the configured ones')
    .option('--json', 'Output as JSON', false)
    .action((options: { all?: boolean; json: boolean }) => {
      const display = deps.display ?? new ConsoleDisplay();
      try {
        const config = resolveConfig({
          rootDir: (deps.cwd ?? (() => process.cwd()))(),
          env: deps.env ?? process.env,
        });
        const keys = options.all ? [...TOOL_KEYS] : requiredTools(config.roles);
        const results = checkAvailability(keys, {
          locate: deps.locate,
          binaries: config.binaries,
        });
        const missing = missingTools(results);

        if (options.json) {
          console.log(JSON.stringify(results, null, 2));
        } else {
          console.log(chalk.cyan('\nAgent CLIs\n'));
          display.toolStatus(results);
          console.log('');
          if (missing.length === 0) {
            console.log(chalk.green('All required agent CLIs are available.'));
          } else {
            console.log(
              chalk.red(`${missing.length} of ${results.length} agent CLI(s) missing.`)
            );
          }
        }

        if (missing.length > 0) {
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        display.error(
          getErrorMessage(error),
          isCrosscheckError(error)
            ? getUserFriendlyMessage(error.code)
            : undefined
        );
        process.exitCode = 1;
      }
    });
}
