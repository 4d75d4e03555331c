#!/usr/bin/env node
import { config } from './config';
import { logger, engineLogger } from './utils/logger';
import { CliUsageError, USAGE, parseArgs, runCommand } from './commands';
import { setEngineLogger } from '../shared/engine/index';
import { wrapEngineError } from '../shared/engine/errors';

export function main(argv: readonly string[] = process.argv.slice(2)): number {
  setEngineLogger(engineLogger);

  try {
    const args = parseArgs(argv);
    logger.debug('Running command', { command: args.command, variant: args.variant });
    return runCommand(args, {
      saveDirectory: config.saves.directory,
      defaultVariant: config.puzzle.defaultVariant,
      solverMaxStates: config.puzzle.solverMaxStates,
      // eslint-disable-next-line no-console
      out: (line) => console.log(line),
    });
  } catch (err) {
    if (err instanceof CliUsageError) {
      // eslint-disable-next-line no-console
      console.error(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    const engineError = wrapEngineError(err, 'CLI');
    logger.error('Command failed', { error: engineError.toJSON() });
    // eslint-disable-next-line no-console
    console.error(`Error: ${engineError.message}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
