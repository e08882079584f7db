#!/usr/bin/env node
import { Command } from 'commander';
import { updateCommand } from './commands/update.js';
import { ConfigError } from './core/errors.js';
import { error, info } from './ui/format.js';
import { getConfigPath } from './core/config.js';

const program = new Command();

program
  .name('full-update')
  .description('Refresh repos, update and dist-upgrade the system, clean up dependencies and flatpaks')
  .version('0.1.0')
  .action(async () => {
    process.exitCode = await updateCommand();
  });

try {
  await program.parseAsync();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(error(err.message));
    console.error(info(`Fix or remove ${getConfigPath()} and try again.`));
  } else {
    console.error(error('full-update failed:'), err);
  }
  process.exit(1);
}
