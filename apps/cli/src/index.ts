#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for jarsmith.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { logger } from '@jarsmith/utils';
import { config } from './config/index.js';
import { TEMPLATE_HELP } from './lib/settings.js';

// Commands
import { assembleCommand } from './commands/assemble.js';
import { inspectCommand } from './commands/inspect.js';
import { templatesCommand } from './commands/templates.js';

logger.level = config.logLevel;

const program = new Command();

program
  .name('jarsmith')
  .description('Assemble self-contained one-jar archives')
  .version('1.0.0');

program
  .command('assemble')
  .description('Build a one-jar from a build descriptor')
  .option('-d, --descriptor <file>', 'Build descriptor JSON', 'jarsmith.json')
  .option('-o, --output <dir>', 'Output directory')
  .option('-f, --filename <name>', 'Output file name')
  .option('-m, --main-class <class>', 'Entry-point class recorded in the manifest')
  .option('--impl-version <version>', 'Implementation-Version recorded in the manifest')
  .option('-b, --boot-version <version>', 'Bootstrap template version')
  .option('-t, --template <file>', 'Bootstrap template archive (overrides --boot-version)')
  .option('--template-dir <dir>', 'Directory holding bootstrap templates')
  .option('--attach', 'Register the archive with the build')
  .option('--no-attach', 'Do not register the archive with the build')
  .option('-c, --classifier <classifier>', 'Classifier used when attaching')
  .option('--legacy-collision-names', 'Suffix renamed duplicates with .jar whatever their extension')
  .option('--json', 'Output in JSON format')
  .addHelpText('after', `\n${TEMPLATE_HELP}`)
  .action(assembleCommand);

program
  .command('inspect <archive>')
  .description('List the entries and manifest of an archive')
  .option('--json', 'Output in JSON format')
  .action(inspectCommand);

program
  .command('templates')
  .description('List available bootstrap template versions')
  .option('--template-dir <dir>', 'Directory holding bootstrap templates')
  .option('--json', 'Output in JSON format')
  .action(templatesCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('jarsmith --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
