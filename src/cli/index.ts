import { Command } from 'commander';
import { splitCommand } from './commands/split.js';
import { inspectCommand } from './commands/inspect.js';
import { initCommand } from './commands/init.js';

const program = new Command();

program
  .name('modsplit')
  .description('Split a large file of enum declarations into categorized modules')
  .version('0.1.0');

program.addCommand(splitCommand());
program.addCommand(inspectCommand());
program.addCommand(initCommand());

program.parse();
