import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { planSplit, readSourceFile } from '../../core/splitter.js';
import { withSourceOptions, toOverrides, type SourceOptions } from '../options.js';

export function inspectCommand(): Command {
  return withSourceOptions(new Command('inspect'))
    .description('List the declarations found in the source file and their categories')
    .action((options: SourceOptions) => {
      try {
        const config = resolveConfig(options.project, { ...toOverrides(options), onDuplicate: 'last-wins' });
        const plan = planSplit(readSourceFile(config.sourceFile), config);

        console.log(chalk.bold(`${plan.blocks.length} declarations in ${config.sourceFile}\n`));

        for (const block of plan.blocks) {
          const range = `${block.startLine + 1}-${block.endLine + 1}`;
          const label = block.category === config.fallbackCategory
            ? chalk.yellow(block.category)
            : chalk.cyan(block.category);
          console.log(`  ${block.name.padEnd(32)} ${range.padEnd(12)} ${label}`);
        }

        if (plan.uncategorized.length > 0) {
          console.log(chalk.yellow(`\nNot in taxonomy (${plan.uncategorized.length}):`));
          console.log(`  ${plan.uncategorized.join(', ')}`);
        }
        if (plan.duplicates.length > 0) {
          console.log(chalk.yellow(`\nDeclared more than once: ${plan.duplicates.join(', ')}`));
        }
      } catch (err) {
        console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
    });
}
