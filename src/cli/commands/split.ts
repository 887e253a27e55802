import { Command } from 'commander';
import { relative } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { checkSplit, executeSplit, planSplit, readSourceFile } from '../../core/splitter.js';
import { withSourceOptions, toOverrides, type SourceOptions } from '../options.js';

interface SplitOptions extends SourceOptions {
  dryRun: boolean;
  check: boolean;
}

export function splitCommand(): Command {
  return withSourceOptions(new Command('split'))
    .description('Split the source file into one module per category plus a manifest')
    .option('--dry-run', 'Preview the split without writing files', false)
    .option('--check', 'Exit non-zero if generated files are missing or out of date', false)
    .action((options: SplitOptions) => {
      try {
        const config = resolveConfig(options.project, toOverrides(options));
        const show = (path: string) => chalk.cyan(relative(config.projectRoot, path) || '.');

        console.log(chalk.bold(`Parsing ${show(config.sourceFile)}...`));
        const plan = planSplit(readSourceFile(config.sourceFile), config);
        console.log(`Found ${plan.blocks.length} declaration blocks`);

        if (plan.skippedLines.length > 0) {
          const lines = plan.skippedLines.map(l => l + 1).join(', ');
          console.log(chalk.yellow(`⚠ Skipped declaration lines without an identifier: ${lines}`));
        }
        if (plan.duplicates.length > 0) {
          console.log(chalk.yellow(`⚠ Duplicate declarations written as-is: ${plan.duplicates.join(', ')}`));
        }
        if (plan.uncategorized.length > 0) {
          console.log(chalk.yellow(`⚠ ${plan.uncategorized.length} declaration(s) not in the taxonomy → ${config.fallbackCategory}`));
        }

        if (options.check) {
          const stale = checkSplit(plan, config);
          if (stale.length === 0) {
            console.log(chalk.green(`\n✓ ${show(config.outputDir)} is up to date`));
            return;
          }
          console.log(chalk.red(`\n✗ ${stale.length} generated file(s) out of date:`));
          for (const file of stale) {
            console.log(`  ${show(file.path)} (${file.reason})`);
          }
          process.exitCode = 1;
          return;
        }

        if (options.dryRun) {
          console.log(chalk.bold('\nSplit Plan:'));
          for (const [category, blocks] of plan.groups) {
            console.log(`  • ${category} [${blocks.length} declarations]`);
          }
          console.log(chalk.yellow('\nDry run complete. No files were modified.'));
          return;
        }

        console.log(`\nWriting module files to ${show(config.outputDir)}/...`);
        const result = executeSplit(plan, config);

        for (const file of result.files) {
          const status = file.changed ? 'Created' : chalk.dim('Unchanged');
          console.log(`  ${chalk.green('✓')} ${status} ${show(file.path)} with ${file.blockCount} declarations`);
        }
        console.log(`  ${chalk.green('✓')} Created ${show(result.manifestPath)}`);

        console.log(chalk.green(`\n✓ Split ${show(config.sourceFile)} into ${result.categories.length} module files`));
        console.log(chalk.bold('\nNext steps:'));
        console.log(`  1. Move ${show(config.sourceFile)} out of the way (e.g. rename it to .bak)`);
        console.log('  2. Build the project to confirm the modules compile');
        console.log('  3. Run the test suite');
      } catch (err) {
        console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
    });
}
