import { Command } from 'commander';
import { existsSync } from 'node:fs';
import chalk from 'chalk';
import { getConfigPath, saveConfig } from '../../core/config.js';
import { DEFAULT_FALLBACK_CATEGORY, DEFAULT_LOOKAHEAD } from '../../core/types.js';

interface InitOptions {
  project: string;
  force: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Write a starter modsplit.json')
    .option('-p, --project <path>', 'Project root path', process.cwd())
    .option('-f, --force', 'Overwrite an existing config', false)
    .action((options: InitOptions) => {
      const configPath = getConfigPath(options.project);

      if (existsSync(configPath) && !options.force) {
        console.log(chalk.yellow('○') + ` ${configPath} already exists (use --force to overwrite)`);
        return;
      }

      try {
        saveConfig(options.project, {
          sourceFile: 'src/types.rs',
          outputDir: 'src/types',
          language: 'rust',
          taxonomy: {},
          fallbackCategory: DEFAULT_FALLBACK_CATEGORY,
          lookahead: DEFAULT_LOOKAHEAD,
          onDuplicate: 'error',
        });
      } catch (err) {
        console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
        process.exit(1);
      }

      console.log(chalk.green('✓') + ` Config saved to ${configPath}`);
      console.log(chalk.bold('\n📋 Next steps:'));
      console.log('  • Fill in ' + chalk.cyan('taxonomy') + ' with category → identifier lists');
      console.log('  • Run ' + chalk.cyan('modsplit inspect') + ' to preview categories');
      console.log('  • Run ' + chalk.cyan('modsplit split') + ' to write the modules');
    });
}
