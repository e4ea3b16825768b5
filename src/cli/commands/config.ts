import { Command } from 'commander';
import pc from 'picocolors';
import { SETTING_KEYS, type SettingEntry } from '../../services/SettingsService.js';
import type { CliContext } from '../context.js';

function showConfig(ctx: CliContext): void {
  const entries = ctx.settings.list();
  const sections = new Map<string, SettingEntry[]>();
  for (const entry of entries) {
    const [section = entry.key] = entry.key.split('.');
    sections.set(section, [...(sections.get(section) ?? []), entry]);
  }

  ctx.io.stdout(pc.cyan(pc.bold('Configuration')));
  ctx.io.stdout('='.repeat(50));
  for (const [section, sectionEntries] of sections) {
    ctx.io.stdout('');
    ctx.io.stdout(`[${pc.yellow(section)}]`);
    for (const entry of sectionEntries) {
      const name = entry.key.slice(section.length + 1);
      const value = entry.value ?? pc.dim('(not set)');
      const source = entry.source === 'stored' ? '' : pc.dim(` (${entry.source})`);
      ctx.io.stdout(`  ${pc.bold(name)} = ${value}${source}`);
    }
  }
  ctx.io.stdout('');
  ctx.io.stdout(pc.dim(`Stored in: ${ctx.env.SQLITE_DB_PATH}`));
}

export function createConfigCommand(ctx: CliContext): Command {
  const config = new Command('config')
    .alias('c')
    .description('Show or change settings')
    .action(() => {
      showConfig(ctx);
    });

  config
    .command('show')
    .description('Show all settings')
    .action(() => {
      showConfig(ctx);
    });

  config
    .command('get')
    .description('Print one setting')
    .argument('<key>', `Setting key (${SETTING_KEYS.join(', ')})`)
    .action((key: string) => {
      ctx.io.stdout(ctx.settings.get(key) ?? '');
    });

  config
    .command('set')
    .description('Change one setting')
    .argument('<key>', `Setting key (${SETTING_KEYS.join(', ')})`)
    .argument('<value>', 'New value')
    .action((key: string, value: string) => {
      ctx.settings.set(key, value);
      const shown = key === 'api.key' ? '****' : value.trim();
      ctx.io.stdout(`${pc.green('✓')} Set ${pc.cyan(key)} = ${shown}`);
    });

  config
    .command('path')
    .description('Print the database path settings are stored in')
    .action(() => {
      ctx.io.stdout(ctx.env.SQLITE_DB_PATH);
    });

  config
    .command('reset')
    .description('Reset all settings to defaults')
    .option('--force', 'Confirm the reset')
    .action((options: { force?: unknown }) => {
      if (options.force !== true) {
        ctx.io.stderr(
          `${pc.yellow(pc.bold('Warning'))}: This will reset all configuration to defaults. Use --force to confirm.`
        );
        return;
      }
      ctx.settings.reset();
      ctx.io.stdout(`${pc.green('✓')} Configuration reset to defaults`);
    });

  return config;
}
