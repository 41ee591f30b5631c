#!/usr/bin/env node
import { Command } from 'commander';
import { configureLogger, parseLogFormat, parseLogLevel } from '../common/logger';
import { executeInstall, executeListPatterns, executeScan } from './commands';

type GlobalOptions = {
  logLevel?: string;
  logFormat?: string;
};

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();
  program
    .name('staged-secret-guard')
    .description('Block commits whose staged files contain API keys or tokens');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.SECRET_GUARD_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.SECRET_GUARD_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<GlobalOptions>();
      try {
        configureLogger({
          level: parseLogLevel(opts.logLevel),
          format: parseLogFormat(opts.logFormat),
          destination: process.stderr,
        });
      } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exit(2);
      }
    });

  program
    .command('scan', { isDefault: true })
    .description('Scan staged files for secrets (run by the pre-commit hook)')
    .option('--config <path>', 'Config file (default: .secret-guard.{yaml,yml,toml,json} in the current directory)')
    .option('--json', 'Print the scan result as JSON on stdout')
    .action(async (options: { config?: string; json?: boolean }) => {
      process.exitCode = await executeScan({ cwd: process.cwd(), config: options.config, json: options.json });
    });

  program
    .command('install')
    .description('Install the pre-commit hook into .git/hooks')
    .option('--repo <path>', 'Repository root', process.cwd())
    .action(async (options: { repo: string }) => {
      process.exitCode = await executeInstall({ repo: options.repo });
    });

  program
    .command('patterns')
    .description('List the effective secret patterns')
    .option('--config <path>', 'Config file')
    .action(async (options: { config?: string }) => {
      process.exitCode = await executeListPatterns({ cwd: process.cwd(), config: options.config });
    });

  await program.parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 2;
  });
}
