// Command definitions for the sweeper CLI

import { Command, CommanderError } from 'commander';
import { Logger, LogLevel } from '../types';
import { SweepCommand } from '../core/constants';
import { ConfigManager, RawSweepOptions } from '../core/config-manager';
import { DuplicateProcessor } from '../core/duplicate-processor';
import { loadEnvironmentConfig } from '../core/environment-config';
import { EnhancedLogger, isLogLevel } from '../core/logger';
import { getErrorMessage } from '../core/error-handler';
import { formatSummary } from '../progress/outcome-reporter';

export interface CliContext {
  /** Directory the tool was invoked from; the reference root of every operation */
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Replaces the logger built from the environment, e.g. to silence tests */
  logger?: Logger;
  clock?: () => Date;
}

const EXAMPLES = `
Examples:
  $ dupe-sweep report --type file --location path=/srv/reports
  $ dupe-sweep report
  $ dupe-sweep move --type .txt --location path=/srv/duplicates
  $ dupe-sweep move-out --type folder
  $ dupe-sweep delete --type .jpg
  $ dupe-sweep delete --all --type .txt
  $ dupe-sweep report --name notes.txt --type file
  $ dupe-sweep report --cleanup
  $ dupe-sweep delete --cleanup
  $ dupe-sweep consolidate --type .txt --search-location path=/opt/var/data

Detection is by name only. Try file-modifying commands on noncritical data first.`;

function withSearchOptions(command: Command): Command {
  return command
    .option('-t, --type <type>', 'Item type: file, folder, or an extension such as .txt')
    .option(
      '-s, --search-location <location>',
      'Base directory to scan (path=<dir> or <dir>), defaults to the current directory'
    );
}

/**
 * Build the CLI. `onExitCode` receives the status each command finishes with.
 */
export function createProgram(context: CliContext, onExitCode: (code: number) => void): Command {
  const program = new Command();
  const print = (line: string) => context.stdout(`${line}\n`);
  const printError = (line: string) => context.stderr(`${line}\n`);

  program
    .name('dupe-sweep')
    .description('Find files or folders that share a name, then report, move, delete or consolidate them')
    .version('1.0.0')
    .option('--log-level <level>', 'Log level: ERROR, WARN, INFO or DEBUG')
    .configureOutput({ writeOut: context.stdout, writeErr: context.stderr })
    .exitOverride()
    .showHelpAfterError()
    .addHelpText('after', EXAMPLES);

  const createLogger = (): Logger => {
    if (context.logger) {
      return context.logger;
    }
    const environment = loadEnvironmentConfig(context.env);
    const requested = program.opts<{ logLevel?: string }>().logLevel?.toUpperCase();
    let level: LogLevel = environment.logging.level;
    if (requested !== undefined) {
      if (isLogLevel(requested)) {
        level = requested;
      } else {
        environment.warnings.push(`Invalid --log-level "${requested}", using ${level}`);
      }
    }

    const { filePath } = environment.logging;
    const logger = new EnhancedLogger({
      level,
      component: 'cli',
      ...(filePath ? { enableFileLogging: true, logDirectory: filePath } : {}),
    });
    environment.warnings.forEach((warning) => logger.warn(warning));
    return logger;
  };

  const runCommand = async (command: SweepCommand, options: RawSweepOptions): Promise<void> => {
    const logger = createLogger();
    const configManager = new ConfigManager();
    const config = ConfigManager.resolve(command, options, context.cwd);

    const validation = await configManager.validateConfig(config);
    if (!validation.isValid) {
      validation.errors.forEach((error) => printError(`❌ Error: ${error}`));
      printError(`Run "dupe-sweep ${command} --help" for usage.`);
      onExitCode(1);
      return;
    }
    logger.debug('Resolved configuration', ConfigManager.getConfigSummary(config));

    const processor = new DuplicateProcessor(logger, { clock: context.clock });
    const summary = await processor.run(config);
    formatSummary(summary).forEach(print);

    const statistics = processor.getErrorHandler().getStatistics();
    if (statistics.totalErrors > 0) {
      logger.warn(`${statistics.totalErrors} item(s) failed`, statistics.errorsByCategory);
    }

    onExitCode(summary.status === 'persistence_failed' ? 1 : 0);
  };

  withSearchOptions(program.command('report'))
    .description('Generate a JSON report of duplicate files or folders (type defaults to folder)')
    .option('-l, --location <location>', 'Report directory (path=<dir> or <dir>), defaults to ./reports')
    .option('-n, --name <name>', 'Only consider items with exactly this name')
    .option('--cleanup', 'Report empty directories instead of duplicates')
    .action((options: RawSweepOptions) => runCommand('report', options));

  withSearchOptions(program.command('move'))
    .description('Move duplicates (all but the first occurrence) to a directory')
    .option('-l, --location <location>', 'Destination (path=<dir> or <dir>), defaults to ./duplicate')
    .option('-n, --name <name>', 'Only consider items with exactly this name')
    .option('-a, --all', 'Move every matching item, not only duplicates')
    .action((options: RawSweepOptions) => runCommand('move', options));

  withSearchOptions(program.command('move-out'))
    .description(
      'Move nested files into the current directory; with --type folder, move the deepest folder that holds files'
    )
    .action((options: RawSweepOptions) => runCommand('move-out', options));

  withSearchOptions(program.command('delete'))
    .description('Delete duplicates, keeping the first occurrence of each name')
    .option('-n, --name <name>', 'Only consider items with exactly this name')
    .option('-a, --all', 'Delete every matching item, not only duplicates')
    .option('--cleanup', 'Recursively delete empty directories below the base directory')
    .action((options: RawSweepOptions) => runCommand('delete', options));

  withSearchOptions(program.command('consolidate'))
    .description('Merge the distinct contents of all .txt files into one file (requires --type .txt)')
    .option('-l, --location <location>', 'Output directory (path=<dir> or <dir>), defaults to ./consolidated')
    .action((options: RawSweepOptions) => runCommand('consolidate', options));

  return program;
}

/**
 * Parse `argv` (node-style, starting with the executable and script) and run the command.
 * Resolves with the process exit status.
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let exitCode = 0;
  const program = createProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    context.stderr(`❌ ${getErrorMessage(error)}\n`);
    return 1;
  }

  return exitCode;
}
