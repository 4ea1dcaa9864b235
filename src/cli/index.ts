#!/usr/bin/env node
import * as path from 'node:path';
import { Command, CommanderError } from 'commander';
import { ClearCommand } from '../commands/clearCommand';
import { ParseCommand } from '../commands/parseCommand';
import { ScanCommand } from '../commands/scanCommand';
import { SelectCommand, type SelectParams } from '../commands/selectCommand';
import { StatusCommand } from '../commands/statusCommand';
import type { CommandContext, CommandOutput } from '../commands/base/selectorCommand';
import { EXIT_FAILURE } from '../commands/base/selectorCommand';
import { loadSettings } from '../services/configurationService';
import { createLogger } from '../services/loggerService';
import { cancelEveryStep, createTerminalPrompter } from './terminalPrompter';

export const VERSION = '0.1.0';

/**
 * Process streams and environment the CLI runs against.
 */
export interface CliIo {
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  /** Prompt for unanswered steps instead of cancelling them */
  readonly interactive: boolean;
}

type GlobalOptions = {
  cwd?: string;
  debug?: boolean;
};

export function defaultIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd(),
    interactive: Boolean(process.stdin.isTTY),
  };
}

/**
 * Parse `argv` (including the node and script entries) and run the command.
 *
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIo = defaultIo()): Promise<number> {
  let exitCode = 0;

  const output: CommandOutput = {
    out: line => io.stdout.write(`${line}\n`),
    err: line => io.stderr.write(`${line}\n`),
  };

  const program = new Command();
  program
    .name('vs-select')
    .description('Select a Visual Studio solution, project, platform and configuration')
    .version(VERSION)
    .option('-C, --cwd <dir>', 'search root (defaults to the current directory)')
    .option('--debug', 'write debug log lines to stderr')
    .configureOutput({
      writeOut: s => io.stdout.write(s),
      writeErr: s => io.stderr.write(s),
    })
    .exitOverride();

  async function withContext(
    body: (context: CommandContext) => Promise<number>,
    rootArgument?: string,
  ): Promise<void> {
    const opts = program.opts<GlobalOptions>();
    const root = path.resolve(io.cwd, opts.cwd ?? '.', rootArgument ?? '.');

    const settings = loadSettings(root, io.env);
    if (!settings.success) {
      output.err(settings.error.message);
      exitCode = EXIT_FAILURE;
      return;
    }

    const logger = createLogger(() => opts.debug === true || settings.value.logging.debug, io.stderr);
    try {
      exitCode = await body({ root, settings: settings.value, logger, output });
    } finally {
      logger.dispose();
    }
  }

  program
    .command(ScanCommand.id)
    .description('list solution and project files under the root')
    .argument('[root]', 'directory to search (defaults to the search root)')
    .option('--json', 'print absolute paths as JSON')
    .action((rootArgument: string | undefined, opts: { json?: boolean }) =>
      withContext(context => new ScanCommand(context).execute({ json: opts.json }), rootArgument),
    );

  program
    .command(ParseCommand.id)
    .description('print the platforms and configurations a project declares')
    .argument('<project>', 'project file')
    .action((projectPath: string) =>
      withContext(context => new ParseCommand(context).execute({ projectPath })),
    );

  program
    .command(SelectCommand.id)
    .description('choose solution, project, platform and configuration, then store the selection')
    .option('--solution <file>', 'solution file')
    .option('--project <file>', 'project file')
    .option('--platform <name>', 'platform name')
    .option('--configuration <name>', 'configuration name')
    .action((opts: SelectParams) =>
      withContext(async context => {
        const prompter = io.interactive ? createTerminalPrompter(io.stdin, io.stdout) : undefined;
        try {
          return await new SelectCommand(context, { prompt: prompter?.provide ?? cancelEveryStep }).execute(opts);
        } finally {
          prompter?.close();
        }
      }),
    );

  program
    .command(StatusCommand.id)
    .description('print the status-line string for the stored selection')
    .action(() => withContext(context => new StatusCommand(context).execute({ format: 'line' })));

  program
    .command('show')
    .description('print the stored selection as JSON')
    .action(() => withContext(context => new StatusCommand(context).execute({ format: 'json' })));

  program
    .command(ClearCommand.id)
    .description('forget the stored selection')
    .action(() => withContext(context => new ClearCommand(context).execute()));

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode;
}

if (require.main === module) {
  run(process.argv).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
