#!/usr/bin/env node

/**
 * voicecraft CLI entry point.
 */

import { loadConfig } from '../config/loader.js';
import { createContentService } from '../service/content-service.js';
import { Logger } from '../utils/logger.js';
import { type CreateCommandContext, handleCreateCommand } from './commands/create.js';
import { handleResumeCommand } from './commands/resume.js';
import { handleVersionCommand } from './commands/version.js';
import { createConsolePrompter } from './prompter.js';
import type { CliCommandResult } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

const HELP_TEXT = `
voicecraft: turn a rough idea into a post written in your own voice

USAGE:
  voicecraft <command> [options]

COMMANDS:
  create "<idea>"   Brainstorm the idea interactively, then write the post
  resume <id>       Continue a saved session
  help              Show this help message
  version           Show version information

DURING A SESSION:
  /done      Stop questioning and write the post
  /status    Show which topics are covered
  /cancel    Cancel the session

CONFIGURATION:
  Settings are read from voicecraft.toml in the working directory and
  VOICECRAFT_* environment variables.

EXAMPLES:
  voicecraft create "What pair programming taught me about mentoring"
`;

function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "voicecraft help" for usage information.');
}

type InteractiveCommand = (
  args: readonly string[],
  context: CreateCommandContext
) => Promise<CliCommandResult>;

function runInteractive(command: InteractiveCommand, args: readonly string[]): void {
  withErrorHandling(async () => {
    const config = await loadConfig();
    const logger = new Logger({ component: 'Cli', debugMode: config.logging.debug });
    const prompter = createConsolePrompter();
    try {
      return await command(args, {
        service: createContentService({ config, logger }),
        prompter,
        outputPath: config.paths.output,
        logger,
      });
    } finally {
      prompter.close();
    }
  });
}

function main(): void {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      console.log(HELP_TEXT);
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand({ print: (text) => console.log(text) }));
      break;

    case 'create':
      runInteractive(handleCreateCommand, commandArgs);
      break;

    case 'resume':
      runInteractive(handleResumeCommand, commandArgs);
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

main();
