/**
 * Agent Roundtable CLI
 *
 * Note: Environment variables should be loaded via the loader.ts entry point
 * or by using the Node.js --env-file flag
 */

import process from 'node:process';

import { errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';

import { doctorCommand, runCommand, toolsCommand } from './commands/index.js';
import { cliOutput } from './output.js';

export interface CliArgs {
  command?: string;
  args: string[];
  options: Record<string, string | boolean>;
}

export function parseArgs(argv: readonly string[] = process.argv.slice(2)): CliArgs {
  const command = argv[0];
  const options: Record<string, string | boolean> = {};
  const remaining: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg && arg.startsWith('--')) {
      const key = arg.slice(2);
      const nextArg = argv[i + 1];
      if (nextArg && !nextArg.startsWith('--')) {
        options[key] = nextArg;
        i++;
      } else {
        options[key] = true;
      }
    } else if (arg) {
      remaining.push(arg);
    }
  }

  return { command, args: remaining, options };
}

export function stringOption(options: CliArgs['options'], key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * @throws Error when the option is present but not a positive integer
 */
export function positiveIntOption(options: CliArgs['options'], key: string): number | undefined {
  const value = stringOption(options, key);
  if (value === undefined) {
    if (options[key] === true) {
      throw new Error(`--${key} requires a value`);
    }
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`--${key} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function requireOption(options: CliArgs['options'], key: string): string {
  const value = stringOption(options, key);
  if (!value) {
    throw new Error(`Missing required option --${key}`);
  }
  return value;
}

function printHelp(): void {
  console.log(`
Agent Roundtable CLI

Usage:
  agent-roundtable <command> [options]

Commands:
  tools                   List configured tool servers and available tools
    --config <file>       Tool server descriptor (default: mcp_servers.json)

  doctor                  Validate configuration and detect issues
    --config <file>       Tool server descriptor (default: mcp_servers.json)
    --verbose             Show detailed diagnostics

  run                     Run a round-robin team session
    --team <id>           Team preset: research or development
    --task <text>         Task the team works on
    --max-messages <n>    Stop after n messages (default: team preset)
    --stop-on <text>      Also stop when a message mentions <text>
    --output <file>       Conversation file (default: <team>_conversation.json)
    --config <file>       Tool server descriptor (default: mcp_servers.json)

  help                    Show this help message

Environment:
  Create a .env file from .env.example for local development.
  Required variables depend on AI_PROVIDER (default: groq):
    - GROQ_API_KEY        Groq API key
    - OPENAI_API_KEY      OpenAI API key
    - OPENROUTER_API_KEY  OpenRouter API key
    - XAI_API_KEY         xAI API key

Examples:
  agent-roundtable tools
  agent-roundtable doctor --verbose
  agent-roundtable run --team research --task "Survey current approaches to code review automation"
  agent-roundtable run --team development --task "Build a todo API" --max-messages 8
`);
}

export async function main(argv?: readonly string[]): Promise<void> {
  const { command, options } = parseArgs(argv);
  const logger = new Logger({ namespace: 'CLI' });

  try {
    switch (command) {
      case 'tools':
        await toolsCommand({ config: stringOption(options, 'config') });
        break;

      case 'doctor':
        await doctorCommand({
          config: stringOption(options, 'config'),
          verbose: options['verbose'] === true,
        });
        break;

      case 'run':
        await runCommand({
          team: requireOption(options, 'team'),
          task: requireOption(options, 'task'),
          maxMessages: positiveIntOption(options, 'max-messages'),
          stopOn: stringOption(options, 'stop-on'),
          output: stringOption(options, 'output'),
          config: stringOption(options, 'config'),
        });
        break;

      case 'help':
      case undefined:
        printHelp();
        break;

      default:
        cliOutput.error(`Unknown command: ${command}`);
        printHelp();
        process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Command failed', error);
    cliOutput.error(errorMessage(error));
    process.exitCode = 1;
  }
}
