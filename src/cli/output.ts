/**
 * CLI Output Utility
 * User-facing terminal output for CLI commands, separate from Logger
 * (which is for diagnostics)
 */

import ora, { type Ora } from 'ora';
import pc from 'picocolors';

export type OutputColor = 'cyan' | 'magenta' | 'yellow' | 'blue' | 'green';

const CODE_OPEN = '\x1b[48;5;23m\x1b[38;5;195m';
const CODE_CLOSE = '\x1b[0m';

/**
 * Render the small markdown subset used in CLI messages:
 * - `code` → inline code with a dark teal background
 * - **bold** or __bold__ → bold text
 */
export function renderInline(message: string, color?: OutputColor): string {
  const paint = (text: string): string => {
    const bolded = text.replace(/(\*\*|__)(.+?)\1/g, (_match, _marker: string, inner: string) =>
      pc.bold(inner),
    );
    return color ? pc[color](bolded) : bolded;
  };

  let rendered = '';
  let idx = 0;
  while (idx < message.length) {
    const start = message.indexOf('`', idx);
    const end = start === -1 ? -1 : message.indexOf('`', start + 1);
    if (start === -1 || end === -1) {
      rendered += paint(message.slice(idx));
      break;
    }
    rendered += paint(message.slice(idx, start));
    rendered += `${CODE_OPEN} ${message.slice(start + 1, end)} ${CODE_CLOSE}`;
    idx = end + 1;
  }
  return rendered;
}

/**
 * CliOutput provides styled terminal output using picocolors and ora spinners
 */
export class CliOutput {
  print(message: string, color?: OutputColor): void {
    console.log(renderInline(message, color));
  }

  /**
   * Print a success message with cyan checkmark
   */
  success(message: string): void {
    console.log(pc.cyan('✓'), renderInline(message));
  }

  /**
   * Print an error message with magenta X
   */
  error(message: string): void {
    console.error(pc.magenta('✗'), message);
  }

  warn(message: string): void {
    console.warn(pc.yellow('⚠'), message);
  }

  info(message: string): void {
    console.log(pc.blue('ℹ'), message);
  }

  blank(): void {
    console.log();
  }

  /**
   * Create a spinner for long-running operations
   */
  spinner(text: string): Ora {
    return ora({
      text,
      color: 'cyan',
    }).start();
  }
}

/**
 * Default CLI output instance for convenient importing
 */
export const cliOutput = new CliOutput();
