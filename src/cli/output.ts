/**
 * CLI Output Utility
 * User-facing terminal output for CLI commands, separate from Logger
 * (which is for diagnostics/debugging)
 */

import ora, { type Ora } from 'ora';
import pc from 'picocolors';

type Color = 'cyan' | 'magenta' | 'yellow' | 'blue' | 'green';

/**
 * Opening escape for `code` spans, picked from the terminal's color depth
 */
function codeStyle(): string {
  const supportsTruecolor = /truecolor|24bit/i.test(process.env['COLORTERM'] ?? '');
  const supports256 = /256color/i.test(process.env['TERM'] ?? '') || supportsTruecolor;
  if (supportsTruecolor) {
    return '\x1b[48;2;12;54;66m\x1b[38;2;190;240;255m';
  }
  if (supports256) {
    return '\x1b[48;5;23m\x1b[38;5;195m';
  }
  return '\x1b[44m\x1b[97m';
}

const CLOSE_CODE = '\x1b[0m';

/**
 * Style `inline code` spans; text outside them goes through `text`
 */
export function renderInlineCode(message: string, text: (s: string) => string = (s) => s): string {
  const open = codeStyle();
  let rendered = '';
  let idx = 0;
  while (idx < message.length) {
    const start = message.indexOf('`', idx);
    const end = start === -1 ? -1 : message.indexOf('`', start + 1);
    if (start === -1 || end === -1) {
      rendered += text(message.slice(idx));
      break;
    }
    if (start > idx) {
      rendered += text(message.slice(idx, start));
    }
    rendered += `${open} ${message.slice(start + 1, end)} ${CLOSE_CODE}`;
    idx = end + 1;
  }
  return rendered;
}

/**
 * CliOutput prints styled messages with picocolors and ora spinners
 */
export class CliOutput {
  print(message: string, color?: Color): void {
    const bold = (s: string): string => s.replace(/(\*\*|__)(.+?)\1/g, (_, __, t) => pc.bold(t));
    const colorize = (s: string): string => (color ? pc[color](bold(s)) : bold(s));
    console.log(renderInlineCode(message, colorize));
  }

  success(message: string): void {
    console.log(pc.cyan('✓'), renderInlineCode(message));
  }

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

  spinner(text: string): Ora {
    return ora({
      text,
      color: 'cyan',
    }).start();
  }
}

export const cliOutput = new CliOutput();
