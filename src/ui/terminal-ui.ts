/**
 * TerminalUI - Semantic color palette and formatting utilities
 * Provides consistent styling across the shell with standardized colors and frames
 */

import chalk from 'chalk';

export type ColorStyle = 'success' | 'error' | 'warning' | 'subtle' | 'info' | 'highlight';

/**
 * Static utility for terminal formatting
 * All methods are synchronous and return formatted strings
 */
export class TerminalUI {
  /**
   * Semantic color palette
   * Success: green, Error: bold red, Warning: yellow,
   * Subtle: dim (metadata), Info: cyan, Highlight: bold white
   */
  static colors: Record<ColorStyle, (text: string) => string> = {
    success: chalk.green,
    error: chalk.bold.red,
    warning: chalk.yellow,
    subtle: chalk.dim,
    info: chalk.cyan,
    highlight: chalk.bold.white,
  };

  /**
   * Icon prefixes per style
   */
  static icons: Record<ColorStyle, string> = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    subtle: '',
    info: 'ℹ',
    highlight: '',
  };

  /**
   * Framing utilities for visual structure
   */
  static frame = {
    /**
     * Create a framed box around content
     * @param content - Lines to frame
     * @param title - Optional title to display at top
     */
    box: (content: string[], title?: string): string => {
      const maxLen = Math.max(0, ...content.map((l) => l.length), title ? title.length : 0);
      const width = maxLen + 4;

      const lines: string[] = [];
      lines.push(chalk.dim('┌' + '─'.repeat(width) + '┐'));

      if (title) {
        lines.push(chalk.dim('│ ') + chalk.bold(title.padEnd(width - 2)) + chalk.dim(' │'));
        lines.push(chalk.dim('├' + '─'.repeat(width) + '┤'));
      }

      for (const line of content) {
        lines.push(chalk.dim('│ ') + line.padEnd(width - 2) + chalk.dim(' │'));
      }

      lines.push(chalk.dim('└' + '─'.repeat(width) + '┘'));
      return lines.join('\n');
    },

    separator: (width: number = 80): string => {
      return chalk.dim('─'.repeat(width));
    },

    /**
     * Create a header with title and optional subtitle
     */
    header: (title: string, subtitle?: string): string => {
      const lines = [chalk.bold.cyan(title)];
      if (subtitle) {
        lines.push(chalk.dim(subtitle));
      }
      lines.push(TerminalUI.frame.separator(80));
      return lines.join('\n');
    },
  };
}
