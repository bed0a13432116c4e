/**
 * UIManager - Configuration and output layer for the terminal
 * Owns logging and formatting; degrades for non-interactive, CI and silent modes
 * Constructed once by the CLI and passed to whatever prints
 */

import { SpinnerManager } from './spinner-manager.js';
import { TerminalUI, type ColorStyle } from './terminal-ui.js';

/**
 * UI Configuration options
 */
export interface UIConfig {
  /** Is running in interactive terminal (TTY) */
  interactive: boolean;
  /** Show animated spinners (can be disabled with NO_SPINNERS env var) */
  showSpinners: boolean;
  /** Show colored output (can be disabled with NO_COLORS env var) */
  showColors: boolean;
  /** Show framed boxes (can be disabled with NO_FRAMES env var) */
  showFrames: boolean;
  /** Silent mode - suppress all output */
  silent: boolean;
  /** Print debug lines (DEBUG env var) */
  debug: boolean;
}

export interface UIManagerOptions {
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  overrides?: Partial<UIConfig>;
}

/**
 * Read configuration from environment variables and terminal state
 */
export function readUIConfig(env: NodeJS.ProcessEnv, isTTY: boolean): UIConfig {
  const isCI = Boolean(env.CI);
  const silent = Boolean(env.SILENT);

  return {
    interactive: isTTY && !isCI,
    showSpinners: env.NO_SPINNERS !== '1' && !silent,
    showColors: env.NO_COLORS !== '1' && !silent,
    showFrames: env.NO_FRAMES !== '1' && !silent,
    silent,
    debug: Boolean(env.DEBUG) && !silent,
  };
}

export class UIManager {
  private config: UIConfig;
  private spinnerManager: SpinnerManager | null = null;

  constructor(options: UIManagerOptions = {}) {
    const env = options.env ?? process.env;
    const isTTY = options.isTTY ?? process.stdout.isTTY === true;
    this.config = { ...readUIConfig(env, isTTY), ...options.overrides };
  }

  /**
   * Get or create the SpinnerManager; spinners only animate in interactive terminals
   */
  getSpinnerManager(): SpinnerManager {
    if (!this.spinnerManager) {
      this.spinnerManager = new SpinnerManager(this.config.interactive && this.config.showSpinners);
    }
    return this.spinnerManager;
  }

  /**
   * Format text with semantic color (respects showColors config)
   */
  format(text: string, style: ColorStyle): string {
    if (!this.config.showColors) {
      return text;
    }
    return TerminalUI.colors[style](text);
  }

  /**
   * Format text with the style's icon and color
   *
   * @example
   * ui.status('Context cleared', 'success') → '✓ Context cleared' (green)
   */
  status(text: string, style: ColorStyle): string {
    const icon = TerminalUI.icons[style];
    return this.format(icon ? `${icon} ${text}` : text, style);
  }

  /**
   * Create framed box (respects showFrames config)
   */
  frameBox(content: string[], title?: string): string {
    if (!this.config.showFrames) {
      return (title ? [title, ...content] : content).join('\n');
    }
    return TerminalUI.frame.box(content, title);
  }

  /**
   * Create header (respects showFrames config)
   */
  header(title: string, subtitle?: string): string {
    if (!this.config.showFrames) {
      return subtitle ? `${title}\n${subtitle}` : title;
    }
    return TerminalUI.frame.header(title, subtitle);
  }

  log(...args: unknown[]): void {
    if (!this.config.silent) {
      console.log(...args);
    }
  }

  error(...args: unknown[]): void {
    if (!this.config.silent) {
      console.error(...args);
    }
  }

  warn(message: string): void {
    if (!this.config.silent) {
      console.warn(this.status(message, 'warning'));
    }
  }

  debug(message: string): void {
    if (this.config.debug) {
      console.log(this.format(`[debug] ${message}`, 'subtle'));
    }
  }

  /**
   * Write streamed text without a trailing newline
   */
  write(text: string): void {
    if (!this.config.silent) {
      process.stdout.write(text);
    }
  }
}
