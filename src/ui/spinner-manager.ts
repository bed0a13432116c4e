/**
 * SpinnerManager - Spinner lifecycle for tool invocations
 * One spinner per step: start → succeed | fail
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner state
 */
interface SpinnerState {
  stepLabel: string;
  toolName: string;
  status: 'idle' | 'running' | 'success' | 'failed';
  elapsedMs: number;
}

export class SpinnerManager {
  private spinner: Ora | null = null;
  private state: SpinnerState = {
    stepLabel: '',
    toolName: '',
    status: 'idle',
    elapsedMs: 0,
  };
  private startTime: number = 0;
  private updateInterval: NodeJS.Timeout | null = null;
  private isEnabled: boolean;

  constructor(isEnabled: boolean = true) {
    this.isEnabled = isEnabled;
  }

  /**
   * Start spinner for a tool invocation
   * @param stepLabel - Position of the step, e.g. 'step 1/3'
   * @param toolName - Tool being invoked
   */
  public start(stepLabel: string, toolName: string): void {
    this.cleanup();

    this.startTime = Date.now();
    this.state = {
      stepLabel,
      toolName,
      status: 'running',
      elapsedMs: 0,
    };

    if (!this.isEnabled) return;

    this.spinner = ora(this.formatSpinnerText()).start();

    this.updateInterval = setInterval(() => {
      if (this.state.status === 'running') {
        this.state.elapsedMs = Date.now() - this.startTime;
        if (this.spinner) {
          this.spinner.text = this.formatSpinnerText();
        }
      }
    }, 100);
  }

  public succeed(message?: string): void {
    this.finish('success');
    this.spinner?.succeed(
      chalk.green(`[${this.state.stepLabel}] ${message || `${this.state.toolName} completed`} ${this.formatElapsed()}`)
    );
    this.spinner = null;
  }

  public fail(error: string): void {
    this.finish('failed');
    this.spinner?.fail(chalk.red(`[${this.state.stepLabel}] ${this.state.toolName}: ${error} ${this.formatElapsed()}`));
    this.spinner = null;
  }

  public isRunning(): boolean {
    return this.state.status === 'running';
  }

  /**
   * Get current spinner state (for testing)
   */
  public getState(): Readonly<SpinnerState> {
    return Object.freeze({ ...this.state });
  }

  private finish(status: 'success' | 'failed'): void {
    this.cleanup();
    this.state.elapsedMs = Date.now() - this.startTime;
    this.state.status = status;
  }

  private formatSpinnerText(): string {
    return `[${this.state.stepLabel}] Calling ${this.state.toolName}... ${this.formatElapsed()}`;
  }

  private formatElapsed(): string {
    const secs = (this.state.elapsedMs / 1000).toFixed(1);
    return chalk.dim(`(${secs}s)`);
  }

  private cleanup(): void {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
  }
}
