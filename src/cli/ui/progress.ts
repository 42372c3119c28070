// Spinner-backed progress display for agent runs

import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';
import type { AgentProgressListener } from '../../agent/tool-runner.js';

/**
 * Text shown while a tool runs, e.g. "[repo-investigator] search_code_in_repo".
 */
export function describeToolStart(agent: string, tool: string): string {
  return tool === 'task' ? `[${agent}] delegating to a sub-agent...` : `[${agent}] ${tool}`;
}

/**
 * One listener for the agent's lifetime; each run gets a fresh spinner.
 */
export class ProgressSpinner {
  private spinner: Ora | null = null;
  readonly listener: AgentProgressListener;

  constructor(private readonly verbose: boolean = false) {
    this.listener = {
      onStep: (agent, step, maxSteps) => {
        this.setText(chalk.gray(`[${agent}] thinking (step ${step}/${maxSteps})`));
      },
      onToolStart: (agent, tool) => {
        this.setText(describeToolStart(agent, tool));
      },
      onToolEnd: (agent, tool, success) => {
        if (!this.verbose || !this.spinner) return;
        const mark = success ? chalk.green('✓') : chalk.red('✗');
        // Keep the line above the spinner
        this.spinner.stopAndPersist({ symbol: mark, text: chalk.gray(`[${agent}] ${tool}`) });
        this.spinner.start();
      },
    };
  }

  start(text: string): void {
    this.spinner = ora({ text, stream: process.stderr }).start();
  }

  succeed(text: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  fail(text: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }

  private setText(text: string): void {
    if (this.spinner) this.spinner.text = text;
  }
}
