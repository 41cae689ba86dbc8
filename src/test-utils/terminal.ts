/**
 * Scripted terminal for screen tests.
 *
 * Answers prompts from a fixed list of lines and records everything printed
 * with colours stripped. An exhausted script behaves like closed input.
 */

import type { Spinner, Terminal } from '../cli/io.js';

// eslint-disable-next-line no-control-regex
const ANSI = /\x1B\[[0-9;]*m/g;

export interface ScriptedTerminalOptions {
  /** Press Ctrl+C as soon as a spinner starts */
  interruptOnSpin?: boolean;
}

export class ScriptedTerminal implements Terminal {
  readonly output: string[] = [];
  readonly prompts: string[] = [];
  readonly spinners: string[] = [];
  private readonly lines: string[];
  private readonly handlers: Array<() => void> = [];
  closed = false;

  constructor(
    lines: string[],
    private readonly options: ScriptedTerminalOptions = {}
  ) {
    this.lines = [...lines];
  }

  print(line = ''): void {
    this.output.push(line.replace(ANSI, ''));
  }

  async prompt(question: string): Promise<string | undefined> {
    this.prompts.push(question.replace(ANSI, ''));
    return this.lines.shift();
  }

  promptHidden(question: string): Promise<string | undefined> {
    return this.prompt(question);
  }

  spin(text: string): Spinner {
    this.spinners.push(text.replace(ANSI, ''));
    if (this.options.interruptOnSpin) {
      setTimeout(() => this.interrupt(), 0);
    }
    return { stop: () => {} };
  }

  onInterrupt(handler: () => void): () => void {
    this.handlers.push(handler);
    return () => {
      const index = this.handlers.lastIndexOf(handler);
      if (index !== -1) this.handlers.splice(index, 1);
    };
  }

  interrupt(): void {
    this.handlers[this.handlers.length - 1]?.();
  }

  close(): void {
    this.closed = true;
  }

  /** All printed lines joined with newlines */
  get text(): string {
    return this.output.join('\n');
  }

  /** Lines still waiting to be read */
  get remaining(): number {
    return this.lines.length;
  }
}
