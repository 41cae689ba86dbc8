/**
 * Terminal I/O
 *
 * Screens read and write through the Terminal interface so they can run
 * against a real TTY (readline + ora) or a scripted terminal in tests.
 *
 * Ctrl+C goes to the most recently registered interrupt handler (used to
 * abandon an AI request); with none registered it closes the input, which
 * ends the app.
 */

import * as readline from 'node:readline';
import { Writable } from 'node:stream';
import ora from 'ora';

/** Running "waiting" indicator */
export interface Spinner {
  stop(): void;
}

export interface Terminal {
  print(line?: string): void;
  /** Resolves with the typed line, or undefined once input has ended */
  prompt(question: string): Promise<string | undefined>;
  /** Same as prompt, without echoing the typed characters */
  promptHidden(question: string): Promise<string | undefined>;
  spin(text: string): Spinner;
  /** Register a Ctrl+C handler; returns the unregister function */
  onInterrupt(handler: () => void): () => void;
  close(): void;
}

/**
 * Output stream that forwards to stdout unless muted (hidden prompts).
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

export interface ReadlineTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class ReadlineTerminal implements Terminal {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly mutable: MutableOutput;
  private readonly interruptHandlers: Array<() => void> = [];
  private pending: ((answer: string | undefined) => void) | null = null;
  private closed = false;

  constructor(options: ReadlineTerminalOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.mutable = new MutableOutput(this.output);
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.mutable,
      terminal: true,
    });

    this.rl.on('SIGINT', () => {
      const handler = this.interruptHandlers[this.interruptHandlers.length - 1];
      if (handler) {
        handler();
      } else {
        this.rl.close();
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      this.settle(undefined);
    });
  }

  print(line = ''): void {
    this.output.write(`${line}\n`);
  }

  prompt(question: string): Promise<string | undefined> {
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.pending = resolve;
      this.rl.question(question, (answer) => this.settle(answer));
    });
  }

  async promptHidden(question: string): Promise<string | undefined> {
    if (this.closed) {
      return undefined;
    }
    this.output.write(question);
    this.mutable.muted = true;
    try {
      return await new Promise<string | undefined>((resolve) => {
        this.pending = resolve;
        this.rl.question('', (answer) => this.settle(answer));
      });
    } finally {
      this.mutable.muted = false;
      this.output.write('\n');
    }
  }

  spin(text: string): Spinner {
    return ora({ text, color: 'cyan' }).start();
  }

  onInterrupt(handler: () => void): () => void {
    this.interruptHandlers.push(handler);
    return () => {
      const index = this.interruptHandlers.lastIndexOf(handler);
      if (index !== -1) {
        this.interruptHandlers.splice(index, 1);
      }
    };
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private settle(answer: string | undefined): void {
    const resolve = this.pending;
    this.pending = null;
    resolve?.(answer);
  }
}
