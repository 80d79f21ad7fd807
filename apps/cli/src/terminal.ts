import { createInterface, type Interface } from 'node:readline/promises';
import type { SessionStore } from '@termmail/mail-core';
import { defaultPageSize } from './config';

/** Line-oriented console the shell talks through. */
export interface Terminal {
  readonly columns: number;
  print(text?: string): void;
  /** Trimmed answer; rejects with InputClosedError once input has ended. */
  ask(question: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export class ReadlineTerminal implements Terminal {
  private readonly rl: Interface;
  private readonly closed: Promise<never>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WriteStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.closed = new Promise<never>((_resolve, reject) => {
      this.rl.once('close', () => reject(new InputClosedError()));
    });
    // Observed through ask(); nothing else awaits it.
    this.closed.catch(() => undefined);
  }

  get columns(): number {
    return this.output.columns || 80;
  }

  print(text = ''): void {
    this.output.write(`${text}\n`);
  }

  async ask(question: string): Promise<string> {
    const answer = await Promise.race([this.rl.question(question), this.closed]);
    return answer.trim();
  }

  close(): void {
    this.rl.close();
  }
}

/** Output whose height can change, such as a TTY stdout. */
export interface ResizableOutput {
  readonly rows?: number;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

/**
 * Keeps the session's page size in step with the terminal height. The
 * current page stays as it is; the next load or refill uses the new size.
 * Returns the unsubscribe function.
 */
export function followTerminalHeight(output: ResizableOutput, session: SessionStore): () => void {
  const update = () => session.getState().setPageSize(defaultPageSize(output.rows));
  output.on('resize', update);
  return () => {
    output.off('resize', update);
  };
}
