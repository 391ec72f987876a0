import * as readline from 'node:readline';

export interface Prompt {
  /** Next answer, or null once input has ended */
  ask(query: string): Promise<string | null>;
  close(): void;
}

/** Raised inside an action when stdin ends mid-conversation */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

/**
 * Line prompt over stdin. Lines are pulled through the readline async
 * iterator, so piped input is buffered rather than dropped between questions.
 */
export class ReadlinePrompt implements Prompt {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: NodeJS.WritableStream;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
    this.output = output;
  }

  async ask(query: string): Promise<string | null> {
    this.output.write(query);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

/** For one-shot commands: every question reads as end of input */
export class ClosedPrompt implements Prompt {
  async ask(): Promise<string | null> {
    return null;
  }

  close(): void {}
}
