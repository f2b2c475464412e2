import { createInterface } from 'node:readline/promises';
import { Writable } from 'node:stream';

export interface AskOptions {
  /** Do not echo what is typed */
  secret: boolean;
  /** Aborting withdraws the question; ask() then resolves null */
  signal: AbortSignal;
}

/** Where the CLI reads answers to credential prompts from. */
export interface PromptIO {
  ask(question: string, options: AskOptions): Promise<string | null>;
}

export interface TerminalPromptOptions {
  input?: NodeJS.ReadableStream & { isTTY?: boolean };
  output?: NodeJS.WritableStream;
  /** Ctrl+C while a question is open */
  onInterrupt?: () => void;
}

/**
 * Asks questions on the terminal with node:readline. Secret answers are
 * read with echo suppressed; the question itself is still shown.
 */
export class TerminalPromptIO implements PromptIO {
  private readonly input: NodeJS.ReadableStream & { isTTY?: boolean };
  private readonly output: NodeJS.WritableStream;
  private readonly onInterrupt: (() => void) | undefined;

  constructor(options: TerminalPromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    this.onInterrupt = options.onInterrupt;
  }

  async ask(question: string, { secret, signal }: AskOptions): Promise<string | null> {
    if (signal.aborted) return null;

    const target = this.output;
    let muted = false;
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) target.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input: this.input, output: sink, terminal: this.input.isTTY === true });
    let closed = false;
    const onInterrupt = this.onInterrupt;
    if (onInterrupt) rl.on('SIGINT', onInterrupt);
    const closedEarly = new Promise<null>((resolve) =>
      rl.once('close', () => {
        closed = true;
        resolve(null);
      }),
    );

    const answer = rl.question(`${question} `, { signal }).catch((err: unknown) => {
      if (signal.aborted || closed) return null;
      throw err;
    });
    muted = secret;

    try {
      return await Promise.race([answer, closedEarly]);
    } finally {
      muted = false;
      if (secret) target.write('\n');
      rl.close();
    }
  }
}
