/**
 * Confirmation prompt for destructive operations
 */

import * as readline from 'readline';

export interface ConfirmationPrompt {
  /** Resolves with the raw answer */
  ask(question: string, signal?: AbortSignal): Promise<string>;
}

/** Only a single y or Y confirms */
export function isAffirmative(answer: string): boolean {
  return /^[yY]$/.test(answer.trim());
}

export class ReadlinePrompt implements ConfirmationPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  ask(question: string, signal?: AbortSignal): Promise<string> {
    const rl = readline.createInterface({ input: this.input, output: this.output });

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        reject(signal?.reason ?? new Error('Prompt aborted'));
        rl.close();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      // Closing stdin (Ctrl-D, or no terminal) counts as "no"
      rl.once('close', () => {
        signal?.removeEventListener('abort', onAbort);
        resolve('');
      });

      rl.question(question, (answer) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(answer.trim());
        rl.close();
      });
    });
  }
}

/**
 * Answers every question the same way; used for --yes and in tests.
 */
export class FixedAnswerPrompt implements ConfirmationPrompt {
  readonly questions: string[] = [];

  constructor(private readonly answer: string) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answer;
  }
}
