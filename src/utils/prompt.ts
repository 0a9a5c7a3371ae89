import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import { ConfigError } from './errorHandler';

export interface PromptOptions {
  input?: Readable;
  output?: Writable;
  /** Ctrl+C while the prompt is waiting. */
  onInterrupt?: () => void;
}

/**
 * Ask one question and resolve with the trimmed answer. Rejects with
 * ConfigError when the input ends before a line arrives (piped or closed
 * stdin), so callers never wait on an answer that cannot come.
 */
export function question(prompt: string, options: PromptOptions = {}): Promise<string> {
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout
  });
  if (options.onInterrupt) {
    rl.on('SIGINT', options.onInterrupt);
  }

  return new Promise((resolve, reject) => {
    let answered = false;

    rl.on('close', () => {
      if (!answered) {
        reject(new ConfigError('Input closed before an answer was given'));
      }
    });

    rl.question(prompt, answer => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

/** Pause until Enter is pressed or the input ends. */
export async function waitForEnter(prompt: string, options: PromptOptions = {}): Promise<void> {
  try {
    await question(prompt, options);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
  }
}
