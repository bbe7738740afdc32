import readline from 'readline/promises';

export interface Prompter {
  /** Rejects with an `AbortError` once the operator cancels. */
  ask(question: string): Promise<string>;
  close(): void;
}

export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} (y/N): `);
  return answer.trim().toLowerCase() === 'y';
}

/**
 * Prompter bound to stdin/stdout. Ctrl+C aborts `controller`, which rejects the
 * pending question and anything else listening on its signal.
 */
export function createTerminalPrompter(controller: AbortController): Prompter {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const abort = () => controller.abort();
  rl.on('SIGINT', abort);
  process.on('SIGINT', abort);

  return {
    ask: question => rl.question(question, { signal: controller.signal }),
    close: () => {
      process.off('SIGINT', abort);
      rl.close();
    },
  };
}
