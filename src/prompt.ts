import { createInterface, type Interface } from "node:readline/promises";

export const confirmationQuestion = "\nWould you like to continue? (yes or no): ";

/**
 * Source of operator answers. The console implementation reads from the
 * terminal; tests supply scripted answers.
 */
export interface Prompt {
  question(query: string): Promise<string>;
  close?(): void;
}

/**
 * Ask the operator to confirm before infrastructure is changed.
 *
 * Only the exact answers "yes" and "no" are accepted; anything else, including
 * an empty line, asks again.
 */
export async function confirm(prompt: Prompt) {
  let response: string;

  do {
    response = await prompt.question(confirmationQuestion);
  } while (response !== "yes" && response !== "no");

  return response === "yes";
}

/**
 * Create a prompt that reads answers line by line from the terminal
 *
 * The input is opened on the first question and stays open until `close()`;
 * lines that arrive ahead of a question are buffered. Running out of input is
 * an error, never an answer.
 */
export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompt {
  let readline: Interface | undefined;
  let lines: AsyncIterator<string> | undefined;

  return {
    async question(query) {
      readline ??= createInterface({ input, terminal: false });
      lines ??= readline[Symbol.asyncIterator]();

      output.write(query);

      const { value, done } = await lines.next();

      if (done) {
        throw new Error("Input closed before an answer was given");
      }

      return value;
    },

    close() {
      readline?.close();
      readline = undefined;
      lines = undefined;
    },
  };
}
