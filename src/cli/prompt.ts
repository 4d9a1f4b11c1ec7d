/**
 * Terminal prompter
 */

import { createInterface, type Interface } from "node:readline";

import type { Prompter } from "../prompt.js";

/**
 * Parse a yes/no answer; anything unrecognized takes the default.
 */
export function parseAnswer(answer: string, defaultAnswer: boolean): boolean {
  const trimmed = answer.trim();
  if (/^(y|yes)$/i.test(trimmed)) return true;
  if (/^(n|no)$/i.test(trimmed)) return false;
  return defaultAnswer;
}

/**
 * Prompter reading answers line by line from `input`. The line reader is
 * opened on the first question and kept until close(), so lines that
 * arrive together (piped or typed ahead) answer the following questions.
 * Once the input ends every question takes its default.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  let reader: Interface | null = null;
  let ended = false;
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];

  const open = () => {
    if (reader || ended) return;
    reader = createInterface({ input, terminal: false });
    reader.on("line", (line) => {
      const next = waiting.shift();
      if (next) next(line);
      else buffered.push(line);
    });
    reader.on("close", () => {
      ended = true;
      reader = null;
      for (const next of waiting.splice(0)) next("");
    });
  };

  const ask = (question: string): Promise<string> => {
    output.write(question);
    open();
    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (ended) return Promise.resolve("");
    return new Promise((resolve) => waiting.push(resolve));
  };

  return {
    async confirm(question, defaultAnswer) {
      const hint = defaultAnswer ? "(Y/n)" : "(y/N)";
      return parseAnswer(await ask(`${question} ${hint} `), defaultAnswer);
    },
    async waitForOperator(message) {
      await ask(`${message} `);
    },
    close() {
      reader?.close();
    },
  };
}
