import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";

import { createTerminalPrompter } from "../prompt.js";

function createStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.setEncoding("utf-8");
  output.on("data", (chunk: string) => {
    written += chunk;
  });
  return { input, output, written: () => written };
}

describe("createTerminalPrompter", () => {
  it("answers consecutive questions from lines that arrive together", async () => {
    const { input, output } = createStreams();
    const prompter = createTerminalPrompter(input, output);
    input.write("n\ny\n");

    const first = await prompter.confirm("Pull Farm1?", true);
    const second = await prompter.confirm("Push Farm2?", false);

    expect([first, second]).toEqual([false, true]);
    prompter.close();
  });

  it("waits for a line typed after the question", async () => {
    const { input, output, written } = createStreams();
    const prompter = createTerminalPrompter(input, output);

    const answer = prompter.confirm("Pull Farm1?", false);
    input.write("yes\n");

    expect(await answer).toBe(true);
    expect(written()).toBe("Pull Farm1? (y/N) ");
    prompter.close();
  });

  it("takes the default once the input has ended", async () => {
    const { input, output } = createStreams();
    const prompter = createTerminalPrompter(input, output);
    input.end("\n");

    expect(await prompter.confirm("Pull Farm1?", true)).toBe(true);
    await prompter.waitForOperator("Press Enter");
    expect(await prompter.confirm("Push Farm2?", false)).toBe(false);
  });

  it("stops reading after close", async () => {
    const { input, output } = createStreams();
    const prompter = createTerminalPrompter(input, output);
    input.write("y\n");
    expect(await prompter.confirm("Pull Farm1?", false)).toBe(true);

    prompter.close();

    expect(await prompter.confirm("Push Farm2?", true)).toBe(true);
  });
});
