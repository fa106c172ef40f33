import { createInterface } from "node:readline";

export const PROMPT_CUE = "Enter your prompt: ";

/** Anything the pipeline prints user-facing text to, e.g. process.stdout. */
export interface TextSink {
  write(text: string): unknown;
}

/**
 * Prints the cue, then reads a single line. A last line without a newline
 * counts; end of input before any line yields "".
 */
export function readPrompt(
  input: NodeJS.ReadableStream,
  output: TextSink,
  cue: string = PROMPT_CUE
): Promise<string> {
  output.write(cue);

  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });

  // Input errors arrive on the interface; close detaches it from the input.
  return new Promise((resolve, reject) => {
    rl.once("line", (line) => {
      resolve(line);
      rl.close();
    });
    rl.once("close", () => resolve(""));
    rl.once("error", (err) => {
      reject(err);
      rl.close();
    });
  });
}
