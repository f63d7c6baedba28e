import { createInterface } from "node:readline";

/** Line-based I/O a CliAgent talks through. */
export interface AgentIO {
  ask(prompt: string): Promise<string>;
  print(text: string): void;
}

export interface TerminalIO extends AgentIO {
  close(): void;
}

/**
 * Build an AgentIO over readline. `ask` rejects once the input stream
 * closes, so a game waiting on a human ends instead of hanging.
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalIO {
  const rl = createInterface({ input, output });
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) {
        return Promise.reject(new Error("Input closed"));
      }
      return new Promise((resolve, reject) => {
        const onClose = () => reject(new Error("Input closed before a move was entered"));
        rl.once("close", onClose);
        rl.question(prompt, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    print(text: string): void {
      output.write(text + "\n");
    },
    close(): void {
      if (!closed) rl.close();
    },
  };
}
