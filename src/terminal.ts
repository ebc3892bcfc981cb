import readline from "node:readline";
import { createInterface } from "node:readline/promises";
import { exec } from "./exec.js";

export const promptLine = async (question: string): Promise<string> => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

// Calls `onQuit` when a line reading "q" is entered. Returns a disposer.
export const watchForQuit = (onQuit: () => void): (() => void) => {
  const rl = readline.createInterface({ input: process.stdin });
  rl.on("line", (line) => {
    if (line.trim().toLowerCase() === "q") onQuit();
  });
  return () => rl.close();
};

export const openInBrowser = async (url: string): Promise<boolean> => {
  const [cmd, args]: readonly [string, readonly string[]] =
    process.platform === "darwin"
      ? ["open", [url]]
      : process.platform === "win32"
        ? ["cmd", ["/c", "start", "", url]]
        : ["xdg-open", [url]];
  const r = await exec(cmd, args);
  return r.code === 0;
};
