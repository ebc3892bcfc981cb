import { spawn } from "node:child_process";

export type ExecResult = Readonly<{
  code: number;
  stdout: Buffer;
  stderr: string;
}>;

// Never rejects: a binary that cannot be spawned resolves with code 127.
export const exec = async (
  cmd: string,
  args: readonly string[],
): Promise<ExecResult> =>
  await new Promise<ExecResult>((resolve) => {
    const child = spawn(cmd, [...args], { stdio: ["ignore", "pipe", "pipe"] });

    const outChunks: Buffer[] = [];
    const errChunks: Buffer[] = [];
    let settled = false;

    child.stdout.on("data", (b: Buffer) => outChunks.push(b));
    child.stderr.on("data", (b: Buffer) => errChunks.push(b));

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      resolve({ code: 127, stdout: Buffer.alloc(0), stderr: err.message });
    });

    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      resolve({
        code: typeof code === "number" ? code : 1,
        stdout: Buffer.concat(outChunks),
        stderr: Buffer.concat(errChunks).toString("utf8"),
      });
    });
  });

export const commandAvailable = async (
  cmd: string,
  versionArgs: readonly string[] = ["-version"],
): Promise<boolean> => (await exec(cmd, versionArgs)).code === 0;
