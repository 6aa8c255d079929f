import { spawn } from "child_process";

export interface ToolResult {
  exitCode: number | null;
  stderr: string;
}

/** Runs an external program to completion. */
export type ToolRunner = (command: string, args: string[]) => Promise<ToolResult>;

const STDERR_TAIL = 500;

export const spawnTool: ToolRunner = (command, args) =>
  new Promise<ToolResult>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

    let stderrBuffer = "";
    child.stderr.on("data", (data: Buffer) => {
      stderrBuffer += data.toString();
    });

    child.on("close", (code) => {
      resolve({ exitCode: code, stderr: stderrBuffer.slice(-STDERR_TAIL) });
    });

    child.on("error", (err) => {
      reject(err);
    });
  });
