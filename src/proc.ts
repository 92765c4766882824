import { spawn } from "node:child_process";

export type ExecResult = {
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  cwd?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
};

export async function execCmd(bin: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, {
      cwd: opts.cwd,
      signal: opts.signal,
      timeout: opts.timeoutMs,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";

    p.stdout.on("data", (d) => {
      stdout += String(d);
    });

    p.stderr.on("data", (d) => {
      stderr += String(d);
    });

    p.on("error", reject);
    p.on("close", (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }
      const reason = signal ? `signal ${signal}` : String(code);
      reject(new Error(`${bin} ${args.join(" ")} failed (${reason}): ${stderr.trim()}`));
    });
  });
}
