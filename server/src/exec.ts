import { spawn } from "node:child_process";

export type ExecResult = {
  ok: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
  error?: string;
};

export async function execCapture(
  cmd: string,
  args: string[],
  opts?: { timeoutMs?: number; cwd?: string; env?: Record<string, string> },
): Promise<ExecResult> {
  const timeoutMs = opts?.timeoutMs ?? 2500;
  return await new Promise((resolve) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let settled = false;
    const finish = (res: ExecResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(t);
      resolve(res);
    };

    child.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));

    const t = setTimeout(() => {
      // kill() reports failure by returning false rather than throwing.
      child.kill("SIGKILL");
      finish({ ok: false, code: null, stdout, stderr, error: "timeout" });
    }, timeoutMs);

    child.on("error", (e) => finish({ ok: false, code: null, stdout, stderr, error: e.message }));
    child.on("close", (code) => finish({ ok: code === 0, code, stdout, stderr }));
  });
}
