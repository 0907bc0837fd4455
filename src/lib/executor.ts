import { spawn } from "node:child_process";

export type ExecOptions = {
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export interface Executor {
  run(cmd: string[], options?: ExecOptions): Promise<ExecResult>;
}

export type CommandFailure = "exit" | "timeout" | "spawn";

export class CommandError extends Error {
  constructor(
    message: string,
    readonly reason: CommandFailure,
    readonly result?: ExecResult,
  ) {
    super(message);
    this.name = "CommandError";
  }
}

export class NodeExecutor implements Executor {
  run(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const { timeoutMs, allowNonZeroExit } = options;
    const [file, ...args] = cmd;
    if (!file) return Promise.reject(new CommandError("Empty command", "spawn"));

    return new Promise<ExecResult>((resolve, reject) => {
      const proc = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });

      const stdoutChunks: string[] = [];
      const stderrChunks: string[] = [];
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;

      const collected = (code: number): ExecResult => ({
        code,
        stdout: stdoutChunks.join(""),
        stderr: stderrChunks.join(""),
      });

      proc.stdout.setEncoding("utf8");
      proc.stderr.setEncoding("utf8");
      proc.stdout.on("data", (text: string) => stdoutChunks.push(text));
      proc.stderr.on("data", (text: string) => stderrChunks.push(text));

      if (timeoutMs && timeoutMs > 0) {
        timeoutHandle = setTimeout(() => {
          settled = true;
          proc.kill("SIGKILL");
          // A grandchild may still hold the pipes open; stop waiting on them
          proc.stdout.destroy();
          proc.stderr.destroy();
          reject(new CommandError(`Command timed out: ${cmd.join(" ")}`, "timeout", collected(124)));
        }, timeoutMs);
      }

      proc.on("error", (e) => {
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (settled) return;
        settled = true;
        reject(new CommandError(`Cannot run ${cmd.join(" ")}: ${e.message}`, "spawn"));
      });

      // "close" fires after both pipes are drained
      proc.on("close", (code) => {
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (settled) return;
        settled = true;

        const result = collected(code ?? 1);
        if (result.code !== 0 && !allowNonZeroExit) {
          reject(new CommandError(`Command failed (${result.code}): ${cmd.join(" ")}\n${result.stderr}`, "exit", result));
          return;
        }
        resolve(result);
      });
    });
  }
}

export type RecordedCall = { cmd: string[]; options?: ExecOptions; result?: ExecResult };

export type Responder = (cmd: string[]) => ExecResult | Promise<ExecResult>;

export class RecordingExecutor implements Executor {
  public calls: RecordedCall[] = [];
  constructor(private responses: Responder | ExecResult = { code: 0, stdout: "", stderr: "" }) {}
  async run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    const res = typeof this.responses === "function" ? await this.responses(cmd) : this.responses;
    const copy: ExecResult = { code: res.code, stdout: res.stdout, stderr: res.stderr };
    this.calls.push({ cmd: [...cmd], options, result: copy });
    if (copy.code !== 0 && !options?.allowNonZeroExit) {
      throw new CommandError(`Command failed (${copy.code}): ${cmd.join(" ")}`, "exit", copy);
    }
    return copy;
  }
}
