import { describeError } from "../lib/errors";
import type { Logger } from "../lib/log";
import pkg from "../../package.json";

export const VERSION: string = pkg.version || "0.0.0";

export type CliIO = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export const processIO: CliIO = {
  stdout: (text) => { process.stdout.write(text); },
  stderr: (text) => { process.stderr.write(text); },
};

export function lineWriter(write: (text: string) => void): (line: string) => void {
  return (line) => write(`${line}\n`);
}

export function reportFailure(log: Logger, e: unknown): number {
  log.error(describeError(e).split("\n")[0]);
  return 1;
}
