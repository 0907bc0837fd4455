import { flagArg, numberArg, parseArgs, stringArg } from "../lib/args";
import { buildCmdline, splitParams } from "../lib/cmdline";
import { UsageError } from "../lib/errors";
import type { Executor } from "../lib/executor";
import { createLogger } from "../lib/log";
import { DEFAULT_TIMEOUT_MS, currentSubvol, detectRoot } from "../lib/rootdev";
import { VERSION, lineWriter, processIO, reportFailure, type CliIO } from "./io";

export function rootdevUsage(): string {
  return `atomic-rootdev v${VERSION}\n\n` +
`Usage:\n  atomic-rootdev <command> [options]\n\n` +
`Commands:\n  detect                     Print root device info as JSON\n  cmdline <subvol>           Print kernel cmdline fragment booting <subvol>\n  device                     Print the root block device\n  subvol                     Print the mounted root subvolume\n\n` +
`Options:\n  --append <params>          Extra kernel parameters for cmdline\n  --timeout <ms>             Timeout per system command (default ${DEFAULT_TIMEOUT_MS})\n  --verbose                  Log every system command to stderr\n  -h, --help                 Show help\n  -v, --version              Show version\n`;
}

const COMMANDS = ["detect", "cmdline", "device", "subvol"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(s: string): s is Command {
  return (COMMANDS as readonly string[]).includes(s);
}

export type RootdevDeps = {
  exec: Executor;
  io?: CliIO;
};

export async function runRootdev(argv: string[], deps: RootdevDeps): Promise<number> {
  const io = deps.io ?? processIO;
  const out = lineWriter(io.stdout);
  const log = createLogger({ verbose: argv.includes("--verbose"), write: lineWriter(io.stderr) });

  try {
    const { args, positional } = parseArgs(argv, [
      { name: "help", type: "boolean", alias: "h" },
      { name: "version", type: "boolean", alias: "v" },
      { name: "verbose", type: "boolean" },
      { name: "timeout", type: "number", default: DEFAULT_TIMEOUT_MS },
      { name: "append", type: "string" },
    ]);
    if (flagArg(args, "help")) { io.stderr(rootdevUsage()); return 0; }
    if (flagArg(args, "version")) { out(VERSION); return 0; }

    const [command, subvolArg] = positional;
    if (!command) { io.stderr(rootdevUsage()); return 1; }
    if (!isCommand(command)) throw new UsageError(`Unknown command: ${command}`);
    if (command === "cmdline" && !subvolArg) throw new UsageError("SUBVOL argument required");
    if (command !== "cmdline" && stringArg(args, "append") !== undefined) {
      throw new UsageError("--append only applies to cmdline");
    }

    const timeoutMs = numberArg(args, "timeout") ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) throw new UsageError(`Invalid --timeout: ${timeoutMs}`);

    const info = await detectRoot(deps.exec, { timeoutMs, log });
    if (!info) {
      log.error("Failed to detect root device");
      return 1;
    }
    log.debug(`Detected ${info.topology} root on ${info.source}`);

    switch (command) {
      case "detect":
        out(JSON.stringify(info, null, 2));
        return 0;
      case "cmdline": {
        const extra = splitParams(stringArg(args, "append") ?? "");
        out(buildCmdline(info, subvolArg, extra));
        return 0;
      }
      case "device":
        out(info.source);
        return 0;
      case "subvol": {
        const subvol = currentSubvol(info);
        if (!subvol) {
          log.error("Root is not mounted from a subvolume");
          return 1;
        }
        out(subvol);
        return 0;
      }
      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (e) {
    return reportFailure(log, e);
  }
}
