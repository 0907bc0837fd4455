import { flagArg, parseArgs } from "../lib/args";
import { UsageError } from "../lib/errors";
import { createLogger } from "../lib/log";
import { updateFstab, type FileOps } from "../lib/update";
import { VERSION, lineWriter, processIO, reportFailure, type CliIO } from "./io";

export function fstabUsage(): string {
  return `atomic-fstab v${VERSION}\n\n` +
`Usage:\n  atomic-fstab [options] <fstab-path> <old-subvol> <new-subvol>\n\n` +
`Rewrites subvol= on the root (/) entry. The original is kept as <fstab-path>.bak.\n\n` +
`Options:\n  --verbose                  Report each step to stderr\n  -h, --help                 Show help\n  -v, --version              Show version\n`;
}

export type FstabDeps = {
  io?: CliIO;
  files?: FileOps;
};

export async function runFstab(argv: string[], deps: FstabDeps = {}): Promise<number> {
  const io = deps.io ?? processIO;
  const log = createLogger({ verbose: argv.includes("--verbose"), write: lineWriter(io.stderr) });

  try {
    const { args, positional } = parseArgs(argv, [
      { name: "help", type: "boolean", alias: "h" },
      { name: "version", type: "boolean", alias: "v" },
      { name: "verbose", type: "boolean" },
    ]);
    if (flagArg(args, "help")) { io.stderr(fstabUsage()); return 0; }
    if (flagArg(args, "version")) { io.stdout(`${VERSION}\n`); return 0; }

    if (positional.length !== 3) {
      throw new UsageError("Usage: atomic-fstab FSTAB_PATH OLD_SUBVOL NEW_SUBVOL");
    }
    const [path, oldSubvol, newSubvol] = positional;

    log.debug(`Updating ${path}: subvol=${oldSubvol} -> subvol=${newSubvol}`);
    const result = await updateFstab(path, oldSubvol, newSubvol, { files: deps.files });

    if (result.isErr()) {
      log.debug(`Failure kind: ${result.error.kind} (${result.error.category})`);
      log.error(result.error.message);
      return 1;
    }

    for (const w of result.value.warnings) log.warn(w);
    log.debug(`Updated ${result.value.updated} root entr${result.value.updated === 1 ? "y" : "ies"}, backup at ${result.value.backupPath}`);
    return 0;
  } catch (e) {
    return reportFailure(log, e);
  }
}
