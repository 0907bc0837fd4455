import { chmod, chown, copyFile, readFile, rename, rm, stat, utimes, writeFile } from "node:fs/promises";
import type { Stats } from "node:fs";
import { err, ok, type Result } from "neverthrow";
import { FstabError, describeError } from "./errors";
import { formatFstab, isRootEntry, parseFstab, replaceSubvol, trimSlashes } from "./fstab";

/**
 * File operations used by the update pipeline. Tests swap single
 * operations to interrupt or tamper with a run.
 */
export interface FileOps {
  stat(path: string): Promise<Stats>;
  /** Copy preserving permission bits and timestamps. */
  copyPreserving(src: string, dest: string): Promise<void>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  chown(path: string, uid: number, gid: number): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Removes a file; missing files are not an error. */
  remove(path: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  stat: (path) => stat(path),
  async copyPreserving(src, dest) {
    await copyFile(src, dest);
    const st = await stat(src);
    await chmod(dest, st.mode & 0o7777);
    await utimes(dest, st.atime, st.mtime);
  },
  readText: (path) => readFile(path, "utf8"),
  writeText: (path, content) => writeFile(path, content, "utf8"),
  chown: (path, uid, gid) => chown(path, uid, gid),
  chmod: (path, mode) => chmod(path, mode),
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
};

export type FstabUpdate = {
  /** Number of root entries rewritten. */
  updated: number;
  backupPath: string;
  warnings: string[];
};

export type UpdateOptions = {
  files?: FileOps;
};

export function backupPathFor(path: string): string {
  return `${path}.bak`;
}

export function tmpPathFor(path: string): string {
  return `${path}.tmp`;
}

/** True when the committed text carries the new subvolume in either slash style. */
export function containsSubvol(text: string, subvol: string): boolean {
  const norm = trimSlashes(subvol);
  return text.includes(`subvol=/${norm}`) || text.includes(`subvol=${norm}`);
}

/**
 * Points the root (`/`) entries of an fstab at a new subvolume.
 *
 * The original is copied to `<path>.bak` first and left there. The new
 * content is written to `<path>.tmp`, given the original's owner and mode,
 * then renamed over `path`. The committed file is read back; when the new
 * subvolume is missing from it the backup is restored and the run fails.
 *
 * Callers must not run two updates on the same file at once.
 */
export async function updateFstab(
  path: string,
  oldSubvol: string,
  newSubvol: string,
  options: UpdateOptions = {},
): Promise<Result<FstabUpdate, FstabError>> {
  const files = options.files ?? nodeFileOps;

  let original: Stats;
  try {
    original = await files.stat(path);
  } catch {
    return err(new FstabError("file-not-found", `fstab not found: ${path}`));
  }
  if (!original.isFile()) {
    return err(new FstabError("file-not-found", `fstab not found: ${path}`));
  }

  const backupPath = backupPathFor(path);
  try {
    await files.copyPreserving(path, backupPath);
  } catch (e) {
    const cleanup = await removeOrDescribe(files, backupPath);
    return err(new FstabError("backup-failed", `Cannot back up ${path} to ${backupPath}: ${describeError(e)}${cleanup}`));
  }

  let text: string;
  try {
    text = await files.readText(path);
  } catch (e) {
    return err(new FstabError("read-failed", `Cannot read ${path}: ${describeError(e)}`));
  }

  const entries = parseFstab(text);
  const rootEntries = entries.filter(isRootEntry);
  if (rootEntries.length === 0) {
    return err(new FstabError("no-root-entry", "No root (/) entry found in fstab"));
  }

  let updated = 0;
  for (const entry of rootEntries) {
    if (replaceSubvol(entry, oldSubvol, newSubvol)) updated++;
  }

  if (updated === 0) {
    return err(new FstabError("subvol-not-found", `Root entry exists but subvol=${oldSubvol} not found`));
  }

  const warnings: string[] = [];
  if (updated > 1) warnings.push(`Multiple root entries updated (${updated}), review fstab`);

  const tmpPath = tmpPathFor(path);
  try {
    await files.writeText(tmpPath, formatFstab(entries));
    await files.chown(tmpPath, original.uid, original.gid);
    await files.chmod(tmpPath, original.mode & 0o7777);
    await files.rename(tmpPath, path);
  } catch (e) {
    const cleanup = await removeOrDescribe(files, tmpPath);
    return err(new FstabError("commit-failed", `Cannot replace ${path}: ${describeError(e)}${cleanup}`));
  }

  let committed: string | undefined;
  try {
    committed = await files.readText(path);
  } catch {
    committed = undefined;
  }

  if (committed === undefined || !containsSubvol(committed, newSubvol)) {
    try {
      await files.copyPreserving(backupPath, path);
    } catch (e) {
      return err(new FstabError(
        "verification-failed",
        `Verification failed and restoring ${backupPath} failed too: ${describeError(e)}`,
      ));
    }
    return err(new FstabError("verification-failed", "Verification failed, backup restored"));
  }

  return ok({ updated, backupPath, warnings });
}

// Returns a suffix for the caller's error message when cleanup fails
async function removeOrDescribe(files: FileOps, path: string): Promise<string> {
  try {
    await files.remove(path);
    return "";
  } catch (e) {
    return ` (also failed to remove ${path}: ${describeError(e)})`;
  }
}
