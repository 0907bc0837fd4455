export type RawEntry = {
  isData: false;
  raw: string;
};

export type DataEntry = {
  isData: true;
  raw: string;
  device: string;
  mountpoint: string;
  fstype: string;
  options: string;
  dump: string;
  passno: string;
};

/** One line of an fstab file; comments, blanks and malformed lines are kept raw. */
export type MountEntry = RawEntry | DataEntry;

const SUBVOL_OPT = "subvol=";

export function parseMountEntry(line: string): MountEntry {
  const stripped = line.trim();
  if (!stripped || stripped.startsWith("#")) return { isData: false, raw: line };

  const parts = stripped.split(/\s+/);
  if (parts.length < 4) return { isData: false, raw: line };

  return {
    isData: true,
    raw: line,
    device: parts[0],
    mountpoint: parts[1],
    fstype: parts[2],
    options: parts[3],
    dump: parts[4] ?? "0",
    passno: parts[5] ?? "0",
  };
}

export function formatMountEntry(entry: MountEntry): string {
  if (!entry.isData) return entry.raw;
  return `${entry.device}\t${entry.mountpoint}\t${entry.fstype}\t${entry.options}\t${entry.dump} ${entry.passno}\n`;
}

// Keeps each terminator (\n, \r\n or \r) attached to its line
export function splitLines(text: string): string[] {
  return text.match(/[^\r\n]*(?:\r\n|\r|\n)|[^\r\n]+$/g) ?? [];
}

export function parseFstab(text: string): MountEntry[] {
  return splitLines(text).map(parseMountEntry);
}

export function formatFstab(entries: MountEntry[]): string {
  return entries.map(formatMountEntry).join("");
}

export function trimSlashes(s: string): string {
  return s.replace(/^\/+/, "").replace(/\/+$/, "");
}

/**
 * Rewrites `subvol=<old>` to `subvol=<new>` in the entry's options.
 *
 * Comparison ignores leading slashes. The rewritten value keeps the
 * slash style of the value it replaces: `subvol=/a` becomes `subvol=/b`
 * and `subvol=a` becomes `subvol=b`, whatever slashes `next` carries.
 *
 * @returns true when at least one option was rewritten
 */
export function replaceSubvol(entry: MountEntry, old: string, next: string): boolean {
  if (!entry.isData) return false;

  const oldNorm = trimSlashes(old);
  const newNorm = trimSlashes(next);
  let changed = false;
  const result: string[] = [];

  for (const opt of entry.options.split(",")) {
    const value = opt.startsWith(SUBVOL_OPT) ? opt.slice(SUBVOL_OPT.length) : undefined;
    if (value !== undefined && value.replace(/^\/+/, "") === oldNorm) {
      const prefix = value.startsWith("/") ? "/" : "";
      result.push(`${SUBVOL_OPT}${prefix}${newNorm}`);
      changed = true;
      continue;
    }
    result.push(opt);
  }

  if (changed) entry.options = result.join(",");
  return changed;
}

export function isRootEntry(entry: MountEntry): entry is DataEntry {
  return entry.isData && entry.mountpoint === "/";
}

/** The value of the first `subvol=` option, if any. */
export function findSubvolOption(options: string): string | undefined {
  const opt = options.split(",").find((o) => o.startsWith(SUBVOL_OPT));
  return opt === undefined ? undefined : opt.slice(SUBVOL_OPT.length);
}
