import { z } from "zod";
import { CommandError, type Executor } from "./executor";
import { findSubvolOption } from "./fstab";
import { silentLogger, type Logger } from "./log";

export const DEFAULT_TIMEOUT_MS = 10_000;

type RootDeviceBase = {
  source: string;
  fstype: string;
  subvol?: string;
  rootArg: string;
};

export type PlainRoot = RootDeviceBase & { topology: "plain" };
export type LvmRoot = RootDeviceBase & { topology: "lvm" };
export type EncryptedRoot = RootDeviceBase & {
  topology: "luks" | "luksOverLvm";
  luksUuid?: string;
  luksName?: string;
};

export type RootDeviceInfo = PlainRoot | LvmRoot | EncryptedRoot;
export type Topology = RootDeviceInfo["topology"];

/** A dm-crypt mapping and, when blkid could tell, the UUID of the device beneath it. */
export type CryptLayer = { name: string; uuid?: string };

export type DetectOptions = {
  timeoutMs?: number;
  log?: Logger;
};

/**
 * Runs one introspection command. Resolves to trimmed stdout, or ""
 * when the tool is missing, exits non-zero or times out.
 */
export type Probe = (cmd: string[]) => Promise<string>;

export function createProbe(exec: Executor, options: DetectOptions = {}): Probe {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const log = options.log ?? silentLogger;
  return async (cmd) => {
    log.debug(`$ ${cmd.join(" ")}`);
    try {
      const res = await exec.run(cmd, { timeoutMs });
      return res.stdout.trim();
    } catch (e) {
      if (!(e instanceof CommandError)) throw e;
      log.debug(`  no result (${e.reason})`);
      return "";
    }
  };
}

const FindmntSchema = z.object({
  filesystems: z
    .array(
      z.object({
        source: z.string().min(1),
        fstype: z.string().nullish(),
        options: z.string().nullish(),
      }),
    )
    .min(1),
});

export type RootMount = { source: string; fstype: string; options: string };

export function parseFindmntJson(raw: string): RootMount | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = FindmntSchema.safeParse(json);
  if (!parsed.success) return undefined;
  const root = parsed.data.filesystems[0];
  return { source: root.source, fstype: root.fstype ?? "", options: root.options ?? "" };
}

// findmnt reports btrfs sources as /dev/mapper/root_crypt[/root-2]
export function stripSubvolSuffix(source: string): string {
  const i = source.indexOf("[");
  return i === -1 ? source : source.slice(0, i);
}

export function isMapperDevice(path: string): boolean {
  return path.includes("/mapper/") || /^\/dev\/dm-\d+$/.test(path);
}

export function mapperPath(name: string): string {
  return `/dev/mapper/${name}`;
}

function lastSegment(path: string): string {
  return path.slice(path.lastIndexOf("/") + 1);
}

/** The device line of `cryptsetup status`, e.g. `  device:  /dev/nvme0n1p2`. */
export function parseCryptDevice(status: string): string | undefined {
  const line = status.split(/\r?\n/).find((l) => l.includes("device:"));
  if (!line) return undefined;
  const parts = line.trim().split(/\s+/);
  return parts[parts.length - 1];
}

export function parseLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
}

export async function resolveMapperName(probe: Probe, device: string): Promise<string> {
  if (/^\/dev\/dm-\d+$/.test(device)) {
    const name = await probe(["dmsetup", "info", "-c", "--noheadings", "-o", "name", device]);
    if (name) return name;
  }
  return lastSegment(device);
}

export async function probeCrypt(probe: Probe, name: string): Promise<CryptLayer | undefined> {
  const table = await probe(["dmsetup", "table", "--target", "crypt", name]);
  if (!table) return undefined;

  const underlying = parseCryptDevice(await probe(["cryptsetup", "status", name]));
  if (!underlying) return { name };
  const uuid = await probe(["blkid", "-s", "UUID", "-o", "value", underlying]);
  return uuid ? { name, uuid } : { name };
}

// luksUuid and luksName are set together or not at all
function encrypted(topology: EncryptedRoot["topology"], base: RootDeviceBase, layer: CryptLayer): EncryptedRoot {
  if (!layer.uuid) return { ...base, topology };
  return { ...base, topology, luksUuid: layer.uuid, luksName: layer.name };
}

async function classifyMapper(probe: Probe, name: string, base: RootDeviceBase): Promise<RootDeviceInfo> {
  const mapped = { ...base, rootArg: mapperPath(name) };

  const crypt = await probeCrypt(probe, name);
  if (crypt) return encrypted("luks", mapped, crypt);

  const lv = await probe(["lvs", "--noheadings", "-o", "vg_name,lv_name", mapperPath(name)]);
  if (!lv) return { ...base, topology: "plain" };

  const lvm: LvmRoot = { ...mapped, topology: "lvm" };
  const vg = lv.split(/\s+/)[0];
  const pvs = parseLines(await probe(["pvs", "--noheadings", "-o", "pv_name", "-S", `vg_name=${vg}`]));
  if (pvs.length !== 1 || !isMapperDevice(pvs[0])) return lvm;

  const pvCrypt = await probeCrypt(probe, await resolveMapperName(probe, pvs[0]));
  return pvCrypt ? encrypted("luksOverLvm", mapped, pvCrypt) : lvm;
}

/**
 * Works out what the running root filesystem sits on.
 *
 * Walks at most two device-mapper layers below the mount: a dm-crypt
 * mapping, or an LVM volume whose single PV may itself be dm-crypt.
 * Resolves to undefined when findmnt gives nothing usable.
 */
export async function detectRoot(exec: Executor, options: DetectOptions = {}): Promise<RootDeviceInfo | undefined> {
  const probe = createProbe(exec, options);

  const raw = await probe(["findmnt", "-n", "-J", "-o", "SOURCE,FSTYPE,OPTIONS", "/"]);
  if (!raw) return undefined;
  const mount = parseFindmntJson(raw);
  if (!mount) return undefined;

  const source = stripSubvolSuffix(mount.source);
  const base: RootDeviceBase = {
    source,
    fstype: mount.fstype,
    subvol: findSubvolOption(mount.options),
    rootArg: source,
  };

  if (!isMapperDevice(source)) return { ...base, topology: "plain" };
  return classifyMapper(probe, await resolveMapperName(probe, source), base);
}

/** The mounted subvolume without its leading slash, as snapshot names are written. */
export function currentSubvol(info: RootDeviceInfo): string | undefined {
  if (info.subvol === undefined) return undefined;
  return info.subvol.replace(/^\/+/, "") || undefined;
}
