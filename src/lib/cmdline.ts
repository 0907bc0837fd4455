import type { RootDeviceInfo } from "./rootdev";

/**
 * Kernel arguments that boot into `newSubvol` on the detected device.
 *
 * The rd.luks.name directive must come before root=: some initramfs
 * hooks only unlock containers named ahead of the root device.
 */
export function buildCmdline(info: RootDeviceInfo, newSubvol: string, extraParams: string[] = []): string {
  const parts: string[] = [];

  if ((info.topology === "luks" || info.topology === "luksOverLvm") && info.luksUuid && info.luksName) {
    parts.push(`rd.luks.name=${info.luksUuid}=${info.luksName}`);
  }

  parts.push(`root=${info.rootArg}`);

  if (info.fstype) parts.push(`rootfstype=${info.fstype}`);

  parts.push(`rootflags=subvol=${newSubvol}`);
  parts.push(...extraParams);

  return parts.join(" ");
}

export function splitParams(params: string): string[] {
  return params.trim().split(/\s+/).filter(Boolean);
}
