import { describe, it, expect } from "vitest";
import { buildCmdline, splitParams } from "../src/lib/cmdline";
import type { RootDeviceInfo } from "../src/lib/rootdev";

const luks: RootDeviceInfo = {
  source: "/dev/mapper/root_crypt",
  fstype: "btrfs",
  subvol: "/root-1",
  topology: "luks",
  rootArg: "/dev/mapper/root_crypt",
  luksUuid: "abc-123",
  luksName: "root_crypt",
};

describe("buildCmdline", () => {
  it("puts the unlock directive before root=", () => {
    expect(buildCmdline(luks, "root-2")).toBe(
      "rd.luks.name=abc-123=root_crypt root=/dev/mapper/root_crypt rootfstype=btrfs rootflags=subvol=root-2",
    );
  });

  it("unlocks the container under an LVM root", () => {
    const info: RootDeviceInfo = {
      source: "/dev/mapper/vg0-root",
      fstype: "btrfs",
      topology: "luksOverLvm",
      rootArg: "/dev/mapper/vg0-root",
      luksUuid: "def-456",
      luksName: "cryptlvm",
    };
    expect(buildCmdline(info, "/root-2")).toBe(
      "rd.luks.name=def-456=cryptlvm root=/dev/mapper/vg0-root rootfstype=btrfs rootflags=subvol=/root-2",
    );
  });

  it("skips the unlock directive when the UUID is unknown", () => {
    const info: RootDeviceInfo = { source: "/dev/mapper/root_crypt", fstype: "btrfs", topology: "luks", rootArg: "/dev/mapper/root_crypt" };
    expect(buildCmdline(info, "root-2")).toBe("root=/dev/mapper/root_crypt rootfstype=btrfs rootflags=subvol=root-2");
  });

  it("omits rootfstype when the filesystem type is empty", () => {
    const info: RootDeviceInfo = { source: "/dev/sda2", fstype: "", topology: "plain", rootArg: "/dev/sda2" };
    expect(buildCmdline(info, "root-2")).toBe("root=/dev/sda2 rootflags=subvol=root-2");
  });

  it("appends extra parameters after the root arguments", () => {
    expect(buildCmdline(luks, "root-2", ["rw", "slab_nomerge"])).toBe(
      "rd.luks.name=abc-123=root_crypt root=/dev/mapper/root_crypt rootfstype=btrfs rootflags=subvol=root-2 rw slab_nomerge",
    );
  });
});

describe("splitParams", () => {
  it("splits on any whitespace", () => {
    expect(splitParams("  rw  pti=on\tvsyscall=none ")).toEqual(["rw", "pti=on", "vsyscall=none"]);
    expect(splitParams("")).toEqual([]);
  });
});
