#!/usr/bin/env node
import { runFstab } from "./commands/fstab";

runFstab(process.argv.slice(2)).then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  },
);
