#!/usr/bin/env node
import { runRootdev } from "./commands/rootdev";
import { NodeExecutor } from "./lib/executor";

runRootdev(process.argv.slice(2), { exec: new NodeExecutor() }).then(
  (code) => { process.exitCode = code; },
  (e: unknown) => {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  },
);
