import { UsageError } from "./errors";

export type ArgValue = string | number | boolean;
export type ArgSpec = { name: string; type: "string" | "boolean" | "number"; alias?: string; default?: ArgValue };

export function parseArgs(argv: string[], specs: ArgSpec[]) {
  const map = new Map<string, ArgSpec>();
  for (const s of specs) {
    map.set(`--${s.name}`, s);
    if (s.alias) map.set(`-${s.alias}`, s);
  }
  const result: Record<string, ArgValue> = {};
  for (const s of specs) {
    if (s.default !== undefined) result[s.name] = s.default;
  }
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i];
    if (!tok.startsWith('-') || tok === '-') { positional.push(tok); continue; }
    if (tok === '--') { positional.push(...argv.slice(i + 1)); break; }
    const spec = map.get(tok);
    if (!spec) throw new UsageError(`Unknown argument: ${tok}`);
    if (spec.type === 'boolean') {
      result[spec.name] = true;
    } else {
      const val = argv[++i];
      if (val === undefined) throw new UsageError(`Missing value for ${tok}`);
      if (spec.type === 'number') {
        const n = Number(val);
        if (!Number.isFinite(n)) throw new UsageError(`Invalid number for ${tok}: ${val}`);
        result[spec.name] = n;
      } else {
        result[spec.name] = val;
      }
    }
  }
  return { args: result, positional };
}

export function stringArg(args: Record<string, ArgValue>, name: string): string | undefined {
  const v = args[name];
  return typeof v === "string" ? v : undefined;
}

export function numberArg(args: Record<string, ArgValue>, name: string): number | undefined {
  const v = args[name];
  return typeof v === "number" ? v : undefined;
}

export function flagArg(args: Record<string, ArgValue>, name: string): boolean {
  return args[name] === true;
}
