import { ConfigurationError } from "../core/errors.js";
import { RANDOM_TEMPERATURE, type ScheduleTemperature } from "../core/schemas/index.js";

export interface ParsedArgs {
  positional: string[];
  flags: Map<string, string[]>;
}

/** `--name value` pairs collect into flags; `--new` style switches get "true". */
export function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string[]>();
  const switches = new Set(["new", "case-sensitive"]);

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const value = switches.has(name) ? "true" : argv[++i];
    if (value === undefined) {
      throw new ConfigurationError(`Missing value for --${name}`);
    }
    flags.set(name, [...(flags.get(name) ?? []), value]);
  }
  return { positional, flags };
}

export function parseTemperature(value: string | undefined): ScheduleTemperature | undefined {
  if (value === undefined) return undefined;
  if (value === RANDOM_TEMPERATURE) return RANDOM_TEMPERATURE;
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n) || n < 0 || n > 1) {
    throw new ConfigurationError(`Invalid temperature "${value}": expected a number in [0, 1] or "random"`);
  }
  return n;
}
