import { TICK_RATE } from "../config/constants.js";

export interface CliOptions {
  /** Scene file path; a generated demo scene when absent. */
  scene: string | null;
  seed: string;
  cols: number;
  rows: number;
  /** Ticks to run before exiting; 0 runs until interrupted. */
  ticks: number;
  tickRate: number;
  logDir: string | null;
  /** Raw `name=value` CVar assignments, in order. */
  sets: string[];
  help: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

export const USAGE = `usage: rainfield [options]

  --scene <file>      scene JSON (env SCENE); default: generated demo scene
  --seed <seed>       PRNG and demo scene seed (env SEED)
  --cols <n>          screen columns (env COLS, default 80)
  --rows <n>          screen rows (env ROWS, default 24)
  --ticks <n>         stop after n ticks, 0 = run forever (env TICKS, default 0)
  --tick-rate <hz>    ticks per second (env TICK_RATE, default ${TICK_RATE})
  --log-dir <dir>     also append logs to <dir>/rainfield.log (env LOG_DIR)
  --set name=value    set a simulation variable, repeatable
  --help              show this help`;

const VALUE_FLAGS = new Set(["--scene", "--seed", "--cols", "--rows", "--ticks", "--tick-rate", "--log-dir", "--set"]);

function nonNegativeInt(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} expects a non-negative integer, got "${raw}"`);
  }
  return n;
}

function positiveNumber(name: string, raw: string): number {
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} expects a positive number, got "${raw}"`);
  }
  return n;
}

/**
 * Resolve CLI options. Flags win over environment variables, which win over
 * defaults. Throws on unknown flags and malformed values.
 */
export function parseCliOptions(argv: readonly string[], env: Env = {}): CliOptions {
  const flags = new Map<string, string>();
  const sets: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) throw new Error(`unknown option: ${arg}`);
    const value = argv[i + 1];
    if (value === undefined) throw new Error(`${arg} expects a value`);
    i++;
    if (arg === "--set") sets.push(value);
    else flags.set(arg, value);
  }

  const pick = (flag: string, envName: string): string | undefined => flags.get(flag) ?? env[envName];

  const cols = pick("--cols", "COLS");
  const rows = pick("--rows", "ROWS");
  const ticks = pick("--ticks", "TICKS");
  const tickRate = pick("--tick-rate", "TICK_RATE");

  return {
    scene: pick("--scene", "SCENE") ?? null,
    seed: pick("--seed", "SEED") ?? "rainfield",
    cols: cols === undefined ? 80 : nonNegativeInt("cols", cols),
    rows: rows === undefined ? 24 : nonNegativeInt("rows", rows),
    ticks: ticks === undefined ? 0 : nonNegativeInt("ticks", ticks),
    tickRate: tickRate === undefined ? TICK_RATE : positiveNumber("tick-rate", tickRate),
    logDir: pick("--log-dir", "LOG_DIR") ?? null,
    sets,
    help,
  };
}
