import { log } from '../utils/log.js';

const FLAGS = ['scripts', 'inventory', 'out', 'equip-only'] as const;

type Flag = (typeof FLAGS)[number];
type CliArgs = Partial<Record<Flag, string | true>>;

export interface CliOptions {
  scriptsPath: string;
  inventoryPath: string;
  outputPath: string;
  equippableOnly: boolean;
}

export const USAGE =
  'Usage: gearswap-orphans --scripts <lua_folder_or_file> --inventory <inventory_csv> [--out <json>] [--equip-only false]';

const DEFAULT_OUTPUT = 'orphaned_items.json';

function isFlag(key: string): key is Flag {
  return FLAGS.some((flag) => flag === key);
}

// `--flag value`, `--flag=value` or a bare `--flag`; a repeated flag keeps its last value.
export function parseCliArgs(tokens: readonly string[]): CliArgs {
  const result: CliArgs = {};

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!token.startsWith('--') || token === '--') continue;

    const [key, inline] = token.slice(2).split(/=(.*)/s, 2);
    let value: string | true = inline ?? true;
    if (inline === undefined) {
      const next = tokens[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        value = next;
        i++;
      }
    }

    if (!isFlag(key)) {
      log.warn('Ignoring unknown flag', { flag: `--${key}` });
      continue;
    }
    result[key] = value;
  }

  return result;
}

function parseBooleanWord(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function resolveBooleanFlag(cliValue: string | true | undefined, envValue: string | undefined, fallback: boolean): boolean {
  if (cliValue === true) return true;
  for (const candidate of [cliValue, envValue]) {
    if (candidate === undefined) continue;
    const parsed = parseBooleanWord(candidate);
    if (parsed !== undefined) return parsed;
    log.warn('Unable to parse boolean flag, trying next source', { value: candidate });
  }
  return fallback;
}

function stringArg(value: string | true | undefined): string | undefined {
  return typeof value === 'string' && value.trim() ? value : undefined;
}

export function resolveCliOptions(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): CliOptions {
  const args = parseCliArgs(argv);

  const scriptsPath = stringArg(args.scripts) ?? env.SCRIPTS_PATH;
  const inventoryPath = stringArg(args.inventory) ?? env.INVENTORY_CSV;
  if (!scriptsPath || !inventoryPath) {
    throw new Error(`Both a script path and an inventory CSV are required.\n${USAGE}`);
  }

  return {
    scriptsPath,
    inventoryPath,
    outputPath: stringArg(args.out) ?? env.OUTPUT_PATH ?? DEFAULT_OUTPUT,
    equippableOnly: resolveBooleanFlag(args['equip-only'], env.EQUIP_ONLY, true)
  };
}
