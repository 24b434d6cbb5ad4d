import type { StyleMode } from '@linewright/contracts';
import { CliError } from './errors.js';

export type ParsedArgs = {
  command?: string;
  positionals: string[];
  json: boolean;
  help: boolean;
  width?: number;
  height?: number;
  scroll: number;
  styleMode: StyleMode;
};

type ValueFlag = '--width' | '--height' | '--scroll' | '--style-mode';

const VALUE_FLAGS: readonly ValueFlag[] = ['--width', '--height', '--scroll', '--style-mode'];

const isValueFlag = (flag: string): flag is ValueFlag => VALUE_FLAGS.some((candidate) => candidate === flag);

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new CliError('INVALID_ARGUMENT', `${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function parseStyleMode(raw: string): StyleMode {
  if (raw === 'flat' || raw === 'nested') return raw;
  throw new CliError('INVALID_ARGUMENT', `--style-mode must be "flat" or "nested", got "${raw}"`);
}

/**
 * Split argv into a command, its positionals and the known flags.
 * Value flags accept both `--width 640` and `--width=640`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    positionals: [],
    json: false,
    help: false,
    scroll: 0,
    styleMode: 'flat',
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === '--json') {
      parsed.json = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const flag = eq === -1 ? arg : arg.slice(0, eq);
      if (!isValueFlag(flag)) {
        throw new CliError('INVALID_ARGUMENT', `Unknown option ${flag}`);
      }

      let raw: string;
      if (eq !== -1) {
        raw = arg.slice(eq + 1);
      } else {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith('--')) {
          throw new CliError('MISSING_REQUIRED', `${flag} requires a value`);
        }
        raw = next;
        i += 1;
      }

      switch (flag) {
        case '--width':
          parsed.width = parseNumber(flag, raw);
          break;
        case '--height':
          parsed.height = parseNumber(flag, raw);
          break;
        case '--scroll':
          parsed.scroll = parseNumber(flag, raw);
          break;
        case '--style-mode':
          parsed.styleMode = parseStyleMode(raw);
          break;
      }
      continue;
    }

    if (parsed.command === undefined) {
      parsed.command = arg;
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}
