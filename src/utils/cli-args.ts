import type { HarvestOptions } from '../types/index.js';
import { parseSlashDate, today } from './dates.js';

export const USAGE = `Usage: auction-harvester [options]

Options:
  --lastdate <dd/mm/yyyy>   Most recent day to query (default: today)
  --maxdays <n>             Days to query backwards, lastdate included (default: 1)
  --maxauctions <n>         Query auction ids 1..n (default: 10)
  --help                    Show this message`;

const DEFAULT_MAX_DAYS = 1;
const DEFAULT_MAX_AUCTIONS = 10;

const VALUE_FLAGS = ['lastdate', 'maxdays', 'maxauctions'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export type ParsedArgs = { command: 'help' } | { command: 'harvest'; options: HarvestOptions };

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some(flag => flag === name);
}

function parseCount(flag: ValueFlag, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;

  if (!/^-?\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError(`--${flag} must be an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < 1) {
    throw new InvalidArgumentError(`--${flag} must be >= 1`);
  }
  return value;
}

/**
 * Parse harvest arguments. Accepts "--flag value" and "--flag=value".
 * Throws InvalidArgumentError before anything touches the network.
 */
export function parseHarvestArgs(argv: string[], now: Date = new Date()): ParsedArgs {
  const values: Partial<Record<ValueFlag, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      return { command: 'help' };
    }
    if (!arg.startsWith('--')) {
      throw new InvalidArgumentError(`Unexpected argument "${arg}"`);
    }

    const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
    if (!isValueFlag(name)) {
      throw new InvalidArgumentError(`Unknown option "--${name}"`);
    }

    const value = inlineValue ?? argv[++i];
    if (value === undefined) {
      throw new InvalidArgumentError(`Missing value for --${name}`);
    }
    values[name] = value;
  }

  let lastDate = today(now);
  if (values.lastdate !== undefined) {
    const parsed = parseSlashDate(values.lastdate);
    if (!parsed) {
      throw new InvalidArgumentError(
        `Invalid --lastdate "${values.lastdate}", expected dd/mm/yyyy`
      );
    }
    lastDate = parsed;
  }

  return {
    command: 'harvest',
    options: {
      lastDate,
      maxDays: parseCount('maxdays', values.maxdays, DEFAULT_MAX_DAYS),
      maxAuctions: parseCount('maxauctions', values.maxauctions, DEFAULT_MAX_AUCTIONS),
    },
  };
}
