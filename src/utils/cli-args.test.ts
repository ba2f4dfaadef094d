import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, parseHarvestArgs } from './cli-args.js';
import { toIsoDate } from './dates.js';

describe('parseHarvestArgs', () => {
  const now = new Date(2024, 5, 15, 9, 0);

  function harvestOptions(argv: string[]) {
    const parsed = parseHarvestArgs(argv, now);
    if (parsed.command !== 'harvest') {
      throw new Error(`expected harvest command, got ${parsed.command}`);
    }
    return parsed.options;
  }

  it('should default to today, one day and ten auctions', () => {
    const options = harvestOptions([]);

    expect(toIsoDate(options.lastDate)).toBe('2024-06-15');
    expect(options.maxDays).toBe(1);
    expect(options.maxAuctions).toBe(10);
  });

  it('should accept space-separated values', () => {
    const options = harvestOptions(['--lastdate', '05/03/2024', '--maxdays', '7', '--maxauctions', '3']);

    expect(toIsoDate(options.lastDate)).toBe('2024-03-05');
    expect(options.maxDays).toBe(7);
    expect(options.maxAuctions).toBe(3);
  });

  it('should accept --flag=value', () => {
    const options = harvestOptions(['--maxdays=2', '--lastdate=01/02/2024']);

    expect(options.maxDays).toBe(2);
    expect(toIsoDate(options.lastDate)).toBe('2024-02-01');
  });

  it('should return the help command', () => {
    expect(parseHarvestArgs(['--maxdays', '2', '--help'], now)).toEqual({ command: 'help' });
  });

  describe('validation', () => {
    it('should reject a badly formatted date', () => {
      expect(() => parseHarvestArgs(['--lastdate', '2024-03-05'], now)).toThrow(
        'Invalid --lastdate "2024-03-05", expected dd/mm/yyyy'
      );
    });

    it('should reject counts below 1', () => {
      expect(() => parseHarvestArgs(['--maxdays', '0'], now)).toThrow('--maxdays must be >= 1');
      expect(() => parseHarvestArgs(['--maxauctions', '-2'], now)).toThrow('--maxauctions must be >= 1');
    });

    it('should reject non-integer counts', () => {
      expect(() => parseHarvestArgs(['--maxdays', '1.5'], now)).toThrow(
        '--maxdays must be an integer, got "1.5"'
      );
    });

    it('should reject unknown options and missing values', () => {
      expect(() => parseHarvestArgs(['--maxsubastas', '3'], now)).toThrow('Unknown option "--maxsubastas"');
      expect(() => parseHarvestArgs(['--maxdays'], now)).toThrow('Missing value for --maxdays');
      expect(() => parseHarvestArgs(['extra'], now)).toThrow('Unexpected argument "extra"');
    });

    it('should throw InvalidArgumentError', () => {
      expect(() => parseHarvestArgs(['--maxdays', 'x'], now)).toThrow(InvalidArgumentError);
    });
  });
});
