import { describe, it, expect } from 'vitest';
import { ArgumentError, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('defaults to a dry run with nothing selected', () => {
    expect(parseArgs(['main.default'])).toEqual({
      namespace: 'main.default',
      tables: [],
      all: false,
      mode: 'preview',
      help: false,
    });
  });

  it('collects selected tables from every --select', () => {
    const options = parseArgs(['main.default', '--select', 't1, t2', '--select=t3', '--execute']);
    expect(options.tables).toEqual(['t1', 't2', 't3']);
    expect(options.mode).toBe('execute');
  });

  it('accepts --all and --help', () => {
    expect(parseArgs(['--all', 'c.s'])).toMatchObject({ namespace: 'c.s', all: true });
    expect(parseArgs(['-h']).help).toBe(true);
  });

  it('rejects unknown options and extra arguments', () => {
    expect(() => parseArgs(['c.s', '--force'])).toThrow('Unknown option: --force');
    expect(() => parseArgs(['c.s', 'd.t'])).toThrow(ArgumentError);
    expect(() => parseArgs(['c.s', '--select'])).toThrow(
      '--select needs a comma-separated list of tables'
    );
  });
});
