import { describe, expect, it } from 'vitest';
import { DEFAULT_RANKING_PARAMS, parseRunOptions } from './config';

describe('parseRunOptions', () => {
  it('starts from the default ranking parameters', () => {
    expect(parseRunOptions([])).toEqual({ ...DEFAULT_RANKING_PARAMS, json: false });
    expect(DEFAULT_RANKING_PARAMS).toEqual({
      strikeInterval: 2.5,
      duration: 100,
      regenLifetime: 100,
      cpCeiling: 1500,
    });
  });

  it('reads numeric and path flags', () => {
    const config = parseRunOptions([
      '--strike-interval', '2',
      '--duration', '60',
      '--regen-lifetime', '80',
      '--cp-cap', '2500',
      '--legacy', 'legacy.txt',
      '--exclude', 'legendaries.txt',
      '--json',
    ]);

    expect(config).toEqual({
      strikeInterval: 2,
      duration: 60,
      regenLifetime: 80,
      cpCeiling: 2500,
      legacyPath: 'legacy.txt',
      excludePath: 'legendaries.txt',
      json: true,
    });
  });

  it('rejects numbers that are not positive', () => {
    expect(() => parseRunOptions(['--duration', '0'])).toThrow('--duration expects a positive number, got "0"');
    expect(() => parseRunOptions(['--cp-cap', 'lots'])).toThrow('--cp-cap expects a positive number, got "lots"');
    expect(() => parseRunOptions(['--strike-interval'])).toThrow(
      '--strike-interval expects a positive number, got ""',
    );
  });

  it('rejects a path flag without a path', () => {
    expect(() => parseRunOptions(['--legacy'])).toThrow('--legacy expects a file path');
    expect(() => parseRunOptions(['--exclude', '--json'])).toThrow('--exclude expects a file path');
  });

  it('rejects unknown options', () => {
    expect(() => parseRunOptions(['--fast'])).toThrow('Unknown option: --fast');
  });
});
