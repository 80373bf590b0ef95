import { describe, expect, it } from 'vitest';
import { loadConfig, parseDays } from './index';

describe('loadConfig', () => {
  it('defaults to a 30 day human-readable report in us-east-1', () => {
    expect(loadConfig({}, {})).toEqual({
      mode: 'human',
      days: 30,
      region: 'us-east-1',
      color: true,
    });
  });

  it('switches to json and reads the region from the environment', () => {
    const config = loadConfig(
      { json: true, days: 7, color: false },
      { COST_EXPLORER_REGION: 'eu-west-1' }
    );

    expect(config).toEqual({
      mode: 'json',
      days: 7,
      region: 'eu-west-1',
      color: false,
    });
  });

  it('prefers the region option over the environment', () => {
    const config = loadConfig({ region: 'ap-northeast-1' }, { COST_EXPLORER_REGION: 'eu-west-1' });

    expect(config.region).toBe('ap-northeast-1');
  });

  it('rejects a non-positive number of days', () => {
    expect(() => loadConfig({ days: 0 }, {})).toThrow();
  });
});

describe('parseDays', () => {
  it('accepts a positive integer', () => {
    expect(parseDays('14')).toBe(14);
  });

  it.each(['0', '-3', '1.5', 'abc'])('rejects %s', (value) => {
    expect(() => parseDays(value)).toThrow();
  });
});
