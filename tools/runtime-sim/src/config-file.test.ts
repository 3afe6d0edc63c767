import { describe, expect, it } from 'vitest';

import { parseConfigOverrides } from './config-file.js';

describe('parseConfigOverrides', () => {
  it('accepts partial overrides', () => {
    expect(
      parseConfigOverrides({
        time: { startYear: 1900, maxSpeed: 32 },
        events: { pauseTimeWhileActive: true },
      }),
    ).toEqual({
      time: { startYear: 1900, maxSpeed: 32 },
      events: { pauseTimeWhileActive: true },
    });
  });

  it('rejects unknown keys and invalid values with their paths', () => {
    expect(() => parseConfigOverrides({ time: { bogus: 1 } })).toThrow(/^Invalid engine config:\ntime: /);
    expect(() => parseConfigOverrides({ timeSkip: { secondsPerYear: -1 } })).toThrow(
      /timeSkip\.secondsPerYear: /,
    );
    expect(() => parseConfigOverrides('fast')).toThrow(/^Invalid engine config:\n\(root\): /);
  });
});
