import { describe, it, expect } from 'vitest';
import { spreadConfigSchema } from '../../src/config.js';
import { FixedSpreadModel, SessionSpreadModel } from '../../src/sim/spread-model.js';
import { BASE_TS, HOUR } from '../helpers/fixtures.js';

const at = (hour: number) => BASE_TS + hour * HOUR;

describe('SessionSpreadModel', () => {
  const model = new SessionSpreadModel();

  it('uses the overlap spread when London and New York are both open', () => {
    expect(model.getSpread(at(13))).toBe(0.2);
  });

  it('takes the tightest of the active sessions', () => {
    // asian (0.5) and london (0.3)
    expect(model.getSpread(at(7))).toBe(0.3);
  });

  it('charges the asian spread after midnight', () => {
    expect(model.getSpread(at(3))).toBe(0.5);
  });

  it('falls back to the default when no session is active', () => {
    expect(model.getSpread(at(22))).toBe(0.5);
  });

  it('uses the new_york spread after London closes', () => {
    expect(model.getSpread(at(17))).toBe(0.3);
  });

  it('is named for persistence', () => {
    expect(model.name).toBe('session_aware');
  });

  it('uses the configured default for sessions missing from the spread table', () => {
    const custom = new SessionSpreadModel(
      spreadConfigSchema.parse({
        sessions: { tokyo: [0, 6] },
        sessionSpreads: { london: 0.3 },
        defaultSpread: 1.25,
      })
    );
    expect(custom.getSpread(at(2))).toBe(1.25);
    expect(custom.getSpread(at(10))).toBe(1.25);
  });
});

describe('FixedSpreadModel', () => {
  it('returns the same spread at any time', () => {
    const model = new FixedSpreadModel(0.4);
    expect(model.getSpread(at(3))).toBe(0.4);
    expect(model.getSpread(at(13))).toBe(0.4);
  });
});
