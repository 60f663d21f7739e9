import { isoFromUnixSeconds } from './time';

describe('isoFromUnixSeconds', () => {
  it('formats seconds since epoch as UTC', () => {
    expect(isoFromUnixSeconds(1704067200)).toBe('2024-01-01T00:00:00.000Z');
  });

  it('passes null through', () => {
    expect(isoFromUnixSeconds(null)).toBeNull();
  });

  it('returns null outside the Date range', () => {
    expect(isoFromUnixSeconds(1e13)).toBeNull();
    expect(isoFromUnixSeconds(Number.NaN)).toBeNull();
  });
});
