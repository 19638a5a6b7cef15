/**
 * @fileoverview Tests for bar helpers and interval enumeration.
 */

import { describe, it, expect } from 'vitest';
import { seriesId, isWellFormedBar } from '../src/bars.js';
import type { BarUpdate } from '../src/bars.js';
import { INTERVALS, isInterval, compareIntervals, getIntervalLabel } from '../src/intervals.js';

function bar(overrides: Partial<BarUpdate> = {}): BarUpdate {
  return {
    instrument: 'BTCUSDT',
    interval: '15m',
    openTime: 900_000,
    closeTime: 1_799_999,
    open: 100,
    high: 105,
    low: 99,
    close: 104,
    volume: 10,
    quoteVolume: 1_020,
    tradeCount: 7,
    isFinal: true,
    ...overrides,
  };
}

describe('seriesId', () => {
  it('should join instrument and interval', () => {
    expect(seriesId({ instrument: 'ETHUSDT', interval: '1h' })).toBe('ETHUSDT:1h');
  });
});

describe('isWellFormedBar', () => {
  it('should accept a consistent bar', () => {
    expect(isWellFormedBar(bar())).toBe(true);
  });

  it('should reject a high below the close', () => {
    expect(isWellFormedBar(bar({ high: 103 }))).toBe(false);
  });

  it('should reject a low above the open', () => {
    expect(isWellFormedBar(bar({ low: 101 }))).toBe(false);
  });

  it('should reject non-positive or non-finite prices', () => {
    expect(isWellFormedBar(bar({ low: 0 }))).toBe(false);
    expect(isWellFormedBar(bar({ close: Number.NaN }))).toBe(false);
  });

  it('should reject negative volume', () => {
    expect(isWellFormedBar(bar({ volume: -1 }))).toBe(false);
  });

  it('should reject a close time before the open time', () => {
    expect(isWellFormedBar(bar({ closeTime: 900_000 }))).toBe(false);
  });
});

describe('intervals', () => {
  it('should recognise canonical intervals only', () => {
    expect(isInterval('3m')).toBe(true);
    expect(isInterval('1d')).toBe(true);
    expect(isInterval('1D')).toBe(false);
    expect(isInterval('10m')).toBe(false);
  });

  it('should be ordered by duration', () => {
    expect(INTERVALS[0]).toBe('1m');
    expect(compareIntervals('1m', '5m')).toBeLessThan(0);
    expect(compareIntervals('4h', '30m')).toBeGreaterThan(0);
    expect(compareIntervals('1h', '1h')).toBe(0);
  });

  it('should label intervals', () => {
    expect(getIntervalLabel('15m')).toBe('15 Minutes');
    expect(getIntervalLabel('1d')).toBe('Daily');
  });
});
