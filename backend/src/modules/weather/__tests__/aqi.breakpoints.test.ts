import { describe, it, expect } from 'vitest';
import { estimateAqi, pm25ToAqi } from '../services/aqi.breakpoints.js';

describe('pm25ToAqi', () => {
  it.each([
    [0, 0],
    [9.0, 50],
    [9.1, 51],
    [12.0, 56],
    [35.4, 100],
    [35.5, 101],
    [55.4, 150],
    [55.5, 151],
    [125.4, 200],
    [225.4, 300],
    [325.4, 400],
    [500.4, 500],
  ])('PM2.5 %d µg/m³ → AQI %d', (pm25, aqi) => {
    expect(pm25ToAqi(pm25)).toBe(aqi);
  });

  it('caps concentrations above the table at 500', () => {
    expect(pm25ToAqi(600)).toBe(500);
  });

  it('treats negative or non-finite input as clean air', () => {
    expect(pm25ToAqi(-3)).toBe(0);
    expect(pm25ToAqi(Number.NaN)).toBe(0);
  });

  it('puts values between two bands at the upper band\'s lowest index', () => {
    expect(pm25ToAqi(9.05)).toBe(51);
    expect(pm25ToAqi(35.45)).toBe(101);
    expect(pm25ToAqi(125.49)).toBe(201);
  });

  it('is monotonic over the table', () => {
    let previous = -1;
    for (let c = 0; c <= 520; c += 0.7) {
      const aqi = pm25ToAqi(c);
      expect(aqi).toBeGreaterThanOrEqual(previous);
      previous = aqi;
    }
  });
});

describe('estimateAqi', () => {
  it('expects heavy smog in a hard winter frost', () => {
    expect(estimateAqi(-15, 1)).toBe(200);
  });

  it('expects smog on a freezing winter day', () => {
    expect(estimateAqi(-5, 12)).toBe(160);
  });

  it('expects clean air when it is hot', () => {
    expect(estimateAqi(30, 7)).toBe(45);
  });

  it('falls back to a moderate value otherwise', () => {
    expect(estimateAqi(5, 1)).toBe(80);
    expect(estimateAqi(-5, 4)).toBe(80);
  });
});
