import { describe, it, expect } from 'vitest';
import { parsePredictionRequest } from '../services/prediction.validation.js';
import { ValidationError } from '../../../common/errors.js';
import { isCalendarDate } from '../contracts/prediction.types.js';

describe('parsePredictionRequest', () => {
  it('accepts an empty body', () => {
    expect(parsePredictionRequest({})).toEqual({});
    expect(parsePredictionRequest(undefined)).toEqual({});
  });

  it('accepts a complete request', () => {
    const body = { query: 'Will there be smog tomorrow?', date: '2025-01-16', temperature: -12, language: 'ru' };
    expect(parsePredictionRequest(body)).toEqual(body);
  });

  it('drops live enrichment fields sent by the caller', () => {
    expect(parsePredictionRequest({ query: 'hi', liveAqi: 3, live_aqi: 3 })).toEqual({ query: 'hi' });
  });

  it('rejects a query longer than 1000 characters', () => {
    expect(() => parsePredictionRequest({ query: 'x'.repeat(1001) }))
      .toThrow('query: must be at most 1000 characters');
    expect(parsePredictionRequest({ query: 'x'.repeat(1000) }).query).toHaveLength(1000);
  });

  it('rejects a date that is not YYYY-MM-DD', () => {
    expect(() => parsePredictionRequest({ date: '16.01.2025' })).toThrow('date: must be in YYYY-MM-DD format');
  });

  it('rejects a date that does not exist', () => {
    expect(() => parsePredictionRequest({ date: '2025-02-30' })).toThrow('date: must be a valid calendar date');
  });

  it('rejects temperatures outside [-50, 60]', () => {
    expect(() => parsePredictionRequest({ temperature: 999 })).toThrow('temperature: must be between -50 and 60');
    expect(() => parsePredictionRequest({ temperature: -51 })).toThrow(ValidationError);
    expect(parsePredictionRequest({ temperature: 60 }).temperature).toBe(60);
  });

  it('rejects an unsupported language', () => {
    expect(() => parsePredictionRequest({ language: 'de' })).toThrow('language: must be one of ru, en, kk');
  });

  it('rejects a non-object body', () => {
    expect(() => parsePredictionRequest('hello')).toThrow(ValidationError);
  });
});

describe('isCalendarDate', () => {
  it('knows leap years', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2025-02-29')).toBe(false);
  });

  it('rejects out-of-range months', () => {
    expect(isCalendarDate('2025-13-01')).toBe(false);
  });
});
