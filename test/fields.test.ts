import { describe, expect, it } from 'vitest';
import {
  customField,
  customFieldExact,
  dateRange,
  decodeEntities,
  parsePriority,
  stripHtml,
  toDateOnly,
  toDateTime,
  toDuration,
} from '../src/fields.js';

describe('custom fields', () => {
  const fields = { 'Task Category': 'Copywriter', 'PM Name': ' ', PM: 'Lee Park', Development: 'yes' };

  it('matches by containment, skipping blank values', () => {
    expect(customField(fields, 'category')).toBe('Copywriter');
    expect(customField(fields, 'PM Name', 'Nope')).toBeUndefined();
    expect(customField(fields, 'Nope', 'Category')).toBe('Copywriter');
  });

  it('matches exactly when asked', () => {
    expect(customFieldExact(fields, 'pm')).toBe('Lee Park');
    expect(customFieldExact({ Development: 'yes' }, 'pm')).toBeUndefined();
  });

  it('parses priorities', () => {
    expect(parsePriority('Urgent!')).toBe(1);
    expect(parsePriority('Normal')).toBe(2);
    expect(parsePriority('low')).toBe(3);
    expect(parsePriority('whenever')).toBeUndefined();
    expect(parsePriority(undefined)).toBeUndefined();
  });
});

describe('text', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeEntities('Tom &amp; Jerry &#39;s &#x41; &bogus;')).toBe("Tom & Jerry 's A &bogus;");
  });

  it('strips markup into plain lines', () => {
    expect(stripHtml('<body>Hi<br/>there</body>')).toBe('Hi\nthere');
    expect(stripHtml(undefined)).toBe('');
  });
});

describe('dates and durations', () => {
  it('normalizes dates', () => {
    expect(toDateOnly('2024-03-01T09:15:00.000Z')).toBe('2024-03-01');
    expect(toDateOnly('March 1')).toBeUndefined();
    expect(toDateTime('2024-03-01')).toBe('2024-03-01T00:00:00');
    expect(toDateTime('2024-03-01T09:15')).toBe('2024-03-01T09:15:00');
    expect(toDateTime(null)).toBeUndefined();
  });

  it('formats durations as HH:MM:SS', () => {
    expect(toDuration('2:30')).toBe('02:30:00');
    expect(toDuration('1.5')).toBe('01:30:00');
    expect(toDuration('3h')).toBe('03:00:00');
    expect(toDuration('abc')).toBeUndefined();
  });

  it('finds the earliest and latest date', () => {
    expect(dateRange(['2024-03-08', undefined, '2024-02-10'])).toEqual({ min: '2024-02-10', max: '2024-03-08' });
    expect(dateRange([])).toEqual({ min: undefined, max: undefined });
  });
});
