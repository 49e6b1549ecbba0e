import { describe, it, expect } from 'vitest';
import {
  formatStarted,
  hoursToSeconds,
  toWorklogPayload,
} from '../../../src/domain/entities/WorklogPayload.js';

describe('hoursToSeconds', () => {
  it.each([
    [2.5, 9000],
    [1, 3600],
    [0.1, 360],
    [24, 86400],
    [0.01, 36],
    [1.333, 4799],
  ])('should convert %s hours to %s seconds', (hours, seconds) => {
    expect(hoursToSeconds(hours)).toBe(seconds);
  });

  it('should round half up', () => {
    // 0.0001h = 0.36s, 0.00015h = 0.54s
    expect(hoursToSeconds(0.0001)).toBe(0);
    expect(hoursToSeconds(0.00015)).toBe(1);
    expect(hoursToSeconds(1.0001)).toBe(3600);
    expect(hoursToSeconds(1.00015)).toBe(3601);
  });

  it('should round up any fraction under ceil rounding', () => {
    expect(hoursToSeconds(0.0001, 'ceil')).toBe(1);
    expect(hoursToSeconds(0.1, 'ceil')).toBe(360);
    expect(hoursToSeconds(2.5, 'ceil')).toBe(9000);
  });
});

describe('formatStarted', () => {
  it('should place the worklog at 09:00 UTC in Jira format', () => {
    expect(formatStarted('2024-01-15')).toBe('2024-01-15T09:00:00.000+0000');
  });
});

describe('toWorklogPayload', () => {
  it('should build the Jira worklog body', () => {
    const payload = toWorklogPayload({
      row: 1,
      date: '2024-01-15',
      ticket: 'PROJ-123',
      description: 'Fixed OAuth bug',
      hours: 2.5,
    });

    expect(payload).toEqual({
      started: '2024-01-15T09:00:00.000+0000',
      timeSpentSeconds: 9000,
      comment: {
        type: 'doc',
        version: 1,
        content: [
          {
            type: 'paragraph',
            content: [{ type: 'text', text: 'Fixed OAuth bug' }],
          },
        ],
      },
    });
  });

  it('should honour the rounding mode', () => {
    const entry = { row: 1, date: '2024-01-15', ticket: 'PROJ-1', description: 'x', hours: 0.0001 };

    expect(toWorklogPayload(entry).timeSpentSeconds).toBe(0);
    expect(toWorklogPayload(entry, 'ceil').timeSpentSeconds).toBe(1);
  });
});
