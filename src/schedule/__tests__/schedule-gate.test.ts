/**
 * Tests for SchedulerGate and schedule validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigurationError } from '../../errors';
import { SchedulerGate } from '../schedule-gate';
import { loadSchedule, parseSchedule } from '../loader';
import { WindowKind, expandRanges } from '../schema';
import {
  MONDAY_AFTERNOON,
  MONDAY_CONTEXT,
  SATURDAY_LATE,
  scheduleTemplate,
} from '../../__tests__/fixtures';

describe('SchedulerGate', () => {
  const gate = new SchedulerGate(parseSchedule(scheduleTemplate()));

  it('should report a Context Block inside a CONTEXT range', () => {
    expect(gate.isContextBlock(MONDAY_CONTEXT)).toBe(true);
    expect(gate.isDeferredWindow(MONDAY_CONTEXT)).toBe(false);
    expect(gate.allowsContextWork(MONDAY_CONTEXT)).toBe(true);
  });

  it('should treat range ends as exclusive', () => {
    expect(gate.isContextBlock(new Date('2024-06-03T09:00:00Z'))).toBe(true);
    expect(gate.isContextBlock(new Date('2024-06-03T11:59:00Z'))).toBe(true);
    expect(gate.isContextBlock(new Date('2024-06-03T12:00:00Z'))).toBe(false);
  });

  it('should report nothing outside every range', () => {
    const verdict = gate.verdict(MONDAY_AFTERNOON);
    expect(verdict).toEqual({
      at: '2024-06-03T14:00:00.000Z',
      isContextBlock: false,
      isDeferredWindow: false,
      range: undefined,
    });
    expect(gate.allowsContextWork(MONDAY_AFTERNOON)).toBe(false);
  });

  it('should follow an overnight range past midnight and across the week boundary', () => {
    expect(gate.isDeferredWindow(SATURDAY_LATE)).toBe(true);
    expect(gate.isDeferredWindow(new Date('2024-06-09T01:30:00Z'))).toBe(true);
    expect(gate.isDeferredWindow(new Date('2024-06-09T02:00:00Z'))).toBe(false);
    expect(gate.verdict(SATURDAY_LATE).range?.kind).toBe(WindowKind.DEFERRED);
  });

  it('should not open on weekends for weekday ranges', () => {
    expect(gate.isContextBlock(new Date('2024-06-08T10:00:00Z'))).toBe(false);
  });

  it('should evaluate in the template timezone', () => {
    const tokyo = new SchedulerGate(parseSchedule(scheduleTemplate({ timezone: 'Asia/Tokyo' })));
    // 01:00Z Monday is 10:00 Monday in Tokyo
    expect(tokyo.isContextBlock(new Date('2024-06-03T01:00:00Z'))).toBe(true);
    expect(tokyo.isContextBlock(MONDAY_CONTEXT)).toBe(false);
    expect(tokyo.calendarDay(new Date('2024-06-03T20:00:00Z'))).toBe('2024-06-04');
  });

  it('should give the calendar day in the template timezone', () => {
    expect(gate.calendarDay(MONDAY_CONTEXT)).toBe('2024-06-03');
  });

  it('should give identical verdicts for identical instants', () => {
    expect(gate.verdict(MONDAY_CONTEXT)).toEqual(gate.verdict(new Date(MONDAY_CONTEXT.getTime())));
  });
});

describe('schedule validation', () => {
  it('should split an overnight range across two days', () => {
    const intervals = expandRanges([
      { kind: WindowKind.DEFERRED, days: ['mon'], start: '23:00', end: '01:00' },
    ]);
    expect(intervals).toEqual([
      { kind: WindowKind.DEFERRED, rangeIndex: 0, start: 1440 + 1380, end: 1440 + 1500 },
    ]);
  });

  it('should reject overlapping ranges of any kind', () => {
    const template = scheduleTemplate({
      ranges: [
        { kind: WindowKind.CONTEXT, days: ['mon'], start: '09:00', end: '12:00' },
        { kind: WindowKind.DEFERRED, days: ['mon'], start: '11:00', end: '13:00' },
      ],
    });
    try {
      parseSchedule(template);
      expect.fail('expected ConfigurationError');
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (e instanceof ConfigurationError) {
        expect(e.issues).toEqual([{ path: 'ranges.1', message: 'range overlaps range 0' }]);
      }
    }
  });

  it('should reject an overnight range running into the next day\'s range', () => {
    const template = scheduleTemplate({
      ranges: [
        { kind: WindowKind.DEFERRED, days: ['sun'], start: '22:00', end: '09:30' },
        { kind: WindowKind.CONTEXT, days: ['mon'], start: '09:00', end: '12:00' },
      ],
    });
    expect(() => parseSchedule(template)).toThrow(ConfigurationError);
  });

  it('should reject empty ranges, bad times and unknown timezones', () => {
    const base = scheduleTemplate();
    expect(() => parseSchedule({ ...base, ranges: [{ kind: 'CONTEXT', days: ['mon'], start: '09:00', end: '09:00' }] }))
      .toThrow(ConfigurationError);
    expect(() => parseSchedule({ ...base, ranges: [{ kind: 'CONTEXT', days: ['mon'], start: '9:00', end: '10:00' }] }))
      .toThrow(ConfigurationError);
    expect(() => parseSchedule({ ...base, timezone: 'Mars/Olympus' })).toThrow(ConfigurationError);
    expect(() => parseSchedule({ ...base, ranges: [{ kind: 'LUNCH', days: ['mon'], start: '12:00', end: '13:00' }] }))
      .toThrow(ConfigurationError);
  });

  it('should accept touching ranges', () => {
    const template = scheduleTemplate({
      ranges: [
        { kind: WindowKind.CONTEXT, days: ['mon'], start: '09:00', end: '12:00' },
        { kind: WindowKind.DEFERRED, days: ['mon'], start: '12:00', end: '13:00' },
      ],
    });
    expect(parseSchedule(template).ranges).toHaveLength(2);
  });
});

describe('loadSchedule', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'plant-schedule-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('should load a YAML template', () => {
    const path = join(testDir, 'schedule.yaml');
    writeFileSync(path, [
      'version: 2.1.0',
      'timezone: UTC',
      'ranges:',
      '  - kind: CONTEXT',
      '    days: [tue]',
      '    start: "14:00"',
      '    end: "16:00"',
    ].join('\n'));

    const gate = new SchedulerGate(loadSchedule(path));
    expect(gate.version).toBe('2.1.0');
    expect(gate.isContextBlock(new Date('2024-06-04T15:00:00Z'))).toBe(true);
  });
});
