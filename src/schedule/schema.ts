/**
 * Schedule Template Schema
 *
 * A versioned weekly template of time ranges tagged CONTEXT or DEFERRED.
 * Ranges may not overlap anywhere in the week.
 */

import { z } from 'zod';

export enum WindowKind {
  CONTEXT = 'CONTEXT',
  DEFERRED = 'DEFERRED',
}

export const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'] as const;

export type DayName = typeof DAY_NAMES[number];

export const MINUTES_PER_DAY = 24 * 60;
export const MINUTES_PER_WEEK = 7 * MINUTES_PER_DAY;

const TimeOfDayZ = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:MM (24-hour)');

export const ScheduleRangeZ = z
  .object({
    kind: z.nativeEnum(WindowKind),
    days: z.array(z.enum(DAY_NAMES)).min(1),
    start: TimeOfDayZ,
    end: TimeOfDayZ,
    label: z.string().min(1).optional(),
  })
  .strict()
  .refine(r => r.start !== r.end, { message: 'range must not be empty (start equals end)' });

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * A contiguous span in minutes since Sunday 00:00, end exclusive.
 */
export interface WeekInterval {
  kind: WindowKind;
  rangeIndex: number;
  start: number;
  end: number;
}

/**
 * Parse HH:MM into minutes after midnight.
 */
export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

/**
 * Expand ranges into week intervals. Overnight ranges run into the next day;
 * Saturday night wraps to Sunday morning.
 */
export function expandRanges(ranges: ScheduleRange[]): WeekInterval[] {
  const intervals: WeekInterval[] = [];
  ranges.forEach((range, rangeIndex) => {
    const start = toMinutes(range.start);
    const end = toMinutes(range.end);
    const length = end > start ? end - start : MINUTES_PER_DAY - start + end;
    for (const day of new Set(range.days)) {
      const from = DAY_NAMES.indexOf(day) * MINUTES_PER_DAY + start;
      const to = from + length;
      if (to <= MINUTES_PER_WEEK) {
        intervals.push({ kind: range.kind, rangeIndex, start: from, end: to });
      } else {
        intervals.push({ kind: range.kind, rangeIndex, start: from, end: MINUTES_PER_WEEK });
        intervals.push({ kind: range.kind, rangeIndex, start: 0, end: to - MINUTES_PER_WEEK });
      }
    }
  });
  return intervals.sort((a, b) => a.start - b.start || a.end - b.end);
}

export const ScheduleTemplateZ = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/, 'must be a semantic version'),
    timezone: z.string().min(1).refine(isValidTimezone, { message: 'unknown IANA timezone' }),
    ranges: z.array(ScheduleRangeZ),
  })
  .strict()
  .superRefine((template, ctx) => {
    const intervals = expandRanges(template.ranges);
    for (let i = 1; i < intervals.length; i++) {
      const prev = intervals[i - 1];
      const current = intervals[i];
      if (current.start < prev.end) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ranges', current.rangeIndex],
          message: `range overlaps range ${prev.rangeIndex}`,
        });
        return;
      }
    }
  });

export type ScheduleRange = z.infer<typeof ScheduleRangeZ>;
export type ScheduleTemplate = z.infer<typeof ScheduleTemplateZ>;
