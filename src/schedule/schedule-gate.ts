/**
 * Scheduler Gate
 *
 * Answers whether a timestamp falls in a Context Block or a Deferred Window
 * of the weekly template. A pure function of (template, timestamp).
 */

import {
  DAY_NAMES,
  MINUTES_PER_DAY,
  WindowKind,
  expandRanges,
  type ScheduleRange,
  type ScheduleTemplate,
  type WeekInterval,
} from './schema';

/**
 * Legality verdict for one instant.
 */
export interface ScheduleVerdict {
  /** ISO 8601 instant the verdict was computed for */
  at: string;
  isContextBlock: boolean;
  isDeferredWindow: boolean;
  /** The template range containing the instant, if any */
  range?: ScheduleRange;
}

interface ZonedTime {
  dayOfWeek: number;
  minutes: number;
  year: string;
  month: string;
  day: string;
}

/**
 * Wall-clock fields of an instant in a timezone.
 */
function getZonedTime(date: Date, formatter: Intl.DateTimeFormat): ZonedTime {
  const parts = formatter.formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find(p => p.type === type)?.value ?? '';

  const weekday = get('weekday').toLowerCase().slice(0, 3);
  const dayOfWeek = DAY_NAMES.findIndex(d => d === weekday);

  return {
    dayOfWeek: dayOfWeek === -1 ? 0 : dayOfWeek,
    minutes: parseInt(get('hour') || '0', 10) * 60 + parseInt(get('minute') || '0', 10),
    year: get('year'),
    month: get('month'),
    day: get('day'),
  };
}

/**
 * Evaluates a validated schedule template.
 *
 * @example
 * ```typescript
 * const gate = new SchedulerGate(loadSchedule('./config/schedule.yaml'));
 * if (gate.isContextBlock(new Date())) {
 *   // CTX work may be proposed
 * }
 * ```
 */
export class SchedulerGate {
  private readonly template: ScheduleTemplate;
  private readonly intervals: WeekInterval[];
  private readonly formatter: Intl.DateTimeFormat;

  constructor(template: ScheduleTemplate) {
    this.template = structuredClone(template);
    this.intervals = expandRanges(this.template.ranges);
    this.formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: this.template.timezone,
      hourCycle: 'h23',
      weekday: 'short',
      hour: '2-digit',
      minute: '2-digit',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
  }

  get version(): string {
    return this.template.version;
  }

  get timezone(): string {
    return this.template.timezone;
  }

  isContextBlock(at: Date): boolean {
    return this.findInterval(at)?.kind === WindowKind.CONTEXT;
  }

  isDeferredWindow(at: Date): boolean {
    return this.findInterval(at)?.kind === WindowKind.DEFERRED;
  }

  /**
   * Both flags plus the matching range.
   */
  verdict(at: Date): ScheduleVerdict {
    const interval = this.findInterval(at);
    return {
      at: at.toISOString(),
      isContextBlock: interval?.kind === WindowKind.CONTEXT,
      isDeferredWindow: interval?.kind === WindowKind.DEFERRED,
      range: interval ? this.template.ranges[interval.rangeIndex] : undefined,
    };
  }

  /**
   * Whether CTX work is legal at an instant.
   */
  allowsContextWork(at: Date): boolean {
    return this.findInterval(at) !== undefined;
  }

  /**
   * Calendar date (YYYY-MM-DD) of an instant in the template timezone.
   */
  calendarDay(at: Date): string {
    const zoned = getZonedTime(at, this.formatter);
    return `${zoned.year}-${zoned.month}-${zoned.day}`;
  }

  getTemplate(): ScheduleTemplate {
    return structuredClone(this.template);
  }

  private findInterval(at: Date): WeekInterval | undefined {
    const zoned = getZonedTime(at, this.formatter);
    const weekMinute = zoned.dayOfWeek * MINUTES_PER_DAY + zoned.minutes;
    return this.intervals.find(i => weekMinute >= i.start && weekMinute < i.end);
  }
}
