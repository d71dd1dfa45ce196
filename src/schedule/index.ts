/**
 * Scheduler Gate Module
 */

export { SchedulerGate, type ScheduleVerdict } from './schedule-gate';
export { parseSchedule, loadSchedule } from './loader';
export {
  WindowKind,
  DAY_NAMES,
  ScheduleTemplateZ,
  expandRanges,
  toMinutes,
  type DayName,
  type ScheduleRange,
  type ScheduleTemplate,
  type WeekInterval,
} from './schema';
