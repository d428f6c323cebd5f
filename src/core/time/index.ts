export {
  type LocalInstant,
  isIsoDate,
  parseCalendarDate,
  addDays,
  daysBetween,
  weekdayIndex,
  toLocalInstant,
} from './calendar.js';

export {
  type ClockTime,
  parseClockTime,
  formatClockTime,
  withinMinutes,
  isAfter,
  refillIsNear,
  inPeriod,
  type DayPeriod,
  greetingForHour,
} from './window.js';
