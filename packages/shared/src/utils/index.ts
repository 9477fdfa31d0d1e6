export { generateUlid } from './ids';
export {
  addDays,
  diffDays,
  eachDay,
  formatMonth,
  isIsoDate,
  isoWeekday,
  monthDays,
  monthEnd,
  monthStart,
  parseMonth,
  sameDayLastYear,
  shiftMonth,
  startOfIsoWeek,
} from './calendar';
export type { IsoDate } from './calendar';
export {
  businessDaysAgo,
  createZonedFormatter,
  floorToZonedHour,
  nowUTC,
  parseZonedDateTime,
  toBusinessDate,
} from './date';
export type { ZonedDateParts, ZonedFormatter } from './date';
