export { Money } from "./Money";
export { categoryKey, isSameCategory, uniqueCategories } from "./Category";
export {
  type CalendarDateParts,
  parseCalendarDate,
  formatCalendarDate,
  isLeapYear,
  daysInMonth,
  today,
} from "./CalendarDate";
