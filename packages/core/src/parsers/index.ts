export { parseDate, formatDate, formatDisplayDate, addDays } from './date-parser.js';
