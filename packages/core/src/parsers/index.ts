export { parseDate, isIsoDate } from './date-parser.js';
