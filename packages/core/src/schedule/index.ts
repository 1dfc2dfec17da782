export { parseSchedule, parseDate, isIsoDate, SAMPLE_SCHEDULE } from './parser.js'
export { formatSchedule } from './format.js'
export { ParseError } from './errors.js'
