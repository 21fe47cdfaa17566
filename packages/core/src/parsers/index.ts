export { parseDate, formatDisplayDate } from './date-parser.js';
export {
  CommandWord,
  DEADLINE_SEPARATOR,
  EVENT_SEPARATOR,
  splitCommand,
  parseAddTodo,
  parseAddDeadline,
  parseAddEvent,
  parseIndex,
  parseDoneCommand,
  parseDeleteCommand,
  parseFindCommand,
} from './command-parser.js';
export type { SplitCommand } from './command-parser.js';
