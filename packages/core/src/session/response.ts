import type { Outcome } from './dispatch.js';
import { formatNumbered, pluralizeTasks, toDisplayString } from '../format/task-format.js';

const INDENT = '  ';

export const EXIT_MESSAGE = 'Bye. Hope to see you again soon!';

/** Plain-text lines for an outcome. Both front ends print exactly these. */
export function renderOutcome(outcome: Outcome): string[] {
  switch (outcome.type) {
    case 'listed':
      if (outcome.tasks.length === 0) return ['Your task list is empty.'];
      return ['Here are the tasks in your list:', ...formatNumbered(outcome.tasks)];
    case 'added':
      return [
        "Got it. I've added this task:",
        INDENT + toDisplayString(outcome.task),
        `Now you have ${pluralizeTasks(outcome.size)} in the list.`,
      ];
    case 'marked':
      return [
        outcome.changed ? "Nice! I've marked this task as done:" : 'This task is already done:',
        INDENT + toDisplayString(outcome.task),
      ];
    case 'deleted':
      return [
        "Noted. I've removed this task:",
        INDENT + toDisplayString(outcome.task),
        `Now you have ${pluralizeTasks(outcome.size)} in the list.`,
      ];
    case 'found':
      if (outcome.tasks.length === 0) return ['No matching tasks found.'];
      return ['Here are the matching tasks in your list:', ...formatNumbered(outcome.tasks)];
    case 'exit':
      return [EXIT_MESSAGE];
    case 'failed':
      return [outcome.error.message];
  }
}

export function renderResponse(outcome: Outcome): string {
  return renderOutcome(outcome).join('\n');
}
