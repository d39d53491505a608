import type { Issue } from '../services/github';
import { isJsonObject } from '../types';
import {
  ISSUE_LOGIN_WIDTH,
  ISSUE_NUMBER_WIDTH,
  ISSUE_TITLE_WIDTH,
} from '../config/constants';

/**
 * Truncates a string to a maximum length, ending it with an ellipsis when
 * it was cut
 *
 * @param str - String to truncate
 * @param max - Maximum length, ellipsis included (defaults to 80)
 * @example
 * ```typescript
 * truncate('This is a very long string that needs to be truncated', 20);
 * // → 'This is a very long…'
 * ```
 */
export function truncate(str: string, max = 80): string {
  if (str.length <= max) return str;
  if (max <= 1) return '…';
  return str.slice(0, max - 1) + '…';
}

/**
 * Fixed-width column: truncated to `width`, then padded with spaces
 */
export function column(str: string, width: number): string {
  return truncate(str, width).padEnd(width);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * One listing line for an issue: number, title, author login and last
 * update time
 *
 * @example
 * ```typescript
 * formatIssueLine(issue);
 * // → '42     Fix the flaky build             octocat     [2024-01-01T00:00:00Z]'
 * ```
 */
export function formatIssueLine(issue: Issue): string {
  const { data } = issue;
  const user = data.user;
  const login = isJsonObject(user) ? text(user.login) : '';
  return [
    text(data.number).padEnd(ISSUE_NUMBER_WIDTH),
    column(text(data.title), ISSUE_TITLE_WIDTH),
    column(login, ISSUE_LOGIN_WIDTH),
    `[${text(data.updated_at)}]`,
  ].join('  ');
}
