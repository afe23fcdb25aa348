/**
 * Review formatting
 *
 * Turns a FormattedReview into the single instruction handed to the
 * execution agent. Pure functions only.
 */
import type { FormattedComment, FormattedReview } from './types/review.js';

const HEADER = 'I reviewed your code and have the following comments. Please address them.';
const LEGEND = 'Comment types: ISSUE (problems to fix), SUGGESTION (improvements), NOTE (observations), PRAISE (positive feedback)';

/**
 * File path ascending, file-level before line comments,
 * lines ascending, original index breaks ties
 */
export function compareComments(a: FormattedComment, b: FormattedComment): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line === 0 && b.line !== 0) return -1;
  if (a.line !== 0 && b.line === 0) return 1;
  if (a.line !== b.line) return a.line - b.line;
  return a.index - b.index;
}

export function commentLocation(comment: FormattedComment): string {
  if (comment.line === 0) return `\`${comment.file}\``;
  if (comment.isOldSide) return `\`${comment.file}:~${comment.line}\``;
  return `\`${comment.file}:${comment.line}\``;
}

export function commentTypeTag(comment: FormattedComment): string {
  return `**[${comment.type.toUpperCase()}]**`;
}

export function sortComments(comments: readonly FormattedComment[]): FormattedComment[] {
  return [...comments].sort(compareComments);
}

export function renderReview(review: FormattedReview): string {
  const lines = [
    `${HEADER}\n\n`,
    `Reviewing commit: ${review.commitSha.slice(0, 7)}\n\n`,
    `${LEGEND}\n\n`
  ];

  sortComments(review.comments).forEach((comment, i) => {
    lines.push(`${i + 1}. ${commentTypeTag(comment)} ${commentLocation(comment)}:\n${comment.content}\n\n`);
  });

  return lines.join('');
}
