/**
 * Local review documents
 *
 * Reads a review session exported as JSON (file-level and per-line comments
 * keyed by file path) into a FormattedReview.
 */
import fs from 'fs';
import { z } from 'zod';
import { decodeWith } from './exec.js';
import { MalformedOutputError } from './errors.js';
import type { FormattedComment, FormattedReview } from './types/review.js';

const optionalText = z.string().nullish().transform(value => value ?? '');

const commentSchema = z.object({
  id: optionalText,
  content: optionalText,
  comment_type: optionalText,
  created_at: z.string().nullish(),
  line_context: z.string().nullish(),
  side: z.string().nullish()
});

const fileSchema = z.object({
  path: z.string().nullish(),
  reviewed: z.boolean().nullish(),
  status: z.string().nullish(),
  file_comments: z.array(commentSchema).nullish().transform(list => list ?? []),
  line_comments: z.record(z.string(), z.array(commentSchema)).nullish().transform(map => map ?? {})
});

const documentSchema = z.object({
  id: z.string().min(1, 'missing required field: id'),
  version: z.string().min(1, 'missing required field: version'),
  repo_path: z.string().nullish(),
  base_commit: z.string().nullish().transform(value => value ?? ''),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  files: z.record(z.string(), fileSchema),
  session_notes: z.string().nullish()
});

export type ReviewDocument = z.infer<typeof documentSchema>;

function lineNumber(key: string): number {
  const line = parseInt(key, 10);
  return Number.isInteger(line) && line > 0 ? line : 0;
}

/**
 * Flatten a document into formatted comments, numbering them in reading order
 */
export function documentComments(document: ReviewDocument): FormattedComment[] {
  const comments: FormattedComment[] = [];
  let index = 0;

  for (const [file, info] of Object.entries(document.files)) {
    for (const comment of info.file_comments) {
      comments.push({ file, line: 0, type: comment.comment_type, content: comment.content, isOldSide: false, index: index++ });
    }
    for (const [lineKey, lineComments] of Object.entries(info.line_comments)) {
      // Keys that are not line numbers fall back to file level
      const line = lineNumber(lineKey);
      for (const comment of lineComments) {
        comments.push({
          file,
          line,
          type: comment.comment_type,
          content: comment.content,
          isOldSide: comment.side === 'old',
          index: index++
        });
      }
    }
  }

  return comments;
}

export function parseReviewDocument(json: string): FormattedReview {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new MalformedOutputError('Review document is not valid JSON', { cause: error });
  }
  const document = decodeWith(documentSchema, value, 'review document');
  return { commitSha: document.base_commit, comments: documentComments(document) };
}

export function readReviewDocument(filePath: string): FormattedReview {
  return parseReviewDocument(fs.readFileSync(filePath, 'utf8'));
}
