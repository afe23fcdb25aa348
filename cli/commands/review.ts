/**
 * Review commands for revloop CLI
 * Print the instruction the agent would receive, without touching any worktree
 */
import type { Command } from 'commander';
import { getReviewClient } from '../managers/engine-manager.js';
import { UsageError } from '../lib/errors.js';
import { parseReviewUnitUrl, type ReviewUnitRef } from '../lib/origin.js';
import { readReviewDocument } from '../lib/review-document.js';
import { renderReview } from '../lib/review-format.js';
import { fail, jsonOut, type JsonOptions } from './helpers.js';

interface GithubOptions extends JsonOptions {
  owner?: string;
  repo?: string;
  number?: string;
}

/**
 * URL wins; otherwise owner and repo are required and number defaults to latest
 */
export function resolveReviewTarget(url: string | undefined, options: GithubOptions): ReviewUnitRef {
  if (url) return parseReviewUnitUrl(url);

  if (!options.owner || !options.repo) {
    throw new UsageError('Provide a pull request URL or --owner and --repo');
  }
  const number = options.number ? parseInt(options.number, 10) : 0;
  if (isNaN(number) || number < 0) {
    throw new UsageError(`Invalid pull request number: ${options.number}`);
  }
  return { owner: options.owner, repo: options.repo, number };
}

/**
 * Register review commands
 */
export function registerReviewCommands(program: Command): void {
  const review = program.command('review').description('Formatted reviews');

  // review:github
  review.command('github [url]')
    .description('Formatted review of a pull request (latest open one when no number)')
    .option('-o, --owner <owner>', 'Repository owner')
    .option('-r, --repo <repo>', 'Repository name')
    .option('-n, --number <number>', 'Pull request number')
    .option('--json', 'JSON output')
    .action(async (url: string | undefined, options: GithubOptions) => {
      try {
        const target = resolveReviewTarget(url, options);
        const formatted = await getReviewClient().review(target.owner, target.repo, target.number);
        if (options.json) {
          jsonOut(formatted);
          return;
        }
        process.stdout.write(renderReview(formatted));
      } catch (error) {
        fail(error, options.json);
      }
    });

  // review:file
  review.command('file <path>')
    .description('Formatted review of a local review document (JSON)')
    .option('--json', 'JSON output')
    .action((filePath: string, options: JsonOptions) => {
      try {
        const formatted = readReviewDocument(filePath);
        if (options.json) {
          jsonOut(formatted);
          return;
        }
        process.stdout.write(renderReview(formatted));
      } catch (error) {
        fail(error, options.json);
      }
    });
}
