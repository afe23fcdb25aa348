/**
 * Review-unit (pull request) and formatted review types
 */

export interface ReviewUnit {
  title: string;
  number: number;
  createdAt: Date;
  htmlUrl: string;
  headSha: string;
  headRef: string;
  /** Last push to the head repository, null when the forge omits it */
  headPushedAt: Date | null;
}

export interface ReviewComment {
  id: number;
  body: string;
  createdAt: Date;
  path: string;
  /** 0 when the comment is not attached to a line */
  line: number;
  commitId: string;
  side: string;
}

export interface FormattedComment {
  type: string;
  index: number;
  content: string;
  file: string;
  /** 0 marks a file-level comment */
  line: number;
  isOldSide: boolean;
}

export interface FormattedReview {
  commitSha: string;
  comments: FormattedComment[];
}
