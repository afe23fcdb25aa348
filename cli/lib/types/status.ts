/**
 * Change-tracking status types
 */

export interface Artifact {
  id: string;
  outputPath: string;
  status: string;
  missingDeps: string[];
}

/**
 * Snapshot of a worktree's active change.
 * An empty `changeName` means the tool ran and found no active change;
 * a missing Status (null) means the tool could not be consulted.
 */
export interface Status {
  changeName: string;
  isComplete: boolean;
  applyRequires: string[];
  artifacts: Artifact[];
}
