/**
 * Secure deletion types
 */

export type TargetKind = 'missing' | 'symlink' | 'file' | 'directory' | 'other';

export type WipeOperation = 'stat' | 'chmod' | 'overwrite' | 'unlink' | 'readdir' | 'rmdir';

export interface DestroyFailure {
  path: string;
  operation: WipeOperation;
  /** errno code, e.g. EACCES, EBUSY, ENAMETOOLONG */
  code?: string;
  message: string;
}

/**
 * Result of destroying one path (and everything below it).
 */
export interface DestroyReport {
  path: string;
  kind: TargetKind;
  /** True when nothing is left at `path` afterwards */
  removed: boolean;
  /** Files, links, directories and other entries removed, the root included */
  entriesRemoved: number;
  filesOverwritten: number;
  /** Sum over every pass of every file */
  bytesOverwritten: number;
  failures: DestroyFailure[];
}

export type WipeEvent =
  | { type: 'pass:completed'; path: string; pass: number; passes: number; bytes: number }
  | { type: 'file:removed'; path: string }
  | { type: 'link:removed'; path: string }
  | { type: 'other:removed'; path: string }
  | { type: 'dir:removed'; path: string }
  | { type: 'entry:failed'; failure: DestroyFailure };

export interface CleanupTarget {
  /** Normalized absolute path; may not exist */
  path: string;
  passes: number;
}
