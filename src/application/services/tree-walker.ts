import type { FileSystemPort } from '../ports/file-system.port';
import { DirectoryLister } from './directory-lister';
import type {
  DirectoryFileMap,
  DirectoryListing,
  SkippedDirectory,
  WalkReport,
} from '../../domain/directory-listing';
import { DirectoryListError } from '../../domain/errors';
import { toPredicate, type PathFilter } from '../../domain/path-filter';
import { UNREADABLE_POLICY, type UnreadablePolicy } from '../../domain/unreadable-policy';
import { getLogger } from '../../utils/get-logger';

export type DirectoryVisit = {
  directory: string;
  accepted: boolean;
  /** Files recorded for the directory; empty when it was rejected. */
  files: readonly string[];
  /** Work stack after this directory's subdirectories were pushed, top last. */
  pending: readonly string[];
};

export type WalkOptions = {
  /** Absent: every file of an accepted directory is kept. */
  fileFilter?: PathFilter;
  /** Absent: every directory is accepted. Rejected directories are still descended into. */
  directoryFilter?: PathFilter;
  onUnreadable?: UnreadablePolicy;
  /** Skip a directory whose real path is one of its own ancestors' (symbolic-link cycles). */
  detectCycles?: boolean;
  onVisit?: (visit: DirectoryVisit) => void;
};

type StackFrame = {
  directory: string;
  parent: StackFrame | null;
  /** Filled in when the frame is popped with cycle detection on. */
  realPath: string | null;
};

const logger = getLogger('tree-walker');

export class TreeWalker {
  private readonly lister: DirectoryLister;

  public constructor(private readonly fileSystem: FileSystemPort) {
    this.lister = new DirectoryLister(fileSystem);
  }

  public walk(root: string, options: WalkOptions = {}): DirectoryFileMap {
    return this.scan(root, options).files;
  }

  /**
   * Depth-first walk driven by an explicit stack, so depth is bounded by memory
   * rather than the call stack. Filters decide what is recorded, never what is
   * traversed. Filter exceptions propagate to the caller.
   */
  public scan(root: string, options: WalkOptions = {}): WalkReport {
    const acceptsFile = options.fileFilter ? toPredicate(options.fileFilter) : null;
    const acceptsDirectory = options.directoryFilter ? toPredicate(options.directoryFilter) : null;
    const onUnreadable = options.onUnreadable ?? UNREADABLE_POLICY.SKIP;
    const detectCycles = options.detectCycles ?? true;

    const files: DirectoryFileMap = new Map();
    const skipped: SkippedDirectory[] = [];
    const stack: StackFrame[] = [
      { directory: this.fileSystem.resolvePath(root), parent: null, realPath: null },
    ];
    let visitedCount = 0;

    while (stack.length > 0) {
      const frame = stack.pop();
      if (frame === undefined) {
        break;
      }
      const { directory } = frame;

      if (detectCycles) {
        frame.realPath = this.identify(directory);
        const ancestor = findAncestorWithRealPath(frame.parent, frame.realPath);
        if (ancestor) {
          logger.debug(
            { directory, realPath: frame.realPath, ancestor: ancestor.directory },
            'Skipping directory that loops back to an ancestor',
          );
          continue;
        }
      }

      visitedCount += 1;
      const entries = this.listOrSkip(directory, onUnreadable, skipped);
      if (!entries) {
        continue;
      }

      const accepted = acceptsDirectory ? acceptsDirectory(directory) : true;
      let retained: string[] = [];
      if (accepted) {
        retained = acceptsFile
          ? entries.files.filter((file) => acceptsFile(file))
          : entries.files;
        files.set(directory, retained);
      }

      for (const subdirectory of entries.directories) {
        stack.push({ directory: subdirectory, parent: frame, realPath: null });
      }

      logger.debug(
        { directory, accepted, files: retained.length, pending: stack.length },
        'Visited directory',
      );
      if (options.onVisit) {
        options.onVisit({
          directory,
          accepted,
          files: retained,
          pending: stack.map((pending) => pending.directory),
        });
      }
    }

    logger.info(
      `Walk finished: root=${root}, visited=${visitedCount}, recorded=${files.size}, skipped=${skipped.length}`,
    );

    return { files, skipped, visitedCount };
  }

  private listOrSkip(
    directory: string,
    onUnreadable: UnreadablePolicy,
    skipped: SkippedDirectory[],
  ): DirectoryListing | null {
    try {
      return this.lister.list(directory);
    } catch (error) {
      if (!(error instanceof DirectoryListError) || onUnreadable === UNREADABLE_POLICY.ABORT) {
        throw error;
      }
      skipped.push({ path: error.path, code: error.code, reason: error.message });
      logger.warn({ path: error.path, code: error.code }, 'Skipped unreadable directory');
      return null;
    }
  }

  private identify(directory: string): string {
    try {
      return this.fileSystem.realPath(directory);
    } catch {
      // unresolvable: the listing step reports the failure
      return directory;
    }
  }
}

const findAncestorWithRealPath = (
  frame: StackFrame | null,
  realPath: string,
): StackFrame | null => {
  let current = frame;
  while (current) {
    if (current.realPath === realPath) {
      return current;
    }
    current = current.parent;
  }
  return null;
};
