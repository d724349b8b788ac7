import { TreeWalker } from './application/services/tree-walker';
import type { WalkOptions } from './application/services/tree-walker';
import type { DirectoryFileMap } from './domain/directory-listing';
import { NodeFileSystem } from './infrastructure/node-file-system';

export { DirectoryLister } from './application/services/directory-lister';
export { TreeWalker } from './application/services/tree-walker';
export type { DirectoryVisit, WalkOptions } from './application/services/tree-walker';
export type { FileSystemPort } from './application/ports/file-system.port';
export type {
  DirectoryFileMap,
  DirectoryListing,
  SkippedDirectory,
  WalkReport,
} from './domain/directory-listing';
export { ENTRY_KIND } from './domain/entry-kind';
export type { EntryKind } from './domain/entry-kind';
export { ConfigError, DirectoryListError } from './domain/errors';
export {
  endsWithAny,
  matchesPattern,
  rejectEndingWith,
  toPredicate,
} from './domain/path-filter';
export type { PathFilter, PathMatcher, PathPredicate } from './domain/path-filter';
export { UNREADABLE_POLICY } from './domain/unreadable-policy';
export type { UnreadablePolicy } from './domain/unreadable-policy';
export { NodeFileSystem } from './infrastructure/node-file-system';
export { loadConfig } from './utils/load-config';
export type { FinderConfig } from './utils/load-config';

/** Walk `root` on the local filesystem. */
export const findFiles = (root: string, options: WalkOptions = {}): DirectoryFileMap => {
  return new TreeWalker(new NodeFileSystem()).walk(root, options);
};
