import type { EntryKind } from '../../domain/entry-kind';

export interface FileSystemPort {
  resolvePath(path: string): string;
  /**
   * Entry names of a directory, in enumeration order. The handle is released
   * before returning. Throws DirectoryListError when the directory cannot be opened.
   */
  readDirectory(absolutePath: string): string[];
  /** Follows symbolic links; anything that cannot be stat'ed is 'other'. */
  classify(absolutePath: string): EntryKind;
  realPath(absolutePath: string): string;
}
