import path from 'node:path';

import type { FileSystemPort } from '../ports/file-system.port';
import { ENTRY_KIND } from '../../domain/entry-kind';
import type { DirectoryListing } from '../../domain/directory-listing';

const PSEUDO_ENTRIES = new Set(['.', '..']);

/**
 * Lists the immediate children of one directory, split into files and
 * subdirectories. Everything returned is absolute; nothing is sorted.
 */
export class DirectoryLister {
  public constructor(private readonly fileSystem: FileSystemPort) {}

  /** Throws DirectoryListError when the directory cannot be opened. */
  public list(targetPath: string): DirectoryListing {
    const absolutePath = this.fileSystem.resolvePath(targetPath);
    const names = this.fileSystem.readDirectory(absolutePath);

    const listing: DirectoryListing = { files: [], directories: [] };
    for (const name of names) {
      if (PSEUDO_ENTRIES.has(name)) {
        continue;
      }

      const entryPath = path.join(absolutePath, name);
      const kind = this.fileSystem.classify(entryPath);
      if (kind === ENTRY_KIND.FILE) {
        listing.files.push(entryPath);
      } else if (kind === ENTRY_KIND.DIRECTORY) {
        listing.directories.push(entryPath);
      }
    }

    return listing;
  }
}
