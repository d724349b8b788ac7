import fs from 'node:fs';
import type { Dir, Stats } from 'node:fs';
import path from 'node:path';

import type { FileSystemPort } from '../application/ports/file-system.port';
import { ENTRY_KIND, type EntryKind } from '../domain/entry-kind';
import { DirectoryListError, getErrorCode } from '../domain/errors';

const mapStatsKind = (stats: Stats): EntryKind => {
  if (stats.isFile()) {
    return ENTRY_KIND.FILE;
  }
  if (stats.isDirectory()) {
    return ENTRY_KIND.DIRECTORY;
  }
  return ENTRY_KIND.OTHER;
};

export class NodeFileSystem implements FileSystemPort {
  public resolvePath(targetPath: string): string {
    return path.resolve(targetPath);
  }

  public readDirectory(absolutePath: string): string[] {
    let dir: Dir;
    try {
      dir = fs.opendirSync(absolutePath);
    } catch (error) {
      throw new DirectoryListError(absolutePath, getErrorCode(error), { cause: error });
    }

    const names: string[] = [];
    let readError: DirectoryListError | null = null;
    try {
      let entry = dir.readSync();
      while (entry !== null) {
        names.push(entry.name);
        entry = dir.readSync();
      }
    } catch (error) {
      readError = new DirectoryListError(absolutePath, getErrorCode(error), { cause: error });
    }

    try {
      dir.closeSync();
    } catch (error) {
      // a read failure is the more useful report; the close error only surfaces on its own
      if (!readError) {
        throw new DirectoryListError(absolutePath, getErrorCode(error), { cause: error });
      }
    }

    if (readError) {
      throw readError;
    }
    return names;
  }

  public classify(absolutePath: string): EntryKind {
    try {
      return mapStatsKind(fs.statSync(absolutePath));
    } catch {
      // dangling link, link loop, or entry removed since enumeration
      return ENTRY_KIND.OTHER;
    }
  }

  public realPath(absolutePath: string): string {
    return fs.realpathSync(absolutePath);
  }
}
