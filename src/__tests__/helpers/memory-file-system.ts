import path from 'node:path';

import type { FileSystemPort } from '../../application/ports/file-system.port';
import { ENTRY_KIND, type EntryKind } from '../../domain/entry-kind';
import { DirectoryListError } from '../../domain/errors';

/**
 * Tree literal: a string is a file, an object a directory, `{ link }` a
 * symbolic link to an absolute path and `null` an entry that is neither.
 */
export type TreeSpec = { [name: string]: string | TreeSpec | { link: string } | null };

type Node =
  | { kind: 'file' }
  | { kind: 'other' }
  | { kind: 'link'; target: string }
  | { kind: 'directory'; children: string[] };

const isLink = (value: TreeSpec[string]): value is { link: string } => {
  return typeof value === 'object' && value !== null && typeof value.link === 'string';
};

export class MemoryFileSystem implements FileSystemPort {
  private readonly nodes = new Map<string, Node>();
  private readonly unreadable = new Set<string>();
  public readonly reads: string[] = [];

  public constructor(
    private readonly cwd: string,
    tree: TreeSpec,
  ) {
    this.nodes.set('/', { kind: 'directory', children: [] });
    this.add('/', tree);
  }

  public denyAccess(absolutePath: string): this {
    this.unreadable.add(absolutePath);
    return this;
  }

  public resolvePath(targetPath: string): string {
    return path.posix.resolve(this.cwd, targetPath);
  }

  public readDirectory(absolutePath: string): string[] {
    this.reads.push(absolutePath);
    const node = this.follow(absolutePath);
    if (!node) {
      throw new DirectoryListError(absolutePath, 'ENOENT');
    }
    if (node.kind !== 'directory') {
      throw new DirectoryListError(absolutePath, 'ENOTDIR');
    }
    if (this.unreadable.has(absolutePath)) {
      throw new DirectoryListError(absolutePath, 'EACCES');
    }
    return [...node.children];
  }

  public classify(absolutePath: string): EntryKind {
    const node = this.follow(absolutePath);
    if (node?.kind === 'file') {
      return ENTRY_KIND.FILE;
    }
    if (node?.kind === 'directory') {
      return ENTRY_KIND.DIRECTORY;
    }
    return ENTRY_KIND.OTHER;
  }

  public realPath(absolutePath: string): string {
    let resolved = '/';
    for (const part of absolutePath.split('/').filter((segment) => segment.length > 0)) {
      resolved = path.posix.join(resolved, part);
      let node = this.nodes.get(resolved);
      let hops = 0;
      while (node?.kind === 'link') {
        hops += 1;
        if (hops > 40) {
          throw new Error(`ELOOP: ${absolutePath}`);
        }
        resolved = node.target;
        node = this.nodes.get(resolved);
      }
      if (!node) {
        throw new Error(`ENOENT: ${absolutePath}`);
      }
    }
    return resolved;
  }

  private follow(absolutePath: string): Node | undefined {
    try {
      return this.nodes.get(this.realPath(absolutePath));
    } catch {
      return undefined;
    }
  }

  private add(directory: string, tree: TreeSpec): void {
    const parent = this.nodes.get(directory);
    if (parent?.kind !== 'directory') {
      throw new Error(`Not a directory: ${directory}`);
    }

    for (const [name, value] of Object.entries(tree)) {
      const entryPath = path.posix.join(directory, name);
      parent.children.push(name);
      if (value === null) {
        this.nodes.set(entryPath, { kind: 'other' });
      } else if (typeof value === 'string') {
        this.nodes.set(entryPath, { kind: 'file' });
      } else if (isLink(value)) {
        this.nodes.set(entryPath, { kind: 'link', target: value.link });
      } else {
        this.nodes.set(entryPath, { kind: 'directory', children: [] });
        this.add(entryPath, value);
      }
    }
  }
}
