export type DirectoryListing = {
  files: string[];
  directories: string[];
};

/** Directory path -> retained file paths, all absolute. */
export type DirectoryFileMap = Map<string, string[]>;

export type SkippedDirectory = {
  path: string;
  code: string;
  reason: string;
};

export type WalkReport = {
  files: DirectoryFileMap;
  skipped: SkippedDirectory[];
  visitedCount: number;
};
