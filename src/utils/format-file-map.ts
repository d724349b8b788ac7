import type { DirectoryFileMap } from '../domain/directory-listing';

/** One line per directory, its files indented beneath it. */
export const formatFileMap = (files: DirectoryFileMap): string => {
  const lines: string[] = [];
  for (const [directory, directoryFiles] of files) {
    lines.push(directory);
    for (const file of directoryFiles) {
      lines.push(`  ${file}`);
    }
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
};

export const fileMapToJson = (files: DirectoryFileMap): string => {
  return `${JSON.stringify(Object.fromEntries(files), null, 2)}\n`;
};
