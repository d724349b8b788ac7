#!/usr/bin/env node
import { input } from '@inquirer/prompts';

import { TreeWalker } from './application/services/tree-walker';
import type { WalkOptions } from './application/services/tree-walker';
import { endsWithAny, rejectEndingWith } from './domain/path-filter';
import { NodeFileSystem } from './infrastructure/node-file-system';
import { fileMapToJson, formatFileMap } from './utils/format-file-map';
import { getLogger } from './utils/get-logger';
import { loadConfig } from './utils/load-config';
import { parseCliArgs } from './utils/parse-cli-args';

const logger = getLogger();

const main = async () => {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = loadConfig();
  const root = args.root ?? (await promptForRoot());

  const options: WalkOptions = {
    onUnreadable: args.onUnreadable ?? config.onUnreadable,
    detectCycles: args.detectCycles ?? config.detectCycles,
  };
  if (args.extensions.length > 0) {
    options.fileFilter = endsWithAny(args.extensions);
  }
  if (args.excludedDirectories.length > 0) {
    options.directoryFilter = rejectEndingWith(args.excludedDirectories);
  }

  logger.debug(
    { root, onUnreadable: options.onUnreadable, detectCycles: options.detectCycles },
    'Starting walk',
  );
  const walker = new TreeWalker(new NodeFileSystem());
  const report = walker.scan(root, options);

  process.stdout.write(args.json ? fileMapToJson(report.files) : formatFileMap(report.files));

  if (report.skipped.length > 0) {
    logger.warn({ skipped: report.skipped.length }, 'Some directories could not be read');
  }
};

const promptForRoot = async (): Promise<string> => {
  if (!process.stdin.isTTY) {
    return '.';
  }
  return input({ message: 'Directory to walk', default: '.' });
};

const printHelp = () => {
  const message = `
dir-tree-finder

Usage:
  dir-tree-finder [root] [options]

  Lists every directory under root with the files it contains.
  If root is omitted, you'll be prompted for it (or '.' is used when not in a TTY).

Options:
  --ext, -e <suffix>          Keep only files ending with suffix (repeatable)
  --exclude-dir, -x <suffix>  Drop directories ending with suffix; their subdirectories are still walked (repeatable)
  --on-unreadable <policy>    skip (default) or abort when a directory cannot be opened
  --no-cycle-detection        Follow symbolic links without tracking visited directories
  --json                      Print the result as a JSON object
  --help, -h                  Show this message

Environment:
  DIR_FINDER_ON_UNREADABLE    Default for --on-unreadable
  DIR_FINDER_DETECT_CYCLES    true (default) or false
  LOG_LEVEL                   pino log level (default: info)

Examples:
  dir-tree-finder ../src --ext .c --exclude-dir examples
  dir-tree-finder . --json
`;

  process.stdout.write(message);
};

const run = async () => {
  try {
    await main();
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : error }, 'Fatal error');
    process.exitCode = 1;
  }
};

void run();
