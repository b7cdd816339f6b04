import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { ResourceNotFoundError } from '../errors.js';
import { createLogger } from '../logger.js';

const log = createLogger('Files');

/** Search order for dataset files given without an extension. */
export const DATASET_EXTENSIONS = ['.hyper', '.xlsx', '.xls', '.csv', '.xlsm', '.xlsb'] as const;
export const EXCEL_EXTENSIONS = ['.xlsx', '.xls', '.xlsm', '.xlsb'] as const;

const MAX_LISTED_FILES = 10;

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolves the loose file names users type in chat ("sales", "sales.xlsx",
 * "/old/path/sales.csv") to a file in the default directory.
 *
 * Resolution is first-match-wins: the exact path, then `<stem><ext>` for each
 * extension in order, then any `<stem>.*` in the directory (sorted by name).
 */
export class FileResolver {
  constructor(private readonly defaultDirectory: string) {}

  /** Absolute path for `name`, without checking that it exists. */
  toAbsolute(name: string): string {
    return path.isAbsolute(name) ? name : path.join(this.defaultDirectory, name);
  }

  async resolve(name: string, extensions: readonly string[] = DATASET_EXTENSIONS): Promise<string> {
    let candidate = this.toAbsolute(name);

    if (path.isAbsolute(name) && !(await isFile(candidate))) {
      log.warn({ path: name }, 'Absolute path does not exist, trying file name only');
      candidate = path.join(this.defaultDirectory, path.basename(name));
    }

    if (await isFile(candidate)) {
      return candidate;
    }

    const directory = path.dirname(candidate);
    const extension = path.extname(candidate);
    const stem = path.basename(candidate, extension);

    if (!extension) {
      for (const ext of extensions) {
        const withExt = path.join(directory, `${stem}${ext}`);
        if (await isFile(withExt)) {
          log.info({ path: withExt }, 'Resolved file by extension search');
          return withExt;
        }
      }
    }

    if (!(await isDirectory(directory))) {
      throw new ResourceNotFoundError(`Directory not found: ${directory}`);
    }

    const entries = (await readdir(directory)).sort();
    const allowed = new Set(extensions.map((ext) => ext.toLowerCase()));
    const match = entries.find(
      (entry) => entry.startsWith(`${stem}.`) && allowed.has(path.extname(entry).toLowerCase()),
    );
    if (match) {
      const matched = path.join(directory, match);
      log.info({ requested: name, path: matched }, 'Resolved file by stem match');
      return matched;
    }

    const available = entries.slice(0, MAX_LISTED_FILES);
    throw new ResourceNotFoundError(
      `File not found: ${candidate}. Tried extensions: ${extensions.join(', ')}. ` +
        (available.length > 0
          ? `Available files in ${directory}: ${available.join(', ')}`
          : `No files in ${directory}`),
    );
  }
}
