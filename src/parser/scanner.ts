import { readdirSync, statSync, type Dirent } from 'fs';
import { join, relative, sep } from 'path';
import { describeError, failure } from '../errors.js';
import { resolveIgnoreDirs } from './detector.js';

export interface FolderListing {
  /** Path relative to the walked root with `/` separators; `.` for the root. */
  folder: string;
  path: string;
  files: string[];
  /** Set when the folder itself could not be listed; `files` is then empty. */
  error?: string;
}

export type ListDirectory = (dir: string) => Dirent[];

const listDirectory: ListDirectory = dir => readdirSync(dir, { withFileTypes: true });

function folderName(root: string, dir: string): string {
  const rel = relative(root, dir);
  return rel === '' ? '.' : rel.split(sep).join('/');
}

// A broken link counts as a file; a linked directory is not followed.
function isLinkedFile(fullPath: string): boolean {
  try {
    return !statSync(fullPath).isDirectory();
  } catch {
    return true;
  }
}

/**
 * Depth-first listing of `root`. A folder's files come before its
 * subfolders, entries keep the order the filesystem returns, ignored
 * directory names are pruned and folders without files are left out.
 * A folder that cannot be listed is kept with its error and the walk
 * carries on with its siblings.
 */
export function walkDirectory(
  root: string,
  extraIgnore: Iterable<string> = [],
  list: ListDirectory = listDirectory,
): FolderListing[] {
  const ignore = resolveIgnoreDirs(extraIgnore);
  const listings: FolderListing[] = [];

  function walk(dir: string): void {
    const folder = folderName(root, dir);
    let entries: Dirent[];
    try {
      entries = list(dir);
    } catch (err) {
      listings.push({ folder, path: dir, files: [], error: failure('read', `Cannot list ${dir}: ${describeError(err)}`) });
      return;
    }

    const files: string[] = [];
    const subdirs: string[] = [];
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!ignore.has(entry.name)) subdirs.push(fullPath);
      } else if (entry.isFile() || (entry.isSymbolicLink() && isLinkedFile(fullPath))) {
        files.push(fullPath);
      }
    }

    if (files.length > 0) listings.push({ folder, path: dir, files });
    for (const subdir of subdirs) walk(subdir);
  }

  walk(root);
  return listings;
}

/** Outcomes a walk will produce: one per file, one per folder that failed to list. */
export function countEntries(listings: readonly FolderListing[]): number {
  return listings.reduce((total, listing) => total + (listing.error ? 1 : listing.files.length), 0);
}
