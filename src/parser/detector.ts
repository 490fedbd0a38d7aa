import { closeSync, openSync, readSync } from 'fs';
import { extname } from 'path';
import type { MimeType } from '../types.js';

export const MIME = {
  python: 'text/x-python',
  javascript: 'application/javascript',
  yaml: 'text/x-yaml',
  markdown: 'text/markdown',
  mdx: 'text/mdx',
  jupyter: 'application/x-ipynb+json',
  json: 'application/json',
  shell: 'text/x-shellscript',
  plain: 'text/plain',
  directory: 'inode/directory',
  unknown: 'application/octet-stream',
} as const;

/** Other names the same formats go by; their processors claim these too. */
export const MIME_ALIASES = {
  jupyter: ['application/x-jupyter', 'text/x-ipynb+json'],
  shell: ['application/x-shellscript', 'text/x-sh', 'application/x-sh'],
} as const;

export const EXTENSION_MIME_TYPES: Readonly<Record<string, MimeType>> = Object.freeze({
  '.py': MIME.python,
  '.pyw': MIME.python,
  '.pyi': MIME.python,
  '.js': MIME.javascript,
  '.mjs': MIME.javascript,
  '.cjs': MIME.javascript,
  '.jsx': MIME.javascript,
  '.yaml': MIME.yaml,
  '.yml': MIME.yaml,
  '.md': MIME.markdown,
  '.markdown': MIME.markdown,
  '.mdx': MIME.mdx,
  '.ipynb': MIME.jupyter,
  '.json': MIME.json,
  '.sh': MIME.shell,
  '.bash': MIME.shell,
  '.txt': MIME.plain,
});

// Recognized, but nothing structural to extract.
const PLAIN_TYPES: ReadonlySet<MimeType> = new Set([MIME.plain]);

export const DEFAULT_IGNORE_DIRS: readonly string[] = Object.freeze([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  '__pycache__',
  '.mypy_cache',
  '.pytest_cache',
  '.tox',
  'venv',
  '.venv',
  'ds_venv',
  'dw_env',
  '.ipynb_checkpoints',
  'dist',
  'build',
  'target',
  'out',
]);

const SNIFF_BYTES = 4096;

/** Default ignore set plus the caller's names; the default can only grow. */
export function resolveIgnoreDirs(extra: Iterable<string> = []): Set<string> {
  const dirs = new Set(DEFAULT_IGNORE_DIRS);
  for (const name of extra) {
    const trimmed = name.trim();
    if (trimmed) dirs.add(trimmed);
  }
  return dirs;
}

/** MIME types that some processor has to claim. */
export function extractableTypes(): MimeType[] {
  return [...new Set(Object.values(EXTENSION_MIME_TYPES))].filter(t => !PLAIN_TYPES.has(t));
}

export function detectByExtension(filePath: string): MimeType | undefined {
  return EXTENSION_MIME_TYPES[extname(filePath).toLowerCase()];
}

export function sniffContent(head: string): MimeType {
  if (head.includes('\0')) return MIME.unknown;

  const text = head.replace(/^\uFEFF/, '');
  const firstLine = text.split('\n', 1)[0].trim();

  if (firstLine.startsWith('#!')) {
    if (/\bpython[0-9.]*\b/.test(firstLine)) return MIME.python;
    if (/\bnode\b/.test(firstLine)) return MIME.javascript;
    if (/\b(ba|z|k|da)?sh\b/.test(firstLine)) return MIME.shell;
    return MIME.unknown;
  }

  const trimmed = text.trimStart();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    const parsed = tryParseJson(trimmed);
    if (parsed !== undefined) {
      return isNotebookShape(parsed) ? MIME.jupyter : MIME.json;
    }
  }

  if (firstLine.startsWith('%YAML') || firstLine === '---') return MIME.yaml;
  if (/^#{1,6}\s+\S/.test(firstLine)) return MIME.markdown;

  return MIME.unknown;
}

// Truncated heads and non-JSON text both come back undefined.
function tryParseJson(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

function isNotebookShape(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'cells' in value &&
    Array.isArray(value.cells) &&
    'nbformat' in value
  );
}

function readHead(filePath: string): string | undefined {
  let fd: number | undefined;
  try {
    fd = openSync(filePath, 'r');
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const bytesRead = readSync(fd, buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).toString('utf-8');
  } catch {
    return undefined;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}

/**
 * Extension lookup first, then a look at the first few KiB of the file.
 * Never throws: anything it cannot classify is `application/octet-stream`.
 */
export function detectMimeType(filePath: string): MimeType {
  const byExtension = detectByExtension(filePath);
  if (byExtension) return byExtension;

  const head = readHead(filePath);
  if (head === undefined || head.length === 0) return MIME.unknown;
  return sniffContent(head);
}

export class FileTypeDetector {
  detect(filePath: string): MimeType {
    return detectMimeType(filePath);
  }

  extractableTypes(): MimeType[] {
    return extractableTypes();
  }

  isUnknown(mimeType: MimeType): boolean {
    return mimeType === MIME.unknown;
  }
}
