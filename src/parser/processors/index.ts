import { ExtractionProcessor } from './processor.js';
import { pythonExtractor } from './python.js';
import { javascriptExtractor } from './javascript.js';
import { yamlExtractor } from './yaml.js';
import { markdownExtractor } from './markdown.js';
import { mdxExtractor } from './mdx.js';
import { jupyterExtractor } from './jupyter.js';
import { jsonExtractor } from './json.js';
import { shellExtractor } from './shell.js';
import type { FormatExtractor, LanguageProcessor } from './types.js';

export const extractors: readonly FormatExtractor[] = [
  pythonExtractor,
  javascriptExtractor,
  yamlExtractor,
  markdownExtractor,
  mdxExtractor,
  jupyterExtractor,
  jsonExtractor,
  shellExtractor,
];

/** Fresh processors, each with an empty table, in registration order. */
export function createProcessors(): LanguageProcessor[] {
  return extractors.map(extractor => new ExtractionProcessor(extractor));
}

export { ExtractionProcessor, extractSource } from './processor.js';
export { pythonExtractor, walkPythonSource } from './python.js';
export { javascriptExtractor } from './javascript.js';
export { yamlExtractor } from './yaml.js';
export { markdownExtractor, walkMarkdown } from './markdown.js';
export { mdxExtractor } from './mdx.js';
export { jupyterExtractor } from './jupyter.js';
export { jsonExtractor } from './json.js';
export { shellExtractor } from './shell.js';
export { isValid } from './types.js';
export type { FormatExtractor, LanguageProcessor, ProcessingResult } from './types.js';
