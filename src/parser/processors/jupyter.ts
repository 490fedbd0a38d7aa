import { z } from 'zod';
import type { Props } from '../../types.js';
import { describeError } from '../../errors.js';
import type { TraversalContext } from '../scope.js';
import { MIME, MIME_ALIASES } from '../detector.js';
import { toPropValue } from '../props.js';
import type { FormatExtractor } from './types.js';
import { walkPythonSource } from './python.js';

const multiline = z
  .union([z.string(), z.array(z.string())])
  .transform(value => (Array.isArray(value) ? value.join('') : value));

const outputSchema = z
  .object({
    output_type: z.string(),
    name: z.string().optional(),
    text: multiline.optional(),
    data: z.record(z.unknown()).optional(),
    execution_count: z.number().int().nullable().optional(),
    ename: z.string().optional(),
    evalue: z.string().optional(),
    traceback: z.array(z.string()).optional(),
  })
  .passthrough();

const cellSchema = z.object({
  cell_type: z.enum(['code', 'markdown', 'raw']),
  source: multiline.default(''),
  metadata: z.record(z.unknown()).default({}),
  execution_count: z.number().int().nullable().optional(),
  outputs: z.array(outputSchema).optional(),
});

const notebookSchema = z.object({
  cells: z.array(z.unknown()),
  metadata: z.record(z.unknown()).default({}),
  nbformat: z.number().int(),
  nbformat_minor: z.number().int().optional(),
});

type NotebookCell = z.infer<typeof cellSchema>;
type NotebookOutput = z.infer<typeof outputSchema>;

// IPython magics and shell escapes are not Python; blank them, keeping line numbers.
const MAGIC_LINE = /^[ \t]*[%!].*$/gm;

function notebookLanguage(metadata: Record<string, unknown>): string {
  const read = (key: string, field: string): string | null => {
    const section = metadata[key];
    if (typeof section !== 'object' || section === null || !(field in section)) return null;
    const value: unknown = Reflect.get(section, field);
    return typeof value === 'string' ? value.toLowerCase() : null;
  };
  return read('kernelspec', 'language') ?? read('language_info', 'name') ?? 'python';
}

function textOf(data: Record<string, unknown> | undefined): string | null {
  const plain = data?.['text/plain'];
  if (typeof plain === 'string') return plain;
  if (Array.isArray(plain) && plain.every(line => typeof line === 'string')) return plain.join('');
  return null;
}

function outputContent(output: NotebookOutput): string {
  if (output.text !== undefined) return output.text;
  if (output.traceback) return output.traceback.join('\n');
  return textOf(output.data) ?? JSON.stringify(output.data ?? {});
}

function lineCount(text: string): number {
  return text === '' ? 0 : text.replace(/\n$/, '').split('\n').length;
}

function visitOutput(output: NotebookOutput, cellName: string, index: number, ctx: TraversalContext): void {
  const content = outputContent(output);
  const props: Props = {
    output_type: output.output_type,
    mime_types: Object.keys(output.data ?? {}),
  };
  if (output.name) props.stream = output.name;
  if (output.execution_count !== undefined) props.execution_count = output.execution_count;
  if (output.ename) props.error = `${output.ename}: ${output.evalue ?? ''}`;

  ctx.emit({
    type: 'Output',
    name: `${cellName}_output_${index}_${output.output_type}`,
    content,
    startLine: 1,
    endLine: Math.max(lineCount(content), 1),
    props,
  });
}

function visitCell(cell: NotebookCell, index: number, language: string, ctx: TraversalContext): void {
  const executionCount = cell.execution_count ?? null;
  const name = `cell_${index}_${cell.cell_type}${executionCount !== null ? `_[${executionCount}]` : ''}`;
  const outputs = cell.outputs ?? [];
  const parseable = cell.cell_type === 'code' && language === 'python' && cell.source.trim() !== '';

  ctx.emit({
    type: 'Cell',
    name,
    content: cell.source,
    startLine: 1,
    endLine: Math.max(lineCount(cell.source), 1),
    props: {
      cell_type: cell.cell_type,
      execution_count: executionCount,
      output_types: outputs.map(o => o.output_type),
      tags: toPropValue(cell.metadata.tags ?? []),
    },
  });

  if (!parseable && outputs.length === 0) return;
  ctx.within('Cell', name, () => {
    if (parseable) walkPythonSource(cell.source.replace(MAGIC_LINE, line => ' '.repeat(line.length)), ctx, name);
    outputs.forEach((output, i) => visitOutput(output, name, i, ctx));
  });
}

function parseJson(source: string, ctx: TraversalContext): unknown {
  try {
    const value: unknown = JSON.parse(source);
    return value;
  } catch (err) {
    ctx.fail('parse', `Invalid notebook JSON: ${describeError(err)}`);
    return undefined;
  }
}

function issueText(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Cells in notebook order. Line numbers of cells, outputs and the Python
 * elements inside a cell are relative to that cell's own source.
 */
export const jupyterExtractor: FormatExtractor = {
  kind: 'jupyter',
  mimeTypes: [MIME.jupyter, ...MIME_ALIASES.jupyter],
  extract(source, ctx) {
    if (source.trim() === '') return;
    const raw = parseJson(source, ctx);
    if (raw === undefined) return;

    const notebook = notebookSchema.safeParse(raw);
    if (!notebook.success) {
      ctx.fail('parse', `Not a notebook: ${issueText(notebook.error)}`);
      return;
    }
    const language = notebookLanguage(notebook.data.metadata);

    for (const [index, rawCell] of notebook.data.cells.entries()) {
      const cell = cellSchema.safeParse(rawCell);
      if (!cell.success) {
        ctx.fail('validation', `Cell ${index}: ${issueText(cell.error)}`);
        return;
      }
      visitCell(cell.data, index, language, ctx);
    }
  },
};
