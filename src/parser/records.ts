import type { Element, ElementRecord, ProcessorKind } from '../types.js';

export const RECORD_COLUMNS = [
  'filepath',
  'parent_path',
  'order',
  'name',
  'content',
  'props',
  'element_type',
] as const satisfies ReadonlyArray<keyof ElementRecord>;

export type RecordColumn = (typeof RECORD_COLUMNS)[number];

/** Flattens an element into a table row; props become a JSON string with a fixed key order. */
export function toRecord(filePath: string, element: Element): ElementRecord {
  const props = JSON.stringify({
    nesting_level: element.nestingLevel,
    start_line: element.startLine,
    end_line: element.endLine,
    parameters: element.parameters,
    comments: element.comments,
    ...element.props,
  });

  return Object.freeze({
    filepath: filePath,
    parent_path: element.parentPath,
    order: element.order,
    name: element.name,
    content: element.content,
    props,
    element_type: element.type,
  });
}

/**
 * Append-only, order-preserving table of records. A processor keeps one for
 * its whole lifetime; rows from later files are added after earlier ones.
 */
export class RecordTable {
  private readonly rows: ElementRecord[] = [];

  constructor(readonly kind: ProcessorKind) {}

  get size(): number {
    return this.rows.length;
  }

  append(records: readonly ElementRecord[]): void {
    for (const record of records) {
      this.rows.push(Object.isFrozen(record) ? record : Object.freeze({ ...record }));
    }
  }

  all(): readonly ElementRecord[] {
    return this.rows.slice();
  }

  forFile(filePath: string): ElementRecord[] {
    return this.rows.filter(r => r.filepath === filePath);
  }

  toRows(): Array<Array<ElementRecord[RecordColumn]>> {
    return this.rows.map(row => RECORD_COLUMNS.map(column => row[column]));
  }

  toJsonLines(): string {
    return this.rows
      .map(row => JSON.stringify(Object.fromEntries(RECORD_COLUMNS.map(c => [c, row[c]]))))
      .join('\n');
  }

  [Symbol.iterator](): Iterator<ElementRecord> {
    return this.rows[Symbol.iterator]();
  }
}
