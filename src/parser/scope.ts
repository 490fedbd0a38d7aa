import type { Element, ElementType, Props, ScopeFrame } from '../types.js';
import { failure, type FailureKind } from '../errors.js';

export const PATH_SEPARATOR = '/';

export function formatFrame(frame: ScopeFrame): string {
  return `${frame.type}:${frame.name}`;
}

/**
 * Stack of the currently open named constructs. Its depth is the nesting
 * level of anything discovered now, and its frames, joined ancestor-first,
 * are the parent path.
 */
export class ScopeTracker {
  private readonly frames: ScopeFrame[] = [];
  // One anonymous counter per open frame, plus one for the top level.
  private readonly anonymousCounts: number[] = [0];

  get depth(): number {
    return this.frames.length;
  }

  get current(): ScopeFrame | undefined {
    return this.frames[this.frames.length - 1];
  }

  get path(): string {
    return this.frames.map(formatFrame).join(PATH_SEPARATOR);
  }

  snapshot(): ScopeFrame[] {
    return this.frames.map(frame => ({ ...frame }));
  }

  push(type: string, name: string): void {
    this.frames.push({ type, name });
    this.anonymousCounts.push(0);
  }

  pop(): ScopeFrame {
    const frame = this.frames.pop();
    if (!frame) {
      throw new Error('Scope stack underflow');
    }
    this.anonymousCounts.pop();
    return frame;
  }

  /**
   * `base_N` at the top level, `Parent.base_N` inside a frame; N counts
   * per enclosing frame starting at 1.
   */
  syntheticName(base: string): string {
    const slot = this.anonymousCounts.length - 1;
    this.anonymousCounts[slot] += 1;
    const label = `${base}_${this.anonymousCounts[slot]}`;
    const parent = this.current;
    return parent ? `${parent.name}.${label}` : label;
  }
}

export interface ElementDraft {
  type: ElementType;
  name: string;
  content: string;
  startLine: number;
  endLine: number;
  parameters?: string[];
  comments?: string[];
  props?: Props;
}

/**
 * Everything that changes while one file is walked. A fresh context is made
 * for every processed file, so processors hold no traversal state of their own.
 */
export class TraversalContext {
  readonly scope = new ScopeTracker();
  readonly elements: Element[] = [];
  readonly errors: string[] = [];
  private order = 0;

  constructor(readonly filePath: string) {}

  emit(draft: ElementDraft): Element {
    this.order += 1;
    const element: Element = {
      type: draft.type,
      name: draft.name,
      order: this.order,
      nestingLevel: this.scope.depth,
      parentPath: this.scope.path,
      parameters: draft.parameters ?? [],
      comments: draft.comments ?? [],
      content: draft.content,
      props: draft.props ?? {},
      startLine: draft.startLine,
      endLine: draft.endLine,
    };
    this.elements.push(element);
    return element;
  }

  within<T>(type: string, name: string, visit: () => T): T {
    this.scope.push(type, name);
    try {
      return visit();
    } finally {
      this.scope.pop();
    }
  }

  syntheticName(base = 'anonymous'): string {
    return this.scope.syntheticName(base);
  }

  fail(kind: FailureKind, message: string): void {
    this.errors.push(failure(kind, message));
  }
}
