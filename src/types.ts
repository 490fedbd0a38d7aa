export type ProcessorKind = 'python' | 'javascript' | 'yaml' | 'markdown' | 'mdx' | 'jupyter' | 'json' | 'shell';

export type MimeType = string;

export type PythonElementType = 'Class' | 'Function' | 'Method' | 'Lambda' | 'Import' | 'Constant';

export type JavaScriptElementType =
  | 'Class' | 'Method' | 'Function' | 'Import' | 'Export' | 'Constant' | 'JSXElement';

export type YamlElementType = 'Document' | 'Mapping' | 'Sequence' | 'Scalar' | 'Alias';

export type MarkdownElementType =
  | 'Frontmatter' | 'Header' | 'CodeBlock' | 'List' | 'Blockquote' | 'Table' | 'Link' | 'Html';

export type MdxElementType = MarkdownElementType | 'Import' | 'Export' | 'JSXElement';

export type JupyterElementType = 'Cell' | 'Output';

export type JsonElementType = 'Object' | 'Array' | 'Value';

export type ShellElementType = 'Function' | 'Variable' | 'Alias' | 'Source';

export type ElementType =
  | PythonElementType
  | JavaScriptElementType
  | YamlElementType
  | MdxElementType
  | JupyterElementType
  | JsonElementType
  | ShellElementType;

export type PropValue =
  | string
  | number
  | boolean
  | null
  | PropValue[]
  | { [key: string]: PropValue };

export type Props = Record<string, PropValue>;

export interface ScopeFrame {
  type: string;
  name: string;
}

export interface Element {
  type: ElementType;
  name: string;
  order: number;
  nestingLevel: number;
  parentPath: string;
  parameters: string[];
  comments: string[];
  content: string;
  props: Props;
  startLine: number;
  endLine: number;
}

export interface ElementRecord {
  filepath: string;
  parent_path: string;
  order: number;
  name: string;
  content: string;
  props: string;
  element_type: ElementType;
}

export interface FileInfo {
  name: string;
  path: string;
  size: number;
  lastModified: number;
}

export interface ProgressStats {
  totalFiles: number;
  filesProcessed: number;
  filesFailed: number;
  filesUnrecognized: number;
  filesUnsupported: number;
  recordsExtracted: number;
  startTime: number;
  currentItem?: string;
}
