export interface AdfNode {
  type: string;
  attrs?: Record<string, unknown>;
  content?: AdfNode[];
  text?: string;
}

export interface AdfDocument {
  type: 'doc';
  version: 1;
  content: AdfNode[];
}

export type DocNode =
  | { kind: 'paragraph'; children: DocNode[] }
  | { kind: 'heading'; children: DocNode[] }
  | { kind: 'listItem'; children: DocNode[] }
  | { kind: 'text'; text: string }
  | { kind: 'hardBreak' }
  | { kind: 'other'; type: string; children: DocNode[] };
