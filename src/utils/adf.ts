import type { AdfDocument, AdfNode, DocNode } from './types';

const CONTAINER_KINDS = ['paragraph', 'heading', 'listItem'] as const;

type ContainerKind = (typeof CONTAINER_KINDS)[number];

function isContainerKind(type: string): type is ContainerKind {
  return (CONTAINER_KINDS as readonly string[]).includes(type);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function textToAdf(text: string): AdfDocument {
  const blocks = text
    .replace(/\r\n/g, '\n')
    .split(/\n\s*\n/)
    .map(block => block.trim())
    .filter(block => block !== '');

  const content = blocks.map(parseParagraph);

  if (content.length === 0) {
    content.push({ type: 'paragraph', content: [] });
  }

  return { type: 'doc', version: 1, content };
}

function parseParagraph(block: string): AdfNode {
  const content: AdfNode[] = [];
  block.split('\n').forEach((line, index) => {
    if (index > 0) {
      content.push({ type: 'hardBreak' });
    }
    if (line !== '') {
      content.push({ type: 'text', text: line });
    }
  });
  return { type: 'paragraph', content };
}

/**
 * Converts a raw rich-text tree into the closed node set. Nodes without a
 * string `type` are dropped; unknown types keep their children.
 */
export function toDocNodes(raw: unknown): DocNode[] {
  if (!Array.isArray(raw)) return [];

  const nodes: DocNode[] = [];
  for (const item of raw) {
    const node = toDocNode(item);
    if (node) nodes.push(node);
  }
  return nodes;
}

function toDocNode(raw: unknown): DocNode | null {
  if (!isRecord(raw) || typeof raw.type !== 'string') return null;

  const type = raw.type;
  if (type === 'text') {
    return typeof raw.text === 'string' ? { kind: 'text', text: raw.text } : null;
  }
  if (type === 'hardBreak') {
    return { kind: 'hardBreak' };
  }

  const children = toDocNodes(raw.content);
  if (isContainerKind(type)) {
    return { kind: type, children };
  }
  return { kind: 'other', type, children };
}

function collectText(nodes: DocNode[], parts: string[]): void {
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        parts.push(node.text);
        break;
      case 'hardBreak':
        parts.push('\n');
        break;
      case 'paragraph':
      case 'heading':
      case 'listItem':
      case 'other':
        collectText(node.children, parts);
        break;
      default: {
        const unreachable: never = node;
        return unreachable;
      }
    }
  }
}

export function flattenDocNodes(nodes: DocNode[]): string {
  const parts: string[] = [];
  collectText(nodes, parts);
  return parts.join('\n');
}

/**
 * Plain text of a rich-text document (`{ type: 'doc', content: [...] }`).
 * Returns undefined when the value carries no content array or no text.
 */
export function adfToPlainText(document: unknown): string | undefined {
  if (!isRecord(document) || !Array.isArray(document.content)) return undefined;

  const text = flattenDocNodes(toDocNodes(document.content));
  return text === '' ? undefined : text;
}
