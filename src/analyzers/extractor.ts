import type { ResponseNode } from '../shared/types.js';
import { logger } from '../shared/logger.js';

const MIN_BARE_STRING_CHARS = 50;

export function toResponseNode(value: unknown): ResponseNode {
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'array', items: value.map(toResponseNode) };
  }
  if (value !== null && typeof value === 'object') {
    return {
      kind: 'object',
      entries: Object.entries(value).map(([key, child]): [string, ResponseNode] => [key, toResponseNode(child)])
    };
  }
  return { kind: 'scalar' };
}

function field(node: ResponseNode, key: string): ResponseNode | undefined {
  if (node.kind !== 'object') return undefined;
  const entry = node.entries.find(([name]) => name === key);
  return entry?.[1];
}

// choices[0].message.content
function preferredContent(root: ResponseNode): string | null {
  const choices = field(root, 'choices');
  if (!choices || choices.kind !== 'array' || choices.items.length === 0) return null;

  const message = field(choices.items[0], 'message');
  if (!message || message.kind !== 'object') return null;

  const content = field(message, 'content');
  if (!content || content.kind !== 'string') return null;

  const trimmed = content.value.trim();
  return trimmed ? trimmed : null;
}

// Depth-first; an object's own string "content" beats anything below it
function searchContent(node: ResponseNode): string | null {
  switch (node.kind) {
    case 'string':
      return node.value.length > MIN_BARE_STRING_CHARS ? node.value : null;
    case 'object': {
      const content = field(node, 'content');
      if (content?.kind === 'string') {
        return content.value;
      }
      for (const [, child] of node.entries) {
        const found = searchContent(child);
        if (found) return found;
      }
      return null;
    }
    case 'array':
      for (const item of node.items) {
        const found = searchContent(item);
        if (found) return found;
      }
      return null;
    case 'scalar':
      return null;
  }
}

export function extractContent(body: unknown): string {
  try {
    const root = toResponseNode(body);

    const preferred = preferredContent(root);
    if (preferred) {
      logger.info('Found content in choices[0].message.content');
      return preferred;
    }

    const found = searchContent(root);
    if (found) {
      logger.info('Found content via recursive search');
      return found.trim();
    }

    return '';
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('Content extraction failed', err.message);
    return '';
  }
}
