import type Parser from 'tree-sitter';
import type { SourceSpan } from '../types';

export const COMMENT_TYPES = new Set(['line_comment', 'block_comment']);

export const ATTRIBUTE_TYPES = new Set(['attribute_item', 'inner_attribute_item']);

/** Nodes taken as a single token even though the grammar gives them children. */
export const ATOMIC_TYPES = new Set([
  'string_literal',
  'raw_string_literal',
  'char_literal',
  'integer_literal',
  'float_literal',
  'boolean_literal',
  'lifetime',
]);

const TIGHT_AFTER = new Set(['(', '[', '<', '&', '::', '#', '*', '.', '..', '?', '$']);
const TIGHT_BEFORE = new Set([')', ']', '>', ',', ';', ':', '::', '.', '..']);
const TRAILING_COMMA_CLOSERS = new Set([')', ']', '>', '}', '{']);

const isWordEnd = (tok: string): boolean => /[A-Za-z0-9_'"]$/.test(tok);

export const collectTokens = (n: Parser.SyntaxNode, out: string[], skip?: (c: Parser.SyntaxNode) => boolean): void => {
  if (COMMENT_TYPES.has(n.type) || ATTRIBUTE_TYPES.has(n.type)) return;
  if (skip?.(n)) return;
  if (ATOMIC_TYPES.has(n.type) || n.childCount === 0) {
    const t = n.text.trim();
    if (t) out.push(t);
    return;
  }
  for (const c of n.children) collectTokens(c, out, skip);
};

const needsSpace = (prev: string, next: string): boolean => {
  if (TIGHT_AFTER.has(prev)) return false;
  if (TIGHT_BEFORE.has(next)) return false;
  if ((next === '(' || next === '[' || next === '<') && (isWordEnd(prev) || prev === ')' || prev === '>' || prev === ']')) {
    return false;
  }
  return true;
};

/** Canonical text of a token stream: fixed spacing, no trailing commas. */
export const joinTokens = (tokens: readonly string[]): string => {
  const kept: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const tok = tokens[i];
    if (tok === ',') {
      const next = tokens[i + 1];
      if (next === undefined || TRAILING_COMMA_CLOSERS.has(next)) continue;
    }
    kept.push(tok);
  }
  let out = '';
  let prev: string | null = null;
  for (const tok of kept) {
    out += prev === null || !needsSpace(prev, tok) ? tok : ` ${tok}`;
    prev = tok;
  }
  return out;
};

export const normalizedText = (n: Parser.SyntaxNode, skip?: (c: Parser.SyntaxNode) => boolean): string => {
  const tokens: string[] = [];
  collectTokens(n, tokens, skip);
  return joinTokens(tokens);
};

/**
 * Whitespace- and comment-insensitive serialization of a subtree: named
 * structure plus leaf text. Separator commas carry nothing the nesting does
 * not already encode, so they are left out.
 */
export const structuralForm = (n: Parser.SyntaxNode): string => {
  const parts: string[] = [];
  const walk = (c: Parser.SyntaxNode): void => {
    if (COMMENT_TYPES.has(c.type)) return;
    if (ATOMIC_TYPES.has(c.type) || c.childCount === 0) {
      const t = c.text.trim();
      if (t && t !== ',') parts.push(t);
      return;
    }
    parts.push(`(${c.type}`);
    for (const child of c.children) walk(child);
    parts.push(')');
  };
  walk(n);
  return parts.join(' ');
};

export const sameNode = (a: Parser.SyntaxNode | null, b: Parser.SyntaxNode): boolean =>
  a !== null && a.type === b.type && a.startIndex === b.startIndex && a.endIndex === b.endIndex;

export const spanOf = (file: string, n: Parser.SyntaxNode): SourceSpan => ({
  file,
  startLine: n.startPosition.row + 1,
  startColumn: n.startPosition.column + 1,
  endLine: n.endPosition.row + 1,
  endColumn: n.endPosition.column + 1,
});

/**
 * A token the parser inserted to recover. Some real tokens are zero-width
 * too (the content of `r""`), so only the `(MISSING …)` rendering counts.
 */
export const isMissingToken = (n: Parser.SyntaxNode): boolean =>
  n.childCount === 0 && n.startIndex === n.endIndex && n.toString().startsWith('(MISSING');

/** First node that makes the tree unusable: an ERROR node or a missing token. */
export const findFirstSyntaxError = (root: Parser.SyntaxNode): Parser.SyntaxNode | null => {
  const walk = (n: Parser.SyntaxNode): Parser.SyntaxNode | null => {
    if (n.type === 'ERROR') return n;
    if (n !== root && isMissingToken(n)) return n;
    for (const c of n.children) {
      const found = walk(c);
      if (found) return found;
    }
    return null;
  };
  return walk(root);
};
