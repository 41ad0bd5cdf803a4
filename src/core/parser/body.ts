import type Parser from 'tree-sitter';
import { sha256Hex } from '../crypto';
import type { BodyFacts, CallSite, LiteralKind, LiteralValue } from '../types';
import { ATTRIBUTE_TYPES, COMMENT_TYPES, normalizedText, structuralForm } from './utils';

/** Item declarations nested in a body belong to no call/literal list. */
const NESTED_ITEM_TYPES = new Set([
  'function_item',
  'function_signature_item',
  'struct_item',
  'enum_item',
  'union_item',
  'type_item',
  'trait_item',
  'impl_item',
  'mod_item',
  'const_item',
  'static_item',
  'use_declaration',
  'extern_crate_declaration',
  'foreign_mod_item',
  'macro_definition',
]);

const LITERAL_KINDS: Record<string, LiteralKind> = {
  integer_literal: 'integer',
  float_literal: 'float',
  string_literal: 'string',
  raw_string_literal: 'string',
  char_literal: 'char',
  boolean_literal: 'boolean',
};

const INTEGER_SUFFIX = /(i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize)$/;
const FLOAT_SUFFIX = /(f32|f64)$/;

const PLAIN_CALLEE_TYPES = new Set(['identifier', 'self', 'super', 'crate', 'metavariable', 'field_identifier']);

export function normalizeIntegerLiteral(text: string): string {
  // suffix letters are never hex digits, so stripping is safe for every radix
  const digits = text.replace(/_/g, '').replace(INTEGER_SUFFIX, '');
  try {
    return BigInt(digits.toLowerCase()).toString();
  } catch {
    return digits;
  }
}

export function normalizeFloatLiteral(text: string): string {
  return text.replace(/_/g, '').replace(FLOAT_SUFFIX, '');
}

/**
 * Content between the delimiters. Raw and cooked forms of the same text
 * compare equal; byte and C string prefixes are kept so `b"x"` and `"x"` do not.
 */
export function normalizeQuotedLiteral(text: string, quote: '"' | '\''): string {
  const first = text.indexOf(quote);
  const last = text.lastIndexOf(quote);
  if (first < 0 || last <= first) return text;
  const prefix = text.slice(0, first).replace(/#/g, '').replace(/r$/, '');
  const content = text.slice(first + 1, last);
  return prefix ? `${prefix}${quote}${content}${quote}` : content;
}

export function normalizeLiteral(n: Parser.SyntaxNode): LiteralValue | null {
  const kind = LITERAL_KINDS[n.type];
  if (!kind) return null;
  const text = n.text;
  switch (kind) {
    case 'integer':
      return { kind, value: normalizeIntegerLiteral(text) };
    case 'float':
      return { kind, value: normalizeFloatLiteral(text) };
    case 'string':
      return { kind, value: normalizeQuotedLiteral(text, '"') };
    case 'char':
      return { kind, value: normalizeQuotedLiteral(text, '\'') };
    case 'boolean':
      return { kind, value: text.trim() };
  }
}

const receiverText = (n: Parser.SyntaxNode | null): string => {
  if (!n) return '<expr>';
  if (PLAIN_CALLEE_TYPES.has(n.type)) return n.text;
  switch (n.type) {
    case 'scoped_identifier':
    case 'generic_function':
      return normalizedText(n);
    case 'field_expression': {
      const field = n.childForFieldName('field');
      return `${receiverText(n.childForFieldName('value'))}.${field?.text ?? '<field>'}`;
    }
    case 'call_expression':
      return `${calleeText(n.childForFieldName('function'))}()`;
    case 'try_expression':
      return `${receiverText(n.namedChildren.find((c) => !COMMENT_TYPES.has(c.type)) ?? null)}?`;
    case 'await_expression':
      return `${receiverText(n.namedChildren.find((c) => !COMMENT_TYPES.has(c.type)) ?? null)}.await`;
    default:
      return '<expr>';
  }
};

/**
 * Callee as written: `foo`, `a::b::c`, `parse::<u8>`, `self.items.push`,
 * `reader.lines().map`. Anything not a path, field chain or call chain
 * (closures, indexing, parenthesized expressions) becomes `<expr>`.
 */
export const calleeText = (fn: Parser.SyntaxNode | null): string => receiverText(fn);

const countArguments = (args: Parser.SyntaxNode | null): number => {
  if (!args) return 0;
  return args.namedChildren.filter((c) => !COMMENT_TYPES.has(c.type) && !ATTRIBUTE_TYPES.has(c.type)).length;
};

/** Top-level comma separated groups of a macro token tree. */
export const countMacroArguments = (tree: Parser.SyntaxNode | null): number => {
  if (!tree) return 0;
  const inner = tree.children.slice(1, -1);
  let count = 0;
  let hasContent = false;
  for (const c of inner) {
    if (COMMENT_TYPES.has(c.type)) continue;
    if (c.type === ',') {
      if (hasContent) count++;
      hasContent = false;
      continue;
    }
    hasContent = true;
  }
  if (hasContent) count++;
  return count;
};

const macroName = (n: Parser.SyntaxNode): string => {
  const mac = n.childForFieldName('macro');
  return `${mac ? normalizedText(mac) : '<macro>'}!`;
};

export function collectBodyFacts(body: Parser.SyntaxNode): BodyFacts {
  const calls: CallSite[] = [];
  const literals: LiteralValue[] = [];

  const walk = (n: Parser.SyntaxNode): void => {
    if (COMMENT_TYPES.has(n.type) || ATTRIBUTE_TYPES.has(n.type)) return;
    if (NESTED_ITEM_TYPES.has(n.type)) return;

    if (n.type === 'macro_invocation') {
      const tree = n.children.find((c) => c.type === 'token_tree') ?? null;
      calls.push({ callee: macroName(n), argCount: countMacroArguments(tree) });
      return;
    }

    const lit = normalizeLiteral(n);
    if (lit) {
      literals.push(lit);
      return;
    }

    if (n.type === 'call_expression') {
      calls.push({
        callee: calleeText(n.childForFieldName('function')),
        argCount: countArguments(n.childForFieldName('arguments')),
      });
    }

    for (const c of n.children) walk(c);
  };

  for (const c of body.children) walk(c);

  return {
    fingerprint: sha256Hex(structuralForm(body)),
    calls,
    literals,
  };
}
