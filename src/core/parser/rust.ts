import Parser from 'tree-sitter';
import Rust from 'tree-sitter-rust';
import { errorMessage } from '../errors';
import { moduleFromFilePath, toPosixPath } from '../paths';
import type { EntityRecord, FileExtraction, MethodRecord, ParseFailure, TypeKind } from '../types';
import type { EntityExtractor } from './adapter';
import { collectBodyFacts } from './body';
import { findFirstSyntaxError, normalizedText, sameNode, spanOf } from './utils';

const TYPE_ITEMS: Record<string, TypeKind> = {
  struct_item: 'struct',
  enum_item: 'enum',
  type_item: 'type_alias',
};

/** Trait members that belong to the trait's own signature rather than to a method. */
const TRAIT_SIGNATURE_MEMBERS = new Set(['associated_type', 'const_item', 'type_item']);

export class RustEntityExtractor implements EntityExtractor {
  private parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(Rust);
  }

  getLanguageId(): string {
    return 'rust';
  }

  getSupportedFileExtensions(): string[] {
    return ['.rs'];
  }

  extract(filePath: string, content: string): FileExtraction {
    const file = toPosixPath(filePath);
    const module = moduleFromFilePath(file);

    let tree: Parser.Tree;
    try {
      tree = this.parse(content);
    } catch (e) {
      return { file, module, entities: [], failure: { file, reason: 'parser_rejected', message: errorMessage(e) } };
    }

    const errorNode = findFirstSyntaxError(tree.rootNode);
    if (errorNode) {
      const failure: ParseFailure = {
        file,
        reason: 'syntax_error',
        message: errorNode.type === 'ERROR' ? 'unexpected syntax' : `missing ${errorNode.type}`,
        line: errorNode.startPosition.row + 1,
        column: errorNode.startPosition.column + 1,
      };
      return { file, module, entities: [], failure };
    }

    const entities: EntityRecord[] = [];
    this.collectItems(tree.rootNode, module, file, entities);
    return { file, module, entities, failure: null };
  }

  private parse(content: string): Parser.Tree {
    try {
      return this.parser.parse(content);
    } catch (e) {
      // the default input buffer rejects large sources
      if (!errorMessage(e).includes('Invalid argument')) throw e;
      return this.parser.parse(content, undefined, { bufferSize: Math.max(1024 * 1024, content.length * 2) });
    }
  }

  private collectItems(container: Parser.SyntaxNode, module: string, file: string, out: EntityRecord[]): void {
    for (const n of container.namedChildren) {
      const typeKind = TYPE_ITEMS[n.type];
      if (n.type === 'function_item') {
        const name = n.childForFieldName('name');
        const body = n.childForFieldName('body');
        if (!name || !body) continue;
        out.push({
          kind: 'function',
          key: { module, kind: 'function', name: name.text },
          signature: normalizedText(n, (c) => sameNode(body, c)),
          text: normalizedText(n),
          span: spanOf(file, n),
          body: collectBodyFacts(body),
        });
      } else if (typeKind) {
        const name = n.childForFieldName('name');
        if (!name) continue;
        out.push({
          kind: 'type',
          typeKind,
          key: { module, kind: 'type', name: name.text },
          signature: normalizedText(n),
          text: normalizedText(n),
          span: spanOf(file, n),
        });
      } else if (n.type === 'trait_item') {
        this.collectTrait(n, module, file, out);
      } else if (n.type === 'impl_item') {
        const body = n.childForFieldName('body');
        if (!body) continue;
        this.collectMethods(body, implOwner(n), module, file, out);
      } else if (n.type === 'mod_item') {
        const name = n.childForFieldName('name');
        const body = n.childForFieldName('body');
        if (name && body) this.collectItems(body, `${module}::${name.text}`, file, out);
      }
    }
  }

  private collectTrait(n: Parser.SyntaxNode, module: string, file: string, out: EntityRecord[]): void {
    const name = n.childForFieldName('name');
    if (!name) return;
    const body = n.childForFieldName('body');
    const header = normalizedText(n, (c) => sameNode(body, c));
    const members = body
      ? body.namedChildren.filter((c) => TRAIT_SIGNATURE_MEMBERS.has(c.type)).map((c) => normalizedText(c))
      : [];
    out.push({
      kind: 'trait',
      key: { module, kind: 'trait', name: name.text },
      signature: members.length > 0 ? `${header} { ${members.join(' ')} }` : header,
      text: normalizedText(n),
      span: spanOf(file, n),
    });
    if (body) this.collectMethods(body, name.text, module, file, out);
  }

  private collectMethods(body: Parser.SyntaxNode, owner: string, module: string, file: string, out: EntityRecord[]): void {
    for (const m of body.namedChildren) {
      if (m.type !== 'function_item' && m.type !== 'function_signature_item') continue;
      const name = m.childForFieldName('name');
      if (!name) continue;
      const fnBody = m.type === 'function_item' ? m.childForFieldName('body') : null;
      const record: MethodRecord = {
        kind: 'method',
        owner,
        key: { module, kind: 'method', name: name.text, owner },
        signature: normalizedText(m, (c) => sameNode(fnBody, c)),
        text: normalizedText(m),
        span: spanOf(file, m),
        body: fnBody ? collectBodyFacts(fnBody) : null,
      };
      out.push(record);
    }
  }
}

/** Last path segment of a type, without generic arguments. */
export function typeName(n: Parser.SyntaxNode): string {
  switch (n.type) {
    case 'type_identifier':
    case 'primitive_type':
      return n.text;
    case 'generic_type': {
      const inner = n.childForFieldName('type');
      return inner ? typeName(inner) : normalizedText(n);
    }
    case 'scoped_type_identifier': {
      const name = n.childForFieldName('name');
      return name ? name.text : normalizedText(n);
    }
    default:
      return normalizedText(n);
  }
}

/** `Type` for inherent impls, `<Type as Trait>` for trait impls. */
export function implOwner(impl: Parser.SyntaxNode): string {
  const selfType = impl.childForFieldName('type');
  const traitNode = impl.childForFieldName('trait');
  const self = selfType ? typeName(selfType) : '<unknown>';
  return traitNode ? `<${self} as ${normalizedText(traitNode)}>` : self;
}
