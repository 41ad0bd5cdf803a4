export type EntityKind = 'function' | 'type' | 'trait' | 'method';

export const ENTITY_KINDS: readonly EntityKind[] = ['function', 'type', 'trait', 'method'];

export type TypeKind = 'struct' | 'enum' | 'type_alias';

export interface EntityKey {
  module: string;
  kind: EntityKind;
  name: string;
  /** Owning type, `<Type as Trait>` or trait name. Only set for methods. */
  owner?: string;
}

export interface SourceSpan {
  file: string;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

export interface CallSite {
  callee: string;
  argCount: number;
}

export type LiteralKind = 'integer' | 'float' | 'string' | 'boolean' | 'char';

export interface LiteralValue {
  kind: LiteralKind;
  value: string;
}

export interface BodyFacts {
  fingerprint: string;
  calls: readonly CallSite[];
  literals: readonly LiteralValue[];
}

interface RecordBase {
  key: EntityKey;
  signature: string;
  /** Normalized text of the whole item, body included. */
  text: string;
  span: SourceSpan;
}

export interface FunctionRecord extends RecordBase {
  kind: 'function';
  body: BodyFacts;
}

export interface MethodRecord extends RecordBase {
  kind: 'method';
  owner: string;
  /** Null for trait methods declared without a default body. */
  body: BodyFacts | null;
}

export interface TypeRecord extends RecordBase {
  kind: 'type';
  typeKind: TypeKind;
}

export interface TraitRecord extends RecordBase {
  kind: 'trait';
}

export type EntityRecord = FunctionRecord | MethodRecord | TypeRecord | TraitRecord;

export type CallableRecord = FunctionRecord | MethodRecord;

export interface ParseFailure {
  file: string;
  reason: 'syntax_error' | 'parser_rejected' | 'file_too_large';
  message: string;
  line?: number;
  column?: number;
}

export interface FileExtraction {
  file: string;
  module: string;
  entities: EntityRecord[];
  failure: ParseFailure | null;
}

export interface SourceFile {
  path: string;
  content: string;
}

export interface Snapshot {
  commit: string;
  /** Keyed by `keyToString`, iterated in ascending key order. */
  entities: ReadonlyMap<string, EntityRecord>;
  /** File path to the keys that originated in it, paths ascending. */
  files: ReadonlyMap<string, readonly string[]>;
  parseFailures: readonly ParseFailure[];
}

export interface GranularDiff {
  addedCalls: CallSite[];
  removedCalls: CallSite[];
  addedLiterals: LiteralValue[];
  removedLiterals: LiteralValue[];
}

export type ChangeKind = 'added' | 'removed' | 'modified';

export interface AddedChange {
  change: 'added';
  key: EntityKey;
  typeKind?: TypeKind;
  oldSignature: null;
  newSignature: string;
  oldText: null;
  newText: string;
  newSpan: SourceSpan;
}

export interface RemovedChange {
  change: 'removed';
  key: EntityKey;
  typeKind?: TypeKind;
  oldSignature: string;
  newSignature: null;
  oldText: string;
  newText: null;
  oldSpan: SourceSpan;
}

export interface ModifiedChange {
  change: 'modified';
  key: EntityKey;
  typeKind?: TypeKind;
  oldSignature: string;
  newSignature: string;
  oldText: string;
  newText: string;
  signatureChanged: boolean;
  bodyChanged: boolean;
  oldSpan: SourceSpan;
  newSpan: SourceSpan;
  granular?: GranularDiff;
}

export type ChangeRecord = AddedChange | RemovedChange | ModifiedChange;
