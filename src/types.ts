// Core type definitions for the idl-patch code generator

export type BaseTypeCategory =
  | 'bool'
  | 'byte'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'double'
  | 'string'
  | 'binary';

export type ContainerTypeCategory = 'list' | 'set' | 'map';

export type StructLikeCategory = 'struct' | 'union' | 'exception';

export type TypeCategory = BaseTypeCategory | ContainerTypeCategory | StructLikeCategory | 'enum';

export interface FieldType {
  // Name as written in the IDL, qualified by include reference when foreign (e.g. 'base.Base')
  name: string;
  category: TypeCategory;
  keyType?: FieldType;
  valueType?: FieldType;
  // Set by the parser for struct, union and exception references
  structLike?: StructLike;
}

export type Requiredness = 'required' | 'optional' | 'default';

export interface Field {
  readonly id: number;
  readonly name: string;
  readonly type: FieldType;
  readonly requiredness?: Requiredness;
}

export interface StructLike {
  name: string;
  category: StructLikeCategory;
  fields: Field[];
}

export interface IdlInclude {
  path: string;
  document: IdlDocument;
}

export interface IdlDocument {
  filename: string;
  // Target language -> namespace, e.g. 'go' -> 'example.echo'
  namespaces: Map<string, string>;
  includes: IdlInclude[];
  structLikes: StructLike[];
}

export interface PatchRequest {
  roots: IdlDocument[];
  outputPath: string;
}

export interface OutputUnit {
  name: string;
  content: string;
}

export type EncodingClass = 'fixed' | 'variable';

export type EnvelopeRole = 'request' | 'response';

export interface EnvelopeRule {
  role: EnvelopeRole;
  fieldName: string;
  typeName: string;
}

export interface EnvelopeMatch {
  requests: StructLike[];
  responses: StructLike[];
}

/**
 * Include reference name of a document: its file name without directory and extension.
 * `idl/base.thrift` is referenced as `base` by documents that include it.
 */
export function referenceName(document: IdlDocument): string {
  const parts = document.filename.split(/[\/\\]/);
  const basename = parts[parts.length - 1];
  const dotIndex = basename.lastIndexOf('.');
  return dotIndex === -1 ? basename : basename.substring(0, dotIndex);
}

export function namespaceOrReferenceName(document: IdlDocument, language: string): string {
  const namespace = document.namespaces.get(language);
  if (namespace !== undefined && namespace.length > 0) {
    return namespace;
  }
  return referenceName(document);
}
