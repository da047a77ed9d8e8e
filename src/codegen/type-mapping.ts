// Wire type ids and their Go primitive types

import { FieldType, TypeCategory } from '../types';

export type TypeId =
  | 'Bool'
  | 'Byte'
  | 'I16'
  | 'I32'
  | 'I64'
  | 'Double'
  | 'String'
  | 'Binary'
  | 'List'
  | 'Set'
  | 'Map'
  | 'Struct';

const TYPE_IDS: Record<TypeCategory, TypeId> = {
  bool: 'Bool',
  byte: 'Byte',
  i16: 'I16',
  i32: 'I32',
  i64: 'I64',
  double: 'Double',
  string: 'String',
  binary: 'Binary',
  enum: 'I32',
  list: 'List',
  set: 'Set',
  map: 'Map',
  struct: 'Struct',
  union: 'Struct',
  exception: 'Struct'
};

const GO_PRIMITIVES: ReadonlyMap<string, string> = new Map([
  ['Bool', 'bool'],
  ['Byte', 'int8'],
  ['I16', 'int16'],
  ['I32', 'int32'],
  ['I64', 'int64'],
  ['Double', 'float64'],
  ['String', 'string'],
  ['Binary', '[]byte']
]);

export function typeIdOf(type: FieldType): TypeId {
  return TYPE_IDS[type.category];
}

// Empty string for ids without a primitive Go type (containers and structs)
export function typeIdToGoType(typeId: string): string {
  return GO_PRIMITIVES.get(typeId) ?? '';
}
