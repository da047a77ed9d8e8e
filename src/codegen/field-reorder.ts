// Field ordering for the fast encode path: fixed-width fields are written first

import { EncodingClass, Field, FieldType } from '../types';

export type FixedLengthPredicate = (type: FieldType) => boolean;

export function classifyField(field: Field, isFixedLengthType: FixedLengthPredicate): EncodingClass {
  return isFixedLengthType(field.type) ? 'fixed' : 'variable';
}

/**
 * Stable partition of `fields`: fixed-width fields in declaration order, then
 * variable-width fields in declaration order. All fields are classified before
 * anything is returned, so a failing predicate leaves no partial result.
 */
export function reorderStructFields(fields: readonly Field[], isFixedLengthType: FixedLengthPredicate): Field[] {
  const classes = new Map<Field, EncodingClass>();
  for (const field of fields) {
    classes.set(field, classifyField(field, isFixedLengthType));
  }

  const sorted: Field[] = [];
  for (const field of fields) {
    if (classes.get(field) === 'fixed') {
      sorted.push(field);
    }
  }
  for (const field of fields) {
    if (classes.get(field) === 'variable') {
      sorted.push(field);
    }
  }
  return sorted;
}
