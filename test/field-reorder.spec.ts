import { describe, it, expect } from 'vitest';
import { classifyField, reorderStructFields } from '../src/codegen/field-reorder';
import { DefaultCodeUtils } from '../src/project/code-utils';
import type { FieldType } from '../src/types';
import { enumType, field, listOf, names, ref, scalar, struct } from './helpers/documents';

const utils = new DefaultCodeUtils();
const isFixed = (type: FieldType): boolean => utils.isFixedLengthType(type);

describe('classifyField', () => {
  it('should classify scalars and enums as fixed-width', () => {
    expect(classifyField(field(1, 'id', scalar('i64')), isFixed)).toBe('fixed');
    expect(classifyField(field(2, 'flag', scalar('bool')), isFixed)).toBe('fixed');
    expect(classifyField(field(3, 'status', enumType('Status')), isFixed)).toBe('fixed');
  });

  it('should classify strings, binaries and containers as variable-width', () => {
    expect(classifyField(field(1, 'name', scalar('string')), isFixed)).toBe('variable');
    expect(classifyField(field(2, 'blob', scalar('binary')), isFixed)).toBe('variable');
    expect(classifyField(field(3, 'ids', listOf(scalar('i32'))), isFixed)).toBe('variable');
  });

  it('should propagate predicate errors unchanged', () => {
    const failure = new Error('type graph is malformed');
    let caught: unknown;
    try {
      classifyField(field(1, 'id', scalar('i64')), () => {
        throw failure;
      });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBe(failure);
  });
});

describe('reorderStructFields', () => {
  it('should move fixed-width fields ahead of variable-width ones', () => {
    const fields = [
      field(1, 'id', scalar('i64')),
      field(2, 'name', scalar('string')),
      field(3, 'active', scalar('bool'))
    ];

    expect(names(reorderStructFields(fields, isFixed))).toEqual(['id', 'active', 'name']);
  });

  it('should keep the relative order within each class', () => {
    const point = struct('Point', [field(1, 'x', scalar('double')), field(2, 'y', scalar('double'))]);
    const fields = [
      field(1, 'title', scalar('string')),
      field(2, 'count', scalar('i32')),
      field(3, 'tags', listOf(scalar('string'))),
      field(4, 'origin', ref(point)),
      field(5, 'payload', scalar('binary')),
      field(6, 'ratio', scalar('double'))
    ];

    expect(names(reorderStructFields(fields, isFixed))).toEqual(['count', 'origin', 'ratio', 'title', 'tags', 'payload']);
  });

  it('should place every fixed-width field before every variable-width field', () => {
    const fields = [
      field(1, 'a', scalar('string')),
      field(2, 'b', scalar('byte')),
      field(3, 'c', listOf(scalar('i64'))),
      field(4, 'd', scalar('i16')),
      field(5, 'e', scalar('binary')),
      field(6, 'f', enumType('Kind'))
    ];

    const classes = reorderStructFields(fields, isFixed).map(f => classifyField(f, isFixed));
    expect(classes).toEqual(['fixed', 'fixed', 'fixed', 'variable', 'variable', 'variable']);
  });

  it('should be idempotent', () => {
    const fields = [
      field(1, 'name', scalar('string')),
      field(2, 'id', scalar('i64')),
      field(3, 'labels', listOf(scalar('string'))),
      field(4, 'active', scalar('bool'))
    ];

    const once = reorderStructFields(fields, isFixed);
    const twice = reorderStructFields(once, isFixed);
    expect(twice).toEqual(once);
  });

  it('should return a new array and leave the input untouched', () => {
    const fields = [field(1, 'name', scalar('string')), field(2, 'id', scalar('i64'))];

    const sorted = reorderStructFields(fields, isFixed);
    expect(sorted).not.toBe(fields);
    expect(names(fields)).toEqual(['name', 'id']);
  });

  it('should return an empty list for a record without fields', () => {
    expect(reorderStructFields([], isFixed)).toEqual([]);
  });

  it('should fail as a whole when any field cannot be classified', () => {
    const fields = [field(1, 'id', scalar('i64')), field(2, 'broken', scalar('string'))];
    const predicate = (type: FieldType): boolean => {
      if (type.category === 'string') {
        throw new Error('cannot classify string');
      }
      return true;
    };

    expect(() => reorderStructFields(fields, predicate)).toThrow('cannot classify string');
  });
});
