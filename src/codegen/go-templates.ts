// Templates for the generated Go companion files

import { EnvelopeMatch, EnvelopeRole, Field, FieldType, IdlDocument, StructLike } from '../types';
import { TemplateSet, indent } from './template-set';
import { TypeId } from './type-mapping';

export interface FileTemplateData {
  document: IdlDocument;
  pkgName: string;
  imports: ReadonlyMap<string, string>;
}

export interface TemplateHelpers {
  reorderStructFields(fields: readonly Field[]): Field[];
  typeIdOf(type: FieldType): TypeId;
  typeIdToGoType(typeId: string): string;
  extractEnvelopes(document: IdlDocument): EnvelopeMatch;
  isBinaryOrStringType(type: FieldType): boolean;
  exportName(name: string): string;
  toPackageNames(imports: ReadonlyMap<string, string>): string[];
  envelopeFieldName(role: EnvelopeRole): string;
  version(): string;
  generateFastApis(): boolean;
  runtimeImport(): string;
  protectionSymbol(): string;
}

export interface GoTemplates {
  file: FileTemplateData;
  imports: ReadonlyMap<string, string>;
  'fast-write': StructLike;
  'field-write': Field;
  envelope: EnvelopeMatch;
}

export type GoTemplateSet = TemplateSet<GoTemplates, TemplateHelpers>;

// Local name the runtime package is imported under
export const RUNTIME_ALIAS = 'codec';

// Package names every generated file already imports
export const RESERVED_PACKAGE_NAMES: ReadonlySet<string> = new Set(['fmt', RUNTIME_ALIAS]);

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function createGoTemplates(helpers: TemplateHelpers): GoTemplateSet {
  const templates = new TemplateSet<GoTemplates, TemplateHelpers>(helpers);

  templates.define('file', ({ document, pkgName, imports }, { helpers, include }) => {
    const protection = helpers.protectionSymbol();
    const references = [
      '_ = fmt.Sprintf',
      `_ = ${RUNTIME_ALIAS}.Binary`,
      ...helpers.toPackageNames(imports).map(name => `_ = ${name}.${protection}`)
    ];

    const sections = [
      `// Code generated by idl-patch v${helpers.version()}. DO NOT EDIT.`,
      '',
      `package ${pkgName}`,
      '',
      include('imports', imports),
      '',
      'var (',
      ...indent(references),
      ')'
    ];

    if (helpers.generateFastApis()) {
      for (const structLike of document.structLikes) {
        sections.push('', include('fast-write', structLike));
      }
    }

    const envelope = include('envelope', helpers.extractEnvelopes(document));
    if (envelope.length > 0) {
      sections.push('', envelope);
    }

    return sections.join('\n') + '\n';
  });

  templates.define('imports', (imports, { helpers }) => {
    const external = [...imports.entries()]
      .sort(([a], [b]) => compareCodeUnits(a, b))
      .map(([importPath, alias]) => (alias ? `${alias} "${importPath}"` : `"${importPath}"`));

    return [
      'import (',
      '\t"fmt"',
      '',
      ...indent([`${RUNTIME_ALIAS} "${helpers.runtimeImport()}"`, ...external]),
      ')'
    ].join('\n');
  });

  templates.define('fast-write', (structLike, { helpers, include }) => {
    const goName = helpers.exportName(structLike.name);
    const body = helpers.reorderStructFields(structLike.fields).map(field => include('field-write', field));

    return [
      `// FastWrite encodes ${goName} with its fixed-width fields first.`,
      `func (p *${goName}) FastWrite(b []byte) int {`,
      '\toff := 0',
      ...body,
      `\toff += ${RUNTIME_ALIAS}.Binary.WriteFieldStop(b[off:])`,
      '\treturn off',
      '}'
    ].join('\n');
  });

  templates.define('field-write', (field, { helpers }) => {
    const typeId = helpers.typeIdOf(field.type);
    const goType = helpers.typeIdToGoType(typeId);
    const goName = helpers.exportName(field.name);
    const optional = field.requiredness === 'optional';
    // Optional scalars are pointers in the generated structs; binary stays a slice
    const value = optional && goType !== '' && typeId !== 'Binary' ? `*p.${goName}` : `p.${goName}`;
    const typeConstant = `${RUNTIME_ALIAS}.${typeId.toUpperCase()}`;

    let write: string;
    if (helpers.isBinaryOrStringType(field.type)) {
      write = `${RUNTIME_ALIAS}.Binary.Write${typeId}Nocopy(b[off:], ${goType}(${value}))`;
    } else if (goType) {
      write = `${RUNTIME_ALIAS}.Binary.Write${typeId}(b[off:], ${goType}(${value}))`;
    } else if (typeId === 'Struct') {
      write = `${value}.FastWrite(b[off:])`;
    } else {
      write = `${RUNTIME_ALIAS}.Binary.WriteValue(b[off:], ${typeConstant}, ${value})`;
    }

    const lines = [
      `\toff += ${RUNTIME_ALIAS}.Binary.WriteFieldBegin(b[off:], ${typeConstant}, ${field.id})`,
      `\toff += ${write}`
    ];
    if (!optional && typeId !== 'Struct') {
      return lines.join('\n');
    }

    // Unset optional fields and nil struct pointers are skipped
    return [`\tif p.IsSet${goName}() {`, ...indent(lines), '\t}'].join('\n');
  });

  templates.define('envelope', ({ requests, responses }, { helpers }) => {
    const accessors: string[] = [];
    const roles: Array<[EnvelopeRole, StructLike[]]> = [['request', requests], ['response', responses]];

    for (const [role, structLikes] of roles) {
      const fieldName = helpers.exportName(helpers.envelopeFieldName(role));
      for (const structLike of structLikes) {
        const goName = helpers.exportName(structLike.name);
        accessors.push([
          `// GetOrSet${fieldName} returns the ${role} envelope of ${goName}.`,
          `func (p *${goName}) GetOrSet${fieldName}() interface{} {`,
          `\treturn p.${fieldName}`,
          '}'
        ].join('\n'));
      }
    }

    return accessors.join('\n\n');
  });

  return templates;
}
