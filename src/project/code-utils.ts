// Go naming and type queries over parsed IDL documents

import { FieldType, IdlDocument, StructLike, namespaceOrReferenceName, referenceName } from '../types';
import { ImportResolutionError, ScopeResolutionError, TypeClassificationError } from '../errors';
import { LEGACY_RUNTIME_IMPORT } from './import-filter';

export interface Scope {
  document: IdlDocument;
  packageName: string;
  importPath: string;
}

/**
 * What the patcher needs from the naming/scope resolver and the type checker.
 * Every method may throw; the patcher attributes the failure to the current document.
 */
export interface CodeUtils {
  buildScope(document: IdlDocument): Scope;
  setRootScope(scope: Scope): void;
  // Import path -> alias (empty when the package name matches the last path segment)
  resolveImports(): Map<string, string>;
  namespaceToPackage(namespace: string): string;
  // Output path relative to the request's output directory
  getFilePath(document: IdlDocument): string;
  isFixedLengthType(type: FieldType): boolean;
  isBinaryType(type: FieldType): boolean;
  isStringType(type: FieldType): boolean;
  unexport(name: string): string;
  exportName(name: string): string;
}

export interface DefaultCodeUtilsOptions {
  // Import path generated packages live under, e.g. 'example.com/mod/gen'
  packagePrefix?: string;
}

const GO_KEYWORDS = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else', 'fallthrough', 'for',
  'func', 'go', 'goto', 'if', 'import', 'interface', 'map', 'package', 'range', 'return',
  'select', 'struct', 'switch', 'type', 'var'
]);

// Imports the Go backend always needs besides the included packages
const RUNTIME_IMPORTS = ['fmt', 'strings', LEGACY_RUNTIME_IMPORT];

export class DefaultCodeUtils implements CodeUtils {
  private readonly packagePrefix: string;
  private rootScope?: Scope;

  constructor(options: DefaultCodeUtilsOptions = {}) {
    this.packagePrefix = (options.packagePrefix ?? '').replace(/\/+$/, '');
  }

  buildScope(document: IdlDocument): Scope {
    const namespace = namespaceOrReferenceName(document, 'go');
    this.namespaceSegments(namespace);

    const seen = new Map<string, IdlDocument>();
    for (const include of document.includes) {
      const name = referenceName(include.document);
      const previous = seen.get(name);
      if (previous && previous !== include.document) {
        throw new ScopeResolutionError(`ambiguous include reference '${name}' (${previous.filename}, ${include.document.filename})`, document.filename);
      }
      seen.set(name, include.document);
    }

    return {
      document,
      packageName: this.namespaceToPackage(namespace),
      importPath: this.importPathOf(document)
    };
  }

  setRootScope(scope: Scope): void {
    this.rootScope = scope;
  }

  resolveImports(): Map<string, string> {
    const root = this.rootScope;
    if (!root) {
      throw new ImportResolutionError('root scope is not set');
    }

    const imports = new Map<string, string>();
    for (const runtimeImport of RUNTIME_IMPORTS) {
      imports.set(runtimeImport, '');
    }

    const localNames = new Map<string, string>();
    for (const include of root.document.includes) {
      const importPath = this.importPathOf(include.document);
      if (importPath === root.importPath || imports.has(importPath)) {
        continue;
      }
      const packageName = this.namespaceToPackage(namespaceOrReferenceName(include.document, 'go'));
      const lastSegment = importPath.slice(importPath.lastIndexOf('/') + 1).toLowerCase();
      const alias = packageName === lastSegment ? '' : packageName;

      const claimedBy = localNames.get(packageName);
      if (claimedBy !== undefined) {
        throw new ImportResolutionError(`package name '${packageName}' is imported from both ${claimedBy} and ${importPath}`, root.document.filename);
      }
      localNames.set(packageName, importPath);
      imports.set(importPath, alias);
    }

    return imports;
  }

  namespaceToPackage(namespace: string): string {
    const segments = namespace.split('.').filter(segment => segment.length > 0);
    const last = segments.length > 0 ? segments[segments.length - 1] : namespace;
    return this.sanitizeIdentifier(last.toLowerCase());
  }

  getFilePath(document: IdlDocument): string {
    const segments = this.namespaceSegments(namespaceOrReferenceName(document, 'go'));
    return [...segments, `${referenceName(document)}.go`].join('/');
  }

  isFixedLengthType(type: FieldType): boolean {
    return this.fixedLength(type, new Set());
  }

  isBinaryType(type: FieldType): boolean {
    return type.category === 'binary';
  }

  isStringType(type: FieldType): boolean {
    return type.category === 'string';
  }

  unexport(name: string): string {
    const exported = this.exportName(name);
    return exported.charAt(0).toLowerCase() + exported.slice(1);
  }

  /**
   * Go identifier for an IDL name: snake_case parts are joined in CamelCase and
   * the first letter is upper-cased ('base_resp' and 'baseResp' both give 'BaseResp').
   */
  exportName(name: string): string {
    const parts = name.split('_').filter(part => part.length > 0);
    const joined = parts.map(part => part.charAt(0).toUpperCase() + part.slice(1)).join('');
    return joined.length > 0 ? joined : '_';
  }

  private fixedLength(type: FieldType, visiting: Set<StructLike>): boolean {
    switch (type.category) {
      case 'bool':
      case 'byte':
      case 'i16':
      case 'i32':
      case 'i64':
      case 'double':
      case 'enum':
        return true;
      case 'string':
      case 'binary':
      case 'list':
      case 'set':
      case 'map':
      case 'union':
        return false;
      case 'struct':
      case 'exception': {
        const target = type.structLike;
        if (!target) {
          throw new TypeClassificationError(`unresolved type reference '${type.name}'`);
        }
        if (target.category === 'union') {
          return false;
        }
        if (visiting.has(target)) {
          throw new TypeClassificationError(`type '${type.name}' contains itself`);
        }
        visiting.add(target);
        // Every field is visited so a self-reference is found wherever it is declared
        let fixed = true;
        for (const field of target.fields) {
          if (!this.fixedLength(field.type, visiting)) {
            fixed = false;
          }
        }
        visiting.delete(target);
        return fixed;
      }
    }
  }

  private importPathOf(document: IdlDocument): string {
    const relative = this.namespaceSegments(namespaceOrReferenceName(document, 'go')).join('/');
    return this.packagePrefix ? `${this.packagePrefix}/${relative}` : relative;
  }

  private namespaceSegments(namespace: string): string[] {
    const segments = namespace.split('.');
    if (segments.some(segment => segment.trim().length === 0)) {
      throw new ScopeResolutionError(`invalid go namespace '${namespace}'`);
    }
    return segments;
  }

  private sanitizeIdentifier(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9_]/g, '_');
    if (/^[0-9]/.test(sanitized)) {
      sanitized = '_' + sanitized;
    }
    if (sanitized.length === 0) {
      sanitized = '_';
    }
    if (GO_KEYWORDS.has(sanitized)) {
      sanitized = sanitized + '_';
    }
    return sanitized;
  }
}
