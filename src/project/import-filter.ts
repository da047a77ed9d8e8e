// Pruning of resolved imports before they reach the file template

export const LEGACY_RUNTIME_IMPORT = 'github.com/apache/thrift/lib/go/thrift';
export const GENERATOR_SUPPORT_PREFIX = 'github.com/cloudwego/thriftgo';

export interface ImportFilterPolicy {
  // Go module the generated code lives in; its packages are never imported by path
  module?: string;
  legacyRuntimeImport?: string;
  generatorSupportPrefix?: string;
}

function isModuleLocal(importPath: string, module: string | undefined): boolean {
  if (!module) {
    return false;
  }
  return importPath === module || importPath.startsWith(`${module}/`);
}

// Standard library paths have no host-like segment ('fmt', 'encoding/json')
function isStandardLibrary(importPath: string): boolean {
  return !importPath.split('/').some(segment => segment.includes('.'));
}

/**
 * Returns a copy of `imports` (path -> alias) without the module's own packages,
 * the legacy runtime, generator-support packages and standard library paths. The
 * file template imports the runtime and the standard library itself under fixed
 * names, so keeping these entries would produce duplicate imports.
 */
export function filterImports(
  imports: ReadonlyMap<string, string>,
  policy: ImportFilterPolicy = {}
): Map<string, string> {
  const legacyRuntimeImport = policy.legacyRuntimeImport ?? LEGACY_RUNTIME_IMPORT;
  const generatorSupportPrefix = policy.generatorSupportPrefix ?? GENERATOR_SUPPORT_PREFIX;
  const filtered = new Map<string, string>();

  for (const [importPath, alias] of imports) {
    if (isModuleLocal(importPath, policy.module)) {
      continue;
    }
    if (importPath === legacyRuntimeImport) {
      continue;
    }
    if (generatorSupportPrefix && importPath.startsWith(generatorSupportPrefix)) {
      continue;
    }
    if (isStandardLibrary(importPath)) {
      continue;
    }
    filtered.set(importPath, alias);
  }

  return filtered;
}

/**
 * Local package names the generated file refers to for each import: the alias
 * when one is set, otherwise the lower-cased last path segment. Sorted.
 */
export function toPackageNames(imports: ReadonlyMap<string, string>): string[] {
  const names: string[] = [];
  for (const [importPath, alias] of imports) {
    if (alias !== '') {
      names.push(alias);
    } else {
      const segments = importPath.split('/');
      names.push(segments[segments.length - 1].toLowerCase());
    }
  }
  return names.sort();
}
