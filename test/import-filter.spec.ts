import { describe, it, expect } from 'vitest';
import {
  GENERATOR_SUPPORT_PREFIX,
  LEGACY_RUNTIME_IMPORT,
  filterImports,
  toPackageNames
} from '../src/project/import-filter';

describe('filterImports', () => {
  it('should drop standard library, module-local and legacy runtime imports', () => {
    const imports = new Map([
      ['std/strings', ''],
      ['example.com/mod/gen', 'gen'],
      ['github.com/apache/thrift/lib/go/thrift', '']
    ]);

    expect(filterImports(imports, { module: 'example.com/mod' })).toEqual(new Map());
  });

  it('should keep external packages with a host-like segment', () => {
    const imports = new Map([
      ['fmt', ''],
      ['encoding/json', ''],
      ['example.com/mod/gen/echo', ''],
      ['example.com/other/gen/base', ''],
      ['github.com/cloudwego/thriftgo/generator/golang/extension/unknown', ''],
      [`${GENERATOR_SUPPORT_PREFIX}/parser`, 'parser'],
      ['gopkg.in/yaml.v3', 'yaml']
    ]);

    const filtered = filterImports(imports, { module: 'example.com/mod' });
    expect([...filtered.entries()]).toEqual([
      ['example.com/other/gen/base', ''],
      ['gopkg.in/yaml.v3', 'yaml']
    ]);
  });

  it('should leave no entry that any rule would remove', () => {
    const module = 'example.com/mod';
    const imports = new Map([
      ['context', ''],
      ['example.com/mod', ''],
      ['example.com/mod/a', ''],
      ['example.com/module/b', ''],
      [LEGACY_RUNTIME_IMPORT, 'thrift'],
      ['github.com/cloudwego/thriftgo-ext/x', ''],
      ['internal/local/pkg', ''],
      ['github.com/acme/lib', '']
    ]);

    const filtered = filterImports(imports, { module });
    for (const importPath of filtered.keys()) {
      expect(importPath === module || importPath.startsWith(`${module}/`)).toBe(false);
      expect(importPath).not.toBe(LEGACY_RUNTIME_IMPORT);
      expect(importPath.startsWith(GENERATOR_SUPPORT_PREFIX)).toBe(false);
      expect(importPath.split('/').some(segment => segment.includes('.'))).toBe(true);
    }
    expect([...filtered.keys()]).toEqual(['example.com/module/b', 'github.com/acme/lib']);
  });

  it('should keep module paths when no module is configured', () => {
    const imports = new Map([['example.com/mod/gen', 'gen']]);

    expect(filterImports(imports)).toEqual(new Map([['example.com/mod/gen', 'gen']]));
  });

  it('should honour a custom legacy runtime path and support prefix', () => {
    const imports = new Map([
      [LEGACY_RUNTIME_IMPORT, ''],
      ['example.org/legacy/runtime', ''],
      ['example.org/tools/gen', '']
    ]);

    const filtered = filterImports(imports, {
      legacyRuntimeImport: 'example.org/legacy/runtime',
      generatorSupportPrefix: 'example.org/tools'
    });
    expect([...filtered.keys()]).toEqual([LEGACY_RUNTIME_IMPORT]);
  });

  it('should not modify its input', () => {
    const imports = new Map([['fmt', ''], ['github.com/acme/lib', '']]);

    filterImports(imports);
    expect(imports.size).toBe(2);
  });
});

describe('toPackageNames', () => {
  it('should use aliases or the lower-cased last path segment, sorted', () => {
    const imports = new Map([
      ['github.com/acme/Widgets', ''],
      ['example.com/other/gen/base', ''],
      ['gopkg.in/yaml.v3', 'yaml']
    ]);

    expect(toPackageNames(imports)).toEqual(['base', 'widgets', 'yaml']);
  });
});
