import { describe, it, expect } from 'vitest';
import { OutputPlanner, renderProtection } from '../src/project/output-planner';

describe('OutputPlanner', () => {
  it('should prefix the document file name and place the protection file beside it', () => {
    const planner = new OutputPlanner();

    const plan = planner.plan('/out/pkg/a.go', 'pkg');
    expect(plan.target).toBe('/out/pkg/generated-a.go');
    expect(plan.directory).toBe('/out/pkg');
    expect(plan.protectionPath).toBe('/out/pkg/generated-consts.go');
    expect(plan.protection).toEqual({
      name: '/out/pkg/generated-consts.go',
      content: renderProtection('pkg', 'GeneratedUnusedProtection')
    });
  });

  it('should create the protection unit once per directory', () => {
    const planner = new OutputPlanner();

    const first = planner.plan('/out/pkg/a.go', 'pkg');
    const second = planner.plan('/out/pkg/b.go', 'pkg');
    const other = planner.plan('/out/other/c.go', 'other');

    expect(first.protection?.name).toBe('/out/pkg/generated-consts.go');
    expect(second.protection).toBeUndefined();
    expect(second.protectionPath).toBe('/out/pkg/generated-consts.go');
    expect(other.protection?.name).toBe('/out/other/generated-consts.go');
    expect(planner.protectionCount).toBe(2);
  });

  it('should move a document named like the protection file to a distinct path', () => {
    const planner = new OutputPlanner();

    const plan = planner.plan('/out/pkg/consts.go', 'pkg');
    expect(plan.protection?.name).toBe('/out/pkg/generated-consts.go');
    expect(plan.target).toBe('/out/pkg/generated-consts_.go');
  });

  it('should honour custom names', () => {
    const planner = new OutputPlanner({
      outputPrefix: 'k-',
      protectionFileName: 'k-consts.go',
      protectionSymbol: 'KeepImports'
    });

    const plan = planner.plan('out/echo/echo.go', 'echo');
    expect(plan.target).toBe('out/echo/k-echo.go');
    expect(plan.protection?.name).toBe('out/echo/k-consts.go');
    expect(plan.protection?.content).toContain('var KeepImports = struct{}{}');
  });
});

describe('renderProtection', () => {
  it('should declare the package and the placeholder symbol', () => {
    expect(renderProtection('echo', 'GeneratedUnusedProtection')).toBe(
      [
        'package echo',
        '',
        "// GeneratedUnusedProtection is used to prevent 'imported and not used' error.",
        'var GeneratedUnusedProtection = struct{}{}',
        ''
      ].join('\n')
    );
  });
});
