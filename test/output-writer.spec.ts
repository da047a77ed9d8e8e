import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { writeOutputUnits } from '../src/output-writer';
import { logger, LogLevel } from '../src/logger';

describe('writeOutputUnits', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'idl-patch-write-'));
    logger.setLevel(LogLevel.SILENT);
  });

  afterEach(async () => {
    logger.setLevel(LogLevel.INFO);
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create directories and write each unit', async () => {
    const result = await writeOutputUnits(
      [
        { name: 'echo/generated-consts.go', content: 'package echo\n' },
        { name: 'echo/nested/generated-echo.go', content: 'package nested\n' }
      ],
      { baseDir: tempDir }
    );

    expect(result.writtenFiles).toEqual([
      path.join(tempDir, 'echo', 'generated-consts.go'),
      path.join(tempDir, 'echo', 'nested', 'generated-echo.go')
    ]);
    expect(await fs.readFile(path.join(tempDir, 'echo', 'generated-consts.go'), 'utf8')).toBe('package echo\n');
    expect(await fs.readFile(path.join(tempDir, 'echo', 'nested', 'generated-echo.go'), 'utf8')).toBe('package nested\n');
  });

  it('should keep absolute unit names as they are', async () => {
    const target = path.join(tempDir, 'abs', 'a.go');

    const result = await writeOutputUnits([{ name: target, content: 'package abs\n' }], { baseDir: '/unused' });

    expect(result.writtenFiles).toEqual([target]);
    expect(await fs.readFile(target, 'utf8')).toBe('package abs\n');
  });

  it('should overwrite existing files', async () => {
    const target = path.join(tempDir, 'a.go');
    await fs.writeFile(target, 'stale');

    await writeOutputUnits([{ name: 'a.go', content: 'fresh' }], { baseDir: tempDir });

    expect(await fs.readFile(target, 'utf8')).toBe('fresh');
  });
});
