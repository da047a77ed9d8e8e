import { promises as fs } from 'fs';
import path from 'path';
import type { OutputUnit } from './types';
import { logger } from './logger';

export interface OutputWriterOptions {
  // Directory relative unit names are resolved against (defaults to the working directory)
  baseDir?: string;
}

export interface OutputWriterResult {
  writtenFiles: string[];
}

export async function writeOutputUnits(
  units: readonly OutputUnit[],
  options: OutputWriterOptions = {}
): Promise<OutputWriterResult> {
  const baseDir = path.resolve(options.baseDir ?? '.');
  const writtenFiles: string[] = [];

  for (const unit of units) {
    const target = path.resolve(baseDir, unit.name);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, unit.content);
    logger.info(`Generated ${target}`);
    writtenFiles.push(target);
  }

  return { writtenFiles };
}
