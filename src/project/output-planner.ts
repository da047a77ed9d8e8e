// Output naming: prefixed per-document files plus one protection file per directory

import path from 'path';
import { OutputUnit } from '../types';

export interface OutputPlannerOptions {
  outputPrefix?: string;
  protectionFileName?: string;
  protectionSymbol?: string;
}

export interface OutputPlan {
  target: string;
  directory: string;
  protectionPath: string;
  // Present only for the first document planned into `directory`
  protection?: OutputUnit;
}

export const DEFAULT_OUTPUT_PREFIX = 'generated-';
export const DEFAULT_PROTECTION_FILE_NAME = 'generated-consts.go';
export const DEFAULT_PROTECTION_SYMBOL = 'GeneratedUnusedProtection';

export function renderProtection(packageName: string, symbol: string): string {
  return [
    `package ${packageName}`,
    '',
    `// ${symbol} is used to prevent 'imported and not used' error.`,
    `var ${symbol} = struct{}{}`,
    ''
  ].join('\n');
}

export class OutputPlanner {
  private readonly outputPrefix: string;
  private readonly protectionFileName: string;
  private readonly protectionSymbol: string;
  private readonly protections = new Map<string, OutputUnit>();

  constructor(options: OutputPlannerOptions = {}) {
    this.outputPrefix = options.outputPrefix ?? DEFAULT_OUTPUT_PREFIX;
    this.protectionFileName = options.protectionFileName ?? DEFAULT_PROTECTION_FILE_NAME;
    this.protectionSymbol = options.protectionSymbol ?? DEFAULT_PROTECTION_SYMBOL;
  }

  /**
   * Plans the output of one document whose resolved path is `fullPath`.
   * The protection unit is registered before the document's own name is fixed,
   * so a document named like the protection file is the one that moves.
   */
  plan(fullPath: string, packageName: string): OutputPlan {
    const directory = path.dirname(fullPath);
    const protectionPath = path.join(directory, this.protectionFileName);

    let protection: OutputUnit | undefined;
    if (!this.protections.has(protectionPath)) {
      protection = {
        name: protectionPath,
        content: renderProtection(packageName, this.protectionSymbol)
      };
      this.protections.set(protectionPath, protection);
    }

    let target = path.join(directory, this.outputPrefix + path.basename(fullPath));
    if (target === protectionPath) {
      const extension = path.extname(target);
      target = `${target.slice(0, target.length - extension.length)}_${extension}`;
    }

    return { target, directory, protectionPath, protection };
  }

  get protectionCount(): number {
    return this.protections.size;
  }
}
