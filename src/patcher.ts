// Main patcher interface: one generated Go companion file per IDL document

import { promises as fs } from 'fs';
import path from 'path';
import { EnvelopeRule, IdlDocument, OutputUnit, PatchRequest, namespaceOrReferenceName } from './types';
import {
  GenerationError,
  ImportResolutionError,
  OutputConflictError,
  RenderError,
  ScopeResolutionError,
  SourceReadError,
  TypeClassificationError,
  describeError
} from './errors';
import { CodeUtils } from './project/code-utils';
import { depthFirstSearch } from './project/document-walker';
import {
  GENERATOR_SUPPORT_PREFIX,
  ImportFilterPolicy,
  LEGACY_RUNTIME_IMPORT,
  filterImports,
  toPackageNames
} from './project/import-filter';
import {
  DEFAULT_OUTPUT_PREFIX,
  DEFAULT_PROTECTION_FILE_NAME,
  DEFAULT_PROTECTION_SYMBOL,
  OutputPlanner
} from './project/output-planner';
import { DEFAULT_ENVELOPE_RULES, envelopeFieldName, extractEnvelopes } from './codegen/envelope';
import { reorderStructFields } from './codegen/field-reorder';
import {
  FileTemplateData,
  GoTemplateSet,
  RESERVED_PACKAGE_NAMES,
  TemplateHelpers,
  createGoTemplates
} from './codegen/go-templates';
import { typeIdOf, typeIdToGoType } from './codegen/type-mapping';
import { getVersion } from './version';
import { logger } from './logger';

export const DEFAULT_RUNTIME_IMPORT = 'github.com/cloudwego/gopkg/protocol/thrift';

export interface PatcherOptions {
  // Go module of the generated code; imports inside it are dropped
  module?: string;
  noFastApi?: boolean;
  // Also emit each IDL source next to its generated code
  copyIdl?: boolean;
  version?: string;
  outputPrefix?: string;
  protectionFileName?: string;
  protectionSymbol?: string;
  legacyRuntimeImport?: string;
  generatorSupportPrefix?: string;
  runtimeImport?: string;
  envelopeRules?: readonly EnvelopeRule[];
  readSource?: (filename: string) => Promise<string>;
}

type ResolvedPatcherOptions = Required<Omit<PatcherOptions, 'module'>> & Pick<PatcherOptions, 'module'>;

export class Patcher {
  private readonly options: ResolvedPatcherOptions;

  constructor(private readonly utils: CodeUtils, options: PatcherOptions = {}) {
    this.options = {
      noFastApi: false,
      copyIdl: false,
      outputPrefix: DEFAULT_OUTPUT_PREFIX,
      protectionFileName: DEFAULT_PROTECTION_FILE_NAME,
      protectionSymbol: DEFAULT_PROTECTION_SYMBOL,
      legacyRuntimeImport: LEGACY_RUNTIME_IMPORT,
      generatorSupportPrefix: GENERATOR_SUPPORT_PREFIX,
      runtimeImport: DEFAULT_RUNTIME_IMPORT,
      envelopeRules: DEFAULT_ENVELOPE_RULES,
      readSource: filename => fs.readFile(filename, 'utf8'),
      ...options,
      version: options.version ?? getVersion()
    };
  }

  /**
   * Generates the output units for every document reachable from `request.roots`.
   * Units come back in generation order; the first failure rejects the whole run.
   */
  async patch(request: PatchRequest): Promise<OutputUnit[]> {
    logger.debug('building templates');
    const templates = this.buildTemplates();
    const planner = new OutputPlanner({
      outputPrefix: this.options.outputPrefix,
      protectionFileName: this.options.protectionFileName,
      protectionSymbol: this.options.protectionSymbol
    });
    const units: OutputUnit[] = [];
    const emitted = new Set<string>();

    const append = (unit: OutputUnit, document: IdlDocument): void => {
      if (emitted.has(unit.name)) {
        throw new OutputConflictError(`output "${unit.name}" is produced twice (while generating "${document.filename}")`, document.filename);
      }
      emitted.add(unit.name);
      units.push(unit);
    };

    for (const document of depthFirstSearch(request.roots)) {
      logger.debug(`patching ${document.filename}`);

      const { pkgName, relativePath } = this.resolveScope(document);
      const plan = planner.plan(path.join(request.outputPath, relativePath), pkgName);
      if (plan.protection) {
        append(plan.protection, document);
      }

      const imports = this.resolveImports(document);
      const content = this.render(templates, { document, pkgName, imports });
      append({ name: plan.target, content }, document);

      if (this.options.copyIdl) {
        const source = await this.readSource(document);
        append({ name: path.join(plan.directory, path.basename(document.filename)), content: source }, document);
      }
    }

    logger.debug(`generated ${units.length} output unit(s) in ${planner.protectionCount} package(s)`);
    return units;
  }

  private buildTemplates(): GoTemplateSet {
    const rules = this.options.envelopeRules;
    const helpers: TemplateHelpers = {
      reorderStructFields: fields => this.classify(() => reorderStructFields(fields, type => this.utils.isFixedLengthType(type))),
      typeIdOf,
      typeIdToGoType,
      extractEnvelopes: document => extractEnvelopes(document.structLikes, name => this.utils.unexport(name), rules),
      isBinaryOrStringType: type => this.classify(() => this.utils.isBinaryType(type) || this.utils.isStringType(type)),
      exportName: name => this.utils.exportName(name),
      toPackageNames,
      envelopeFieldName: role => envelopeFieldName(role, rules),
      version: () => this.options.version,
      generateFastApis: () => !this.options.noFastApi,
      runtimeImport: () => this.options.runtimeImport,
      protectionSymbol: () => this.options.protectionSymbol
    };
    return createGoTemplates(helpers);
  }

  private resolveScope(document: IdlDocument): { pkgName: string; relativePath: string } {
    try {
      this.utils.setRootScope(this.utils.buildScope(document));
      const pkgName = this.utils.namespaceToPackage(namespaceOrReferenceName(document, 'go'));
      const relativePath = this.utils.getFilePath(document);
      return { pkgName, relativePath };
    } catch (error) {
      throw new ScopeResolutionError(`build scope for "${document.filename}": ${describeError(error)}`, document.filename, { cause: error });
    }
  }

  private resolveImports(document: IdlDocument): Map<string, string> {
    let resolved: Map<string, string>;
    try {
      resolved = this.utils.resolveImports();
    } catch (error) {
      throw new ImportResolutionError(`resolve imports failed for "${document.filename}": ${describeError(error)}`, document.filename, { cause: error });
    }
    const imports = filterImports(resolved, this.filterPolicy());
    for (const name of toPackageNames(imports)) {
      if (RESERVED_PACKAGE_NAMES.has(name)) {
        throw new ImportResolutionError(
          `resolve imports failed for "${document.filename}": package name '${name}' clashes with a generated import`,
          document.filename
        );
      }
    }
    return imports;
  }

  private filterPolicy(): ImportFilterPolicy {
    return {
      module: this.options.module,
      legacyRuntimeImport: this.options.legacyRuntimeImport,
      generatorSupportPrefix: this.options.generatorSupportPrefix
    };
  }

  private render(templates: GoTemplateSet, data: FileTemplateData): string {
    const filename = data.document.filename;
    try {
      return templates.execute('file', data);
    } catch (error) {
      if (error instanceof TypeClassificationError) {
        throw new TypeClassificationError(`classify field types in "${filename}": ${error.message}`, filename, { cause: error });
      }
      throw new RenderError(`"${filename}": ${describeError(error)}`, filename, { cause: error });
    }
  }

  private async readSource(document: IdlDocument): Promise<string> {
    try {
      return await this.options.readSource(document.filename);
    } catch (error) {
      throw new SourceReadError(`read "${document.filename}": ${describeError(error)}`, document.filename, { cause: error });
    }
  }

  // Type predicate failures surface as classification errors, not template errors
  private classify<T>(query: () => T): T {
    try {
      return query();
    } catch (error) {
      if (error instanceof GenerationError) {
        throw new TypeClassificationError(error.message, error.filename, { cause: error });
      }
      throw new TypeClassificationError(describeError(error), undefined, { cause: error });
    }
  }
}

// Convenience function for one-off runs
export function patch(utils: CodeUtils, request: PatchRequest, options?: PatcherOptions): Promise<OutputUnit[]> {
  const patcher = new Patcher(utils, options);
  return patcher.patch(request);
}
