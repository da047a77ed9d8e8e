// Main exports for idl-patch

export * from './types';
export * from './errors';
export { Patcher, patch, DEFAULT_RUNTIME_IMPORT, type PatcherOptions } from './patcher';
export { logger, Logger, LogLevel } from './logger';
export { classifyField, reorderStructFields, type FixedLengthPredicate } from './codegen/field-reorder';
export { extractEnvelopes, envelopeFieldName, DEFAULT_ENVELOPE_RULES } from './codegen/envelope';
export { typeIdOf, typeIdToGoType, type TypeId } from './codegen/type-mapping';
export { TemplateSet, type TemplateBody, type TemplateScope } from './codegen/template-set';
export { createGoTemplates, type GoTemplates, type TemplateHelpers } from './codegen/go-templates';
export { filterImports, toPackageNames, LEGACY_RUNTIME_IMPORT, GENERATOR_SUPPORT_PREFIX, type ImportFilterPolicy } from './project/import-filter';
export { OutputPlanner, renderProtection, type OutputPlan, type OutputPlannerOptions } from './project/output-planner';
export { depthFirstSearch } from './project/document-walker';
export { DefaultCodeUtils, type CodeUtils, type Scope } from './project/code-utils';
export { loadPatchRequest, readPatchRequest, patchRequestSchema, type PatchRequestJson } from './project/request-loader';
export { writeOutputUnits } from './output-writer';
