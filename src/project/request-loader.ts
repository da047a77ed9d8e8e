// Loading of JSON patch requests: validated with zod, then linked into documents

import { promises as fs } from 'fs';
import path from 'path';
import { z, type ZodIssue } from 'zod';
import {
  BaseTypeCategory,
  Field,
  FieldType,
  IdlDocument,
  PatchRequest,
  StructLike,
  referenceName
} from '../types';
import { RequestError, describeError } from '../errors';

type TypeJson = string | { list: TypeJson } | { set: TypeJson } | { map: [TypeJson, TypeJson] };

const typeSchema: z.ZodType<TypeJson> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z.object({ list: typeSchema }).strict(),
    z.object({ set: typeSchema }).strict(),
    z.object({ map: z.tuple([typeSchema, typeSchema]) }).strict()
  ])
);

const fieldSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  type: typeSchema,
  requiredness: z.enum(['required', 'optional', 'default']).optional()
});

const structSchema = z.object({
  name: z.string().min(1),
  category: z.enum(['struct', 'union', 'exception']).default('struct'),
  fields: z.array(fieldSchema).default([])
});

const documentSchema = z.object({
  filename: z.string().min(1),
  namespaces: z.record(z.string()).default({}),
  includes: z.array(z.string()).default([]),
  enums: z.array(z.string()).default([]),
  structs: z.array(structSchema).default([])
});

export const patchRequestSchema = z.object({
  outputPath: z.string().default('.'),
  roots: z.array(z.string()).optional(),
  documents: z.array(documentSchema).min(1)
});

export type PatchRequestJson = z.input<typeof patchRequestSchema>;

export interface LoadOptions {
  // Directory relative document filenames and the output path are resolved against
  baseDir?: string;
}

const BASE_TYPES: ReadonlySet<string> = new Set<BaseTypeCategory>(['bool', 'byte', 'i16', 'i32', 'i64', 'double', 'string', 'binary']);

function isBaseType(name: string): name is BaseTypeCategory {
  return BASE_TYPES.has(name);
}

function formatIssue(issue: ZodIssue): string {
  const fieldPath = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${fieldPath}: ${issue.message}`;
}

interface DocumentEntry {
  document: IdlDocument;
  enums: Set<string>;
  structs: Map<string, StructLike>;
}

/**
 * Validates `input` and builds the linked document graph it describes.
 * Includes and field types are resolved by name; anything unresolved is
 * reported together in one RequestError.
 */
export function loadPatchRequest(input: unknown, options: LoadOptions = {}): PatchRequest {
  const parsed = patchRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    throw new RequestError(`Invalid patch request: ${issues.join('; ')}`, issues);
  }

  const resolvePath = (relative: string): string =>
    options.baseDir ? path.resolve(options.baseDir, relative) : relative;

  const issues: string[] = [];
  const entries = new Map<string, DocumentEntry>();

  // Pass 1: documents and empty records, so includes and types can point anywhere
  for (const json of parsed.data.documents) {
    const filename = resolvePath(json.filename);
    if (entries.has(filename)) {
      issues.push(`duplicate document '${json.filename}'`);
      continue;
    }
    const structs = new Map<string, StructLike>();
    for (const structJson of json.structs) {
      if (structs.has(structJson.name)) {
        issues.push(`${json.filename}: duplicate type '${structJson.name}'`);
        continue;
      }
      structs.set(structJson.name, { name: structJson.name, category: structJson.category, fields: [] });
    }
    entries.set(filename, {
      document: {
        filename,
        namespaces: new Map(Object.entries(json.namespaces)),
        includes: [],
        structLikes: [...structs.values()]
      },
      enums: new Set(json.enums),
      structs
    });
  }

  // Pass 2: includes
  for (const json of parsed.data.documents) {
    const entry = entries.get(resolvePath(json.filename));
    if (!entry) {
      continue;
    }
    for (const includePath of json.includes) {
      const included = entries.get(resolvePath(includePath));
      if (!included) {
        issues.push(`${json.filename}: include '${includePath}' is not a document of this request`);
        continue;
      }
      entry.document.includes.push({ path: includePath, document: included.document });
    }
  }

  // Pass 3: fields
  for (const json of parsed.data.documents) {
    const entry = entries.get(resolvePath(json.filename));
    if (!entry) {
      continue;
    }
    for (const structJson of json.structs) {
      const structLike = entry.structs.get(structJson.name);
      if (!structLike) {
        continue;
      }
      for (const fieldJson of structJson.fields) {
        try {
          const field: Field = {
            id: fieldJson.id,
            name: fieldJson.name,
            type: resolveType(fieldJson.type, entry, entries),
            requiredness: fieldJson.requiredness
          };
          structLike.fields.push(field);
        } catch (error) {
          issues.push(`${json.filename}: ${structJson.name}.${fieldJson.name}: ${describeError(error)}`);
        }
      }
    }
  }

  const roots: IdlDocument[] = [];
  const rootNames = parsed.data.roots ?? parsed.data.documents.map(json => json.filename);
  for (const rootName of rootNames) {
    const entry = entries.get(resolvePath(rootName));
    if (entry) {
      roots.push(entry.document);
    } else {
      issues.push(`root '${rootName}' is not a document of this request`);
    }
  }

  if (issues.length > 0) {
    throw new RequestError(`Invalid patch request: ${issues.join('; ')}`, issues);
  }

  return { roots, outputPath: resolvePath(parsed.data.outputPath) };
}

function resolveType(json: TypeJson, entry: DocumentEntry, entries: Map<string, DocumentEntry>): FieldType {
  if (typeof json !== 'string') {
    if ('list' in json) {
      return { name: 'list', category: 'list', valueType: resolveType(json.list, entry, entries) };
    }
    if ('set' in json) {
      return { name: 'set', category: 'set', valueType: resolveType(json.set, entry, entries) };
    }
    return {
      name: 'map',
      category: 'map',
      keyType: resolveType(json.map[0], entry, entries),
      valueType: resolveType(json.map[1], entry, entries)
    };
  }

  if (isBaseType(json)) {
    return { name: json, category: json };
  }

  let owner = entry;
  let localName = json;
  const dotIndex = json.indexOf('.');
  if (dotIndex !== -1) {
    const reference = json.slice(0, dotIndex);
    const include = entry.document.includes.find(candidate => referenceName(candidate.document) === reference);
    const included = include ? entries.get(include.document.filename) : undefined;
    if (!included) {
      throw new Error(`unknown include reference '${reference}' in type '${json}'`);
    }
    owner = included;
    localName = json.slice(dotIndex + 1);
  }

  if (owner.enums.has(localName)) {
    return { name: json, category: 'enum' };
  }
  const structLike = owner.structs.get(localName);
  if (structLike) {
    return { name: json, category: structLike.category, structLike };
  }
  throw new Error(`unknown type '${json}'`);
}

export async function readPatchRequest(requestFile: string): Promise<PatchRequest> {
  let raw: string;
  try {
    raw = await fs.readFile(requestFile, 'utf8');
  } catch (error) {
    throw new RequestError(`Failed to read ${requestFile}: ${describeError(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new RequestError(`Failed to parse ${requestFile}: ${describeError(error)}`);
  }

  return loadPatchRequest(json, { baseDir: path.dirname(path.resolve(requestFile)) });
}
