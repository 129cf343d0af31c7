import { promises as fs } from 'node:fs';
import path from 'node:path';

import { isMap, isNode, isSeq, parseDocument, type Document } from 'yaml';
import type { ZodIssue } from 'zod';

import { DefinitionParseError, SchemaError } from './errors';
import {
  fieldDefinitionSchema,
  fieldKeySchema,
  formatIssue,
  keyedFieldDefinitionSchema,
  schemaCodeForIssue,
  serviceDefinitionSchema,
  serviceIdSchema,
  type FieldDefinition
} from './schema';
import type { FieldSpec, ServiceSpec } from './types';

export interface LoadServiceSpecsOptions {
  /** Ids loaded from earlier documents; redefining one is a duplicate. */
  reservedIds?: Iterable<string>;
}

export interface ServiceSpecLoadResult {
  specs: ServiceSpec[];
  errors: SchemaError[];
}

export interface ServiceDefinitionFile extends ServiceSpecLoadResult {
  path: string;
}

type RawEntry = {
  id: string;
  definition: unknown;
};

type FieldBuild = { ok: true; fields: Record<string, FieldSpec> } | { ok: false; error: SchemaError };

/**
 * A mapping read from YAML with its keys in document order, repeats included.
 * Used for the top-level service map and each `fields` map so a repeated key
 * can be reported against its own service.
 */
class OrderedMapping {
  readonly entries: ReadonlyArray<readonly [string, unknown]>;

  constructor(entries: ReadonlyArray<readonly [string, unknown]>) {
    this.entries = entries;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function issueToSchemaError(serviceId: string, issue: ZodIssue, field?: string, issues?: ZodIssue[]): SchemaError {
  return new SchemaError(schemaCodeForIssue(issue), `Service '${serviceId}': ${formatIssue(issue)}`, {
    serviceId,
    field,
    issues: issues ?? [issue]
  });
}

function toFieldSpec(name: string, definition: FieldDefinition): FieldSpec {
  const field: FieldSpec = {
    name,
    displayName: definition.name ?? name,
    description: definition.description ?? '',
    required: definition.required,
    selector: definition.selector
  };
  if (definition.default !== undefined) {
    field.default = definition.default;
  }
  if (definition.example !== undefined) {
    field.example = definition.example;
  }
  return field;
}

function duplicateField(serviceId: string, key: string): FieldBuild {
  return {
    ok: false,
    error: new SchemaError('duplicate_field_name', `Service '${serviceId}': field '${key}' is declared more than once`, {
      serviceId,
      field: key
    })
  };
}

function buildKeyedFields(serviceId: string, rawFields: unknown[]): FieldBuild {
  const fields: Record<string, FieldSpec> = {};
  for (const [index, rawField] of rawFields.entries()) {
    const parsed = keyedFieldDefinitionSchema.safeParse(rawField);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      const rawKey: unknown = isPlainObject(rawField) ? rawField.key : undefined;
      const key = typeof rawKey === 'string' ? rawKey : `#${index}`;
      return {
        ok: false,
        error: issueToSchemaError(serviceId, { ...issue, path: ['fields', key, ...issue.path] }, key, parsed.error.issues)
      };
    }
    const { key, ...definition } = parsed.data;
    if (Object.prototype.hasOwnProperty.call(fields, key)) {
      return duplicateField(serviceId, key);
    }
    fields[key] = toFieldSpec(key, definition);
  }
  return { ok: true, fields };
}

function buildMappedFields(serviceId: string, entries: Iterable<readonly [string, unknown]>): FieldBuild {
  const fields: Record<string, FieldSpec> = {};
  for (const [key, rawField] of entries) {
    const keyCheck = fieldKeySchema.safeParse(key);
    if (!keyCheck.success) {
      const [issue] = keyCheck.error.issues;
      return {
        ok: false,
        error: issueToSchemaError(serviceId, { ...issue, path: ['fields', key] }, key, keyCheck.error.issues)
      };
    }
    if (Object.prototype.hasOwnProperty.call(fields, key)) {
      return duplicateField(serviceId, key);
    }
    const parsed = fieldDefinitionSchema.safeParse(rawField);
    if (!parsed.success) {
      const [issue] = parsed.error.issues;
      return {
        ok: false,
        error: issueToSchemaError(serviceId, { ...issue, path: ['fields', key, ...issue.path] }, key, parsed.error.issues)
      };
    }
    fields[key] = toFieldSpec(key, parsed.data);
  }
  return { ok: true, fields };
}

function buildFields(serviceId: string, rawFields: unknown): FieldBuild {
  if (rawFields === undefined || rawFields === null) {
    return { ok: true, fields: {} };
  }
  if (Array.isArray(rawFields)) {
    return buildKeyedFields(serviceId, rawFields);
  }
  if (rawFields instanceof OrderedMapping) {
    return buildMappedFields(serviceId, rawFields.entries);
  }
  if (!isPlainObject(rawFields)) {
    return {
      ok: false,
      error: new SchemaError('invalid_definition', `Service '${serviceId}': fields must be a mapping or a list`, {
        serviceId
      })
    };
  }
  return buildMappedFields(serviceId, Object.entries(rawFields));
}

function collectEntries(document: unknown, errors: SchemaError[]): RawEntry[] {
  if (document === undefined || document === null) {
    return [];
  }

  if (Array.isArray(document)) {
    const entries: RawEntry[] = [];
    for (const [index, item] of document.entries()) {
      const id: unknown = isPlainObject(item) ? item.id : undefined;
      if (!isPlainObject(item) || typeof id !== 'string') {
        errors.push(
          new SchemaError('invalid_definition', `Service definition #${index} is missing a string id`, {
            serviceId: `#${index}`
          })
        );
        continue;
      }
      const { id: _id, ...definition } = item;
      entries.push({ id, definition });
    }
    return entries;
  }

  if (document instanceof OrderedMapping) {
    return document.entries.map(([id, definition]) => ({ id, definition }));
  }

  if (isPlainObject(document)) {
    return Object.entries(document).map(([id, definition]) => ({ id, definition }));
  }

  throw new DefinitionParseError('Service definition document must be a mapping or a list of services');
}

/**
 * Turns a parsed definition document into service specs. A definition that
 * fails its checks is reported in `errors` and skipped; the others still load.
 */
export function loadServiceSpecs(document: unknown, options: LoadServiceSpecsOptions = {}): ServiceSpecLoadResult {
  const errors: SchemaError[] = [];
  const specs: ServiceSpec[] = [];
  const seen = new Set<string>(options.reservedIds ?? []);

  for (const { id, definition } of collectEntries(document, errors)) {
    const idCheck = serviceIdSchema.safeParse(id);
    if (!idCheck.success) {
      errors.push(issueToSchemaError(id, idCheck.error.issues[0], undefined, idCheck.error.issues));
      continue;
    }

    if (seen.has(id)) {
      errors.push(
        new SchemaError('duplicate_service_id', `Service '${id}' is defined more than once`, { serviceId: id })
      );
      continue;
    }

    const parsed = serviceDefinitionSchema.safeParse(definition ?? {});
    if (!parsed.success) {
      errors.push(issueToSchemaError(id, parsed.error.issues[0], undefined, parsed.error.issues));
      continue;
    }

    const built = buildFields(id, parsed.data.fields);
    if (!built.ok) {
      errors.push(built.error);
      continue;
    }

    seen.add(id);
    specs.push(
      deepFreeze({
        id,
        displayName: parsed.data.name ?? id,
        description: parsed.data.description ?? '',
        fields: built.fields
      })
    );
  }

  return { specs, errors };
}

function nodeToJS(node: unknown, doc: Document): unknown {
  return isNode(node) ? node.toJS(doc) : node;
}

function mappingEntries(node: unknown, doc: Document): Array<readonly [string, unknown]> | null {
  if (!isMap(node)) {
    return null;
  }
  return node.items.map((pair) => [String(nodeToJS(pair.key, doc)), pair.value] as const);
}

function serviceDefinitionToJS(node: unknown, doc: Document): unknown {
  const entries = mappingEntries(node, doc);
  if (!entries) {
    return nodeToJS(node, doc);
  }
  const definition = new Map<string, unknown>();
  for (const [key, value] of entries) {
    const fieldEntries = key === 'fields' ? mappingEntries(value, doc) : null;
    definition.set(
      key,
      fieldEntries
        ? new OrderedMapping(fieldEntries.map(([fieldKey, field]) => [fieldKey, nodeToJS(field, doc)] as const))
        : nodeToJS(value, doc)
    );
  }
  return Object.fromEntries(definition);
}

/** Keeps repeated service ids and field keys so they surface as per-service errors. */
function documentToDefinitions(doc: Document): unknown {
  const { contents } = doc;
  const services = mappingEntries(contents, doc);
  if (services) {
    return new OrderedMapping(services.map(([id, node]) => [id, serviceDefinitionToJS(node, doc)] as const));
  }
  if (isSeq(contents)) {
    return contents.items.map((item) => serviceDefinitionToJS(item, doc));
  }
  return nodeToJS(contents, doc);
}

export function parseServiceDefinitions(
  contents: string,
  source?: string,
  options: LoadServiceSpecsOptions = {}
): ServiceSpecLoadResult {
  const doc = parseDocument(contents, { uniqueKeys: false });
  const [parseError] = doc.errors;
  if (parseError) {
    throw new DefinitionParseError(`Failed to parse service definitions: ${parseError.message}`, source, {
      cause: parseError
    });
  }

  let document: unknown;
  try {
    document = documentToDefinitions(doc);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DefinitionParseError(`Failed to parse service definitions: ${message}`, source, { cause: err });
  }
  try {
    return loadServiceSpecs(document, options);
  } catch (err) {
    if (err instanceof DefinitionParseError && source && !err.source) {
      throw new DefinitionParseError(err.message, source, { cause: err });
    }
    throw err;
  }
}

export async function readServiceDefinitionsFile(
  filePath: string,
  options: LoadServiceSpecsOptions = {}
): Promise<ServiceDefinitionFile> {
  const absolutePath = path.resolve(filePath);
  const contents = await fs.readFile(absolutePath, 'utf8');
  const result = parseServiceDefinitions(contents, absolutePath, options);
  return {
    path: absolutePath,
    ...result
  } satisfies ServiceDefinitionFile;
}

/**
 * Loads several definition files in order. Ids must be unique across all of
 * them; a later redefinition is reported as a duplicate.
 */
export async function readServiceDefinitionFiles(filePaths: string[]): Promise<ServiceDefinitionFile[]> {
  const files: ServiceDefinitionFile[] = [];
  const reservedIds = new Set<string>();
  for (const filePath of filePaths) {
    const file = await readServiceDefinitionsFile(filePath, { reservedIds });
    for (const spec of file.specs) {
      reservedIds.add(spec.id);
    }
    files.push(file);
  }
  return files;
}
