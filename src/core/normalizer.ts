/**
 * Schema Normalizer
 *
 * Turns a deserialized OpenAPI 3.x (or Swagger 2.0) document into a SpecModel.
 * References are resolved eagerly and inlined, so the resulting tree never
 * contains indirection. The normalizer is permissive about optional metadata
 * (a missing info.version is a lint concern, not a parse error) and strict
 * about structure.
 */

import {
  SpecModel,
  PathItem,
  Operation,
  Parameter,
  ParameterLocation,
  RequestBody,
  SchemaNode,
  ObjectNode,
  ScalarNode,
  PrimitiveType,
  HttpMethod,
  HTTP_METHODS,
} from './types';
import { ParseError } from './errors';
import { RefResolver, defineEntry, isRecord, isRef, pointer } from './refs';

// ─── Constants ──────────────────────────────────────────────────────────────

type DeclaredType = Exclude<PrimitiveType, 'any'> | 'object' | 'array';

const DECLARED_TYPES: ReadonlySet<string> = new Set<DeclaredType>([
  'string',
  'number',
  'integer',
  'boolean',
  'null',
  'object',
  'array',
]);

const PARAMETER_LOCATIONS: ReadonlySet<string> = new Set<ParameterLocation>([
  'path',
  'query',
  'header',
  'cookie',
]);

const ANY: ScalarNode = { kind: 'scalar', type: 'any' };

const PLACEHOLDER = /\{([^}]*)\}/g;

// ─── Path Templates ─────────────────────────────────────────────────────────

/**
 * Placeholder names in template order: '/orders/{id}/items/{item}' → ['id', 'item']
 */
export function placeholderNames(template: string): string[] {
  return [...template.matchAll(PLACEHOLDER)].map((match) => match[1]);
}

/**
 * Alignment key for a template: literal tokens and placeholder positions
 * survive, placeholder names do not. '/orders/{id}' → '/orders/{}'
 */
export function templateKey(template: string): string {
  return template.replace(PLACEHOLDER, '{}');
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function isDeclaredType(value: string): value is DeclaredType {
  return DECLARED_TYPES.has(value);
}

function isParameterLocation(value: string): value is ParameterLocation {
  return PARAMETER_LOCATIONS.has(value);
}

function optionalString(value: unknown, at: string, label: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new ParseError(at, `"${label}" must be a string`);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// Swagger 2.0 carries request bodies as `in: body` / `in: formData` parameters.
type ParsedParameter =
  | { kind: 'parameter'; parameter: Parameter }
  | { kind: 'body'; required: boolean; schema: SchemaNode }
  | { kind: 'formData'; name: string; required: boolean; schema: SchemaNode };

function parameterKey(parsed: ParsedParameter): string {
  switch (parsed.kind) {
    case 'parameter':
      return `${parsed.parameter.in}:${parsed.parameter.name}`;
    case 'body':
      return 'body';
    case 'formData':
      return `formData:${parsed.name}`;
  }
}

// ─── Normalizer ─────────────────────────────────────────────────────────────

class DocumentNormalizer {
  private readonly root: Record<string, unknown>;
  private readonly resolver: RefResolver;
  private readonly schemaCache = new Map<string, SchemaNode>();

  constructor(root: Record<string, unknown>) {
    this.root = root;
    this.resolver = new RefResolver(root);
  }

  document(): SpecModel {
    const openapi = this.root.openapi ?? this.root.swagger;
    if (typeof openapi !== 'string' && typeof openapi !== 'number') {
      throw new ParseError('#', 'Missing required key "openapi" (or "swagger")');
    }
    if (!isRecord(this.root.paths)) {
      throw new ParseError('#/paths', 'Missing required key "paths" (must be a mapping)');
    }

    let title: string | undefined;
    let version: string | undefined;
    if (this.root.info !== undefined) {
      if (!isRecord(this.root.info)) {
        throw new ParseError('#/info', '"info" must be a mapping');
      }
      title = optionalString(this.root.info.title, '#/info/title', 'title');
      version = optionalString(this.root.info.version, '#/info/version', 'version');
    }

    const paths: Record<string, PathItem> = {};
    const keys = new Map<string, string>();

    for (const [template, rawItem] of Object.entries(this.root.paths)) {
      if (template.startsWith('x-')) continue;
      const at = pointer('#/paths', template);

      if (!template.startsWith('/')) {
        throw new ParseError(at, `Path "${template}" must start with "/"`);
      }

      const key = templateKey(template);
      const clash = keys.get(key);
      if (clash !== undefined) {
        throw new ParseError(at, `Path "${template}" is ambiguous with "${clash}"`);
      }
      keys.set(key, template);

      paths[template] = this.pathItem(template, rawItem, at);
    }

    return { openapi: String(openapi), title, version, paths };
  }

  // ─── Paths & Operations ─────────────────────────────────────────────────

  private pathItem(template: string, raw: unknown, at: string): PathItem {
    const { value, location } = this.resolver.deref(raw, at);
    if (!isRecord(value)) {
      throw new ParseError(location, 'Path item must be a mapping');
    }

    const shared = this.parameterList(value.parameters, pointer(location, 'parameters'));
    const operations: Partial<Record<HttpMethod, Operation>> = {};

    for (const method of HTTP_METHODS) {
      if (value[method] === undefined) continue;
      operations[method] = this.operation(method, value[method], pointer(location, method), shared);
    }

    return { path: template, placeholders: placeholderNames(template), operations };
  }

  private operation(
    method: HttpMethod,
    raw: unknown,
    at: string,
    shared: ParsedParameter[]
  ): Operation {
    if (!isRecord(raw)) {
      throw new ParseError(at, 'Operation must be a mapping');
    }

    // Operation-level parameters override path-level ones with the same key
    const merged = new Map<string, ParsedParameter>();
    for (const parsed of shared) merged.set(parameterKey(parsed), parsed);
    for (const parsed of this.parameterList(raw.parameters, pointer(at, 'parameters'))) {
      merged.set(parameterKey(parsed), parsed);
    }

    const parameters: Parameter[] = [];
    const formFields: Array<{ name: string; required: boolean; schema: SchemaNode }> = [];
    let requestBody: RequestBody | undefined;

    for (const parsed of merged.values()) {
      if (parsed.kind === 'parameter') parameters.push(parsed.parameter);
      else if (parsed.kind === 'body') requestBody = { required: parsed.required, schema: parsed.schema };
      else formFields.push(parsed);
    }

    if (raw.requestBody !== undefined) {
      requestBody = this.requestBody(raw.requestBody, pointer(at, 'requestBody'));
    } else if (requestBody === undefined && formFields.length > 0) {
      requestBody = {
        required: formFields.some((field) => field.required),
        schema: {
          kind: 'object',
          properties: Object.fromEntries(formFields.map((field) => [field.name, field.schema])),
          required: formFields.filter((field) => field.required).map((field) => field.name),
        },
      };
    }

    const tags = Array.isArray(raw.tags)
      ? raw.tags.filter((tag): tag is string => typeof tag === 'string')
      : [];

    return {
      method,
      operationId: optionalString(raw.operationId, pointer(at, 'operationId'), 'operationId'),
      summary: optionalString(raw.summary, pointer(at, 'summary'), 'summary'),
      description: optionalString(raw.description, pointer(at, 'description'), 'description'),
      tags,
      deprecated: raw.deprecated === true,
      parameters,
      requestBody,
      responses: this.responses(raw.responses, pointer(at, 'responses')),
    };
  }

  // ─── Parameters ─────────────────────────────────────────────────────────

  private parameterList(raw: unknown, at: string): ParsedParameter[] {
    if (raw === undefined) return [];
    if (!Array.isArray(raw)) {
      throw new ParseError(at, '"parameters" must be a list');
    }

    const result: ParsedParameter[] = [];
    const keys = new Set<string>();

    raw.forEach((entry: unknown, index) => {
      const entryAt = pointer(at, index);
      const parsed = this.parameter(entry, entryAt);
      const key = parameterKey(parsed);
      if (keys.has(key)) {
        throw new ParseError(entryAt, `Duplicate parameter "${key}"`);
      }
      keys.add(key);
      result.push(parsed);
    });

    return result;
  }

  private parameter(raw: unknown, at: string): ParsedParameter {
    const { value, location } = this.resolver.deref(raw, at);
    if (!isRecord(value)) {
      throw new ParseError(location, 'Parameter must be a mapping');
    }

    const name = value.name;
    const where = value.in;
    if (typeof name !== 'string' || name === '') {
      throw new ParseError(location, 'Parameter is missing "name"');
    }

    const required = value.required === true;

    if (where === 'body') {
      return { kind: 'body', required, schema: this.schema(value.schema, pointer(location, 'schema')) };
    }

    const schema = this.parameterSchema(value, location);

    if (where === 'formData') {
      return { kind: 'formData', name, required, schema };
    }

    if (typeof where !== 'string' || !isParameterLocation(where)) {
      throw new ParseError(location, `Parameter "${name}" has invalid location "${String(where)}"`);
    }

    return {
      kind: 'parameter',
      parameter: {
        name,
        in: where,
        // Path parameters are always required
        required: where === 'path' || required,
        deprecated: value.deprecated === true,
        schema,
      },
    };
  }

  private parameterSchema(value: Record<string, unknown>, at: string): SchemaNode {
    if (value.schema !== undefined) return this.schema(value.schema, pointer(at, 'schema'));
    if (value.content !== undefined) {
      return this.contentSchema(value.content, pointer(at, 'content')) ?? ANY;
    }
    // Swagger 2.0: type/format/items live on the parameter itself
    if (value.type !== undefined) return this.schema(value, at);
    return ANY;
  }

  // ─── Bodies ─────────────────────────────────────────────────────────────

  private requestBody(raw: unknown, at: string): RequestBody {
    const { value, location } = this.resolver.deref(raw, at);
    if (!isRecord(value)) {
      throw new ParseError(location, 'Request body must be a mapping');
    }

    const schema = this.contentSchema(value.content, pointer(location, 'content'));
    return { required: value.required === true, schema: schema ?? ANY };
  }

  private responses(raw: unknown, at: string): Record<string, SchemaNode | null> {
    if (raw === undefined) return {};
    if (!isRecord(raw)) {
      throw new ParseError(at, '"responses" must be a mapping');
    }

    const result: Record<string, SchemaNode | null> = {};

    for (const status of Object.keys(raw).sort()) {
      if (status.startsWith('x-')) continue;
      const { value, location } = this.resolver.deref(raw[status], pointer(at, status));
      if (!isRecord(value)) {
        throw new ParseError(location, 'Response must be a mapping');
      }

      if (value.content !== undefined) {
        defineEntry(result, status, this.contentSchema(value.content, pointer(location, 'content')));
      } else if (value.schema !== undefined) {
        defineEntry(result, status, this.schema(value.schema, pointer(location, 'schema')));
      } else {
        defineEntry(result, status, null);
      }
    }

    return result;
  }

  /**
   * Pick the schema of a content map, preferring application/json.
   * Returns null when there is no media type at all.
   */
  private contentSchema(content: unknown, at: string): SchemaNode | null {
    if (content === undefined) return null;
    if (!isRecord(content)) {
      throw new ParseError(at, '"content" must be a mapping');
    }

    const mediaTypes = Object.keys(content);
    if (mediaTypes.length === 0) return null;

    const chosen = mediaTypes.includes('application/json') ? 'application/json' : mediaTypes[0];
    const media = content[chosen];
    if (!isRecord(media)) {
      throw new ParseError(pointer(at, chosen), 'Media type object must be a mapping');
    }

    return this.schema(media.schema, pointer(at, chosen, 'schema'));
  }

  // ─── Schemas ────────────────────────────────────────────────────────────

  private schema(raw: unknown, at: string): SchemaNode {
    if (raw === undefined || typeof raw === 'boolean') return ANY;

    if (isRef(raw)) {
      const ref = raw.$ref;
      const cached = this.schemaCache.get(ref);
      if (cached) return cached;

      const node = this.resolver.enter(ref, at, () =>
        this.schema(this.resolver.lookup(ref, at), ref)
      );
      this.schemaCache.set(ref, node);
      return node;
    }

    if (!isRecord(raw)) {
      throw new ParseError(at, 'Schema must be a mapping');
    }

    if (Array.isArray(raw.allOf)) {
      return this.allOf(raw, raw.allOf, at);
    }

    for (const keyword of ['oneOf', 'anyOf'] as const) {
      const variants = raw[keyword];
      if (Array.isArray(variants)) {
        return variants.length === 1 ? this.schema(variants[0], pointer(at, keyword, 0)) : ANY;
      }
    }

    const type = this.schemaType(raw.type, pointer(at, 'type'));

    if (type === 'object' || (type === undefined && raw.properties !== undefined)) {
      return this.objectSchema(raw, at);
    }

    if (type === 'array' || (type === undefined && raw.items !== undefined)) {
      return { kind: 'array', items: this.schema(raw.items, pointer(at, 'items')) };
    }

    const scalarType = type ?? 'any';
    return typeof raw.format === 'string'
      ? { kind: 'scalar', type: scalarType, format: raw.format }
      : { kind: 'scalar', type: scalarType };
  }

  private schemaType(raw: unknown, at: string): DeclaredType | 'any' | undefined {
    if (raw === undefined) return undefined;

    if (typeof raw === 'string') {
      if (!isDeclaredType(raw)) {
        throw new ParseError(at, `Unknown type "${raw}"`);
      }
      return raw;
    }

    // OpenAPI 3.1 type arrays, e.g. ['string', 'null']
    if (Array.isArray(raw)) {
      const declared: DeclaredType[] = [];
      for (const entry of raw) {
        if (typeof entry !== 'string' || !isDeclaredType(entry)) {
          throw new ParseError(at, `Unknown type "${String(entry)}"`);
        }
        if (entry !== 'null') declared.push(entry);
      }
      if (declared.length === 0) return raw.length > 0 ? 'null' : undefined;
      return declared.length === 1 ? declared[0] : 'any';
    }

    throw new ParseError(at, 'Malformed type declaration');
  }

  private objectSchema(raw: Record<string, unknown>, at: string): ObjectNode {
    const properties: Record<string, SchemaNode> = {};

    if (raw.properties !== undefined) {
      if (!isRecord(raw.properties)) {
        throw new ParseError(pointer(at, 'properties'), '"properties" must be a mapping');
      }
      for (const [name, child] of Object.entries(raw.properties)) {
        defineEntry(properties, name, this.schema(child, pointer(at, 'properties', name)));
      }
    }

    return { kind: 'object', properties, required: this.requiredNames(raw.required, pointer(at, 'required')) };
  }

  private requiredNames(raw: unknown, at: string): string[] {
    if (raw === undefined) return [];
    if (!Array.isArray(raw) || !raw.every((name): name is string => typeof name === 'string')) {
      throw new ParseError(at, '"required" must be a list of field names');
    }
    return [...new Set(raw)];
  }

  /**
   * Merge allOf members (and sibling keywords) into one object node.
   */
  private allOf(raw: Record<string, unknown>, members: unknown[], at: string): SchemaNode {
    const parts = members.map((member, index) => this.schema(member, pointer(at, 'allOf', index)));

    const siblings = { ...raw };
    delete siblings.allOf;
    if (siblings.properties !== undefined || siblings.type !== undefined) {
      parts.push(this.schema(siblings, at));
    }

    const objects = parts.filter((part): part is ObjectNode => part.kind === 'object');
    if (objects.length === 0) {
      return parts.find((part) => !(part.kind === 'scalar' && part.type === 'any')) ?? ANY;
    }

    const properties: Record<string, SchemaNode> = {};
    const required = new Set<string>();
    for (const part of objects) {
      for (const [name, node] of Object.entries(part.properties)) defineEntry(properties, name, node);
      part.required.forEach((name) => required.add(name));
    }
    // A sibling `required` applies to the merged object even without sibling properties
    this.requiredNames(raw.required, pointer(at, 'required')).forEach((name) => required.add(name));

    return { kind: 'object', properties, required: [...required] };
  }
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Normalize a deserialized schema document into an immutable SpecModel.
 *
 * @throws ParseError when the document is not well-formed
 * @throws ReferenceResolutionError for external, dangling or circular refs
 */
export function normalize(rawDocument: unknown): SpecModel {
  if (!isRecord(rawDocument)) {
    throw new ParseError('#', 'Document must be a mapping');
  }
  return deepFreeze(new DocumentNormalizer(rawDocument).document());
}
