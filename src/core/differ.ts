/**
 * Diff Engine
 *
 * Aligns the operations of two SpecModels and produces an ordered list of
 * ChangeRecords, each classified by compatibility impact.
 */

import {
  SpecModel,
  PathItem,
  Operation,
  Parameter,
  SchemaNode,
  ObjectNode,
  ScalarNode,
  ChangeRecord,
  ChangeKind,
  ChangeSeverity,
  HttpMethod,
  HTTP_METHODS,
} from './types';
import { classifyScalarChange, scalarLabel } from './compatibility';
import { templateKey } from './normalizer';

/**
 * Which party produces the payload. Requiredness changes are judged from the
 * consumer's side: a request field becoming required breaks clients, a
 * response field becoming optional breaks them too.
 */
export type SchemaSide = 'request' | 'response';

// ─── Helpers ────────────────────────────────────────────────────────────────

function change(
  kind: ChangeKind,
  severity: ChangeSeverity,
  location: string,
  message: string
): ChangeRecord {
  return { location, kind, severity, message };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled schema node: ${JSON.stringify(value)}`);
}

function typeLabel(node: SchemaNode): string {
  switch (node.kind) {
    case 'scalar':
      return scalarLabel(node);
    case 'object':
      return 'object';
    case 'array':
      return `array<${typeLabel(node.items)}>`;
    default:
      return assertNever(node);
  }
}

function operationLabel(method: HttpMethod, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

function requiredLabel(required: boolean): string {
  return required ? 'required' : 'optional';
}

function requirednessChange(
  location: string,
  subject: string,
  wasRequired: boolean,
  isRequired: boolean,
  side: SchemaSide
): ChangeRecord {
  const narrowed = side === 'request' ? isRequired : !isRequired;
  return change(
    'requiredness_changed',
    narrowed ? 'breaking' : 'compatible',
    location,
    `${subject} changed from ${requiredLabel(wasRequired)} to ${requiredLabel(isRequired)}`
  );
}

// ─── Schema Diff ────────────────────────────────────────────────────────────

function structureChanged(before: SchemaNode, after: SchemaNode, location: string): ChangeRecord[] {
  return [
    change(
      'type_changed',
      'breaking',
      location,
      `Structure changed at "${location}" (${typeLabel(before)} → ${typeLabel(after)})`
    ),
  ];
}

function diffScalars(before: ScalarNode, after: ScalarNode, location: string): ChangeRecord[] {
  const from = scalarLabel(before);
  const to = scalarLabel(after);

  switch (classifyScalarChange(before, after)) {
    case 'unchanged':
      return [];
    case 'widened':
      return [change('type_changed', 'compatible', location, `Type widened at "${location}" (${from} → ${to})`)];
    case 'incompatible':
      return [change('type_changed', 'breaking', location, `Type changed at "${location}" (${from} → ${to})`)];
  }
}

function diffObjects(
  before: ObjectNode,
  after: ObjectNode,
  location: string,
  side: SchemaSide
): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const beforeRequired = new Set(before.required);
  const afterRequired = new Set(after.required);

  // Removed and shared fields, in the old model's order
  for (const [name, beforeField] of Object.entries(before.properties)) {
    const fieldPath = `${location}.${name}`;

    if (!Object.hasOwn(after.properties, name)) {
      changes.push(
        change('removed', 'breaking', fieldPath, `Field removed: "${fieldPath}" (was: ${typeLabel(beforeField)})`)
      );
      continue;
    }

    const wasRequired = beforeRequired.has(name);
    const isRequired = afterRequired.has(name);
    if (wasRequired !== isRequired) {
      changes.push(requirednessChange(fieldPath, `Field "${fieldPath}"`, wasRequired, isRequired, side));
    }

    changes.push(...diffSchemas(beforeField, after.properties[name], fieldPath, side));
  }

  // Added fields, in the new model's order
  for (const [name, afterField] of Object.entries(after.properties)) {
    if (Object.hasOwn(before.properties, name)) continue;

    const fieldPath = `${location}.${name}`;
    changes.push(change('added', 'compatible', fieldPath, `Field added: "${fieldPath}" (${typeLabel(afterField)})`));
  }

  return changes;
}

/**
 * Compare two schema trees and return every change between them.
 *
 * @param location - Location of the compared nodes (used as path prefix)
 * @param side     - Whether the schema describes a request or a response
 */
export function diffSchemas(
  before: SchemaNode,
  after: SchemaNode,
  location: string,
  side: SchemaSide
): ChangeRecord[] {
  switch (before.kind) {
    case 'scalar':
      return after.kind === 'scalar'
        ? diffScalars(before, after, location)
        : structureChanged(before, after, location);
    case 'array':
      return after.kind === 'array'
        ? diffSchemas(before.items, after.items, `${location}[]`, side)
        : structureChanged(before, after, location);
    case 'object':
      return after.kind === 'object'
        ? diffObjects(before, after, location, side)
        : structureChanged(before, after, location);
    default:
      return assertNever(before);
  }
}

// ─── Operation Diff ─────────────────────────────────────────────────────────

/**
 * Path parameters are keyed by placeholder position so that renaming
 * '{id}' to '{orderId}' aligns with itself.
 */
function parameterKey(parameter: Parameter, placeholders: readonly string[]): string {
  if (parameter.in === 'path') {
    const position = placeholders.indexOf(parameter.name);
    if (position !== -1) return `path#${position}`;
  }
  return `${parameter.in}:${parameter.name}`;
}

function diffParameters(
  beforeItem: PathItem,
  before: Operation,
  afterItem: PathItem,
  after: Operation,
  location: string
): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const beforeParams = new Map(
    before.parameters.map((param) => [parameterKey(param, beforeItem.placeholders), param])
  );
  const afterParams = new Map(
    after.parameters.map((param) => [parameterKey(param, afterItem.placeholders), param])
  );

  for (const [key, param] of beforeParams) {
    const next = afterParams.get(key);

    if (!next) {
      changes.push(
        change(
          'removed',
          'breaking',
          `${location}.parameters.${param.in}.${param.name}`,
          `Parameter removed: "${param.name}" (${param.in})`
        )
      );
      continue;
    }

    const at = `${location}.parameters.${next.in}.${next.name}`;
    if (param.required !== next.required) {
      changes.push(
        requirednessChange(at, `Parameter "${next.name}" (${next.in})`, param.required, next.required, 'request')
      );
    }

    changes.push(...diffSchemas(param.schema, next.schema, at, 'request'));

    if (!param.deprecated && next.deprecated) {
      changes.push(
        change('deprecated', 'deprecation', at, `Parameter "${next.name}" (${next.in}) marked deprecated`)
      );
    }
  }

  for (const [key, param] of afterParams) {
    if (beforeParams.has(key)) continue;

    const at = `${location}.parameters.${param.in}.${param.name}`;
    if (param.required) {
      changes.push(change('added', 'breaking', at, `Required parameter added: "${param.name}" (${param.in})`));
    } else {
      changes.push(change('added', 'compatible', at, `Optional parameter added: "${param.name}" (${param.in})`));
    }
  }

  return changes;
}

function diffRequestBodies(before: Operation, after: Operation, location: string): ChangeRecord[] {
  const at = `${location}.requestBody`;
  const previous = before.requestBody;
  const next = after.requestBody;

  if (previous && next) {
    const changes: ChangeRecord[] = [];
    if (previous.required !== next.required) {
      changes.push(requirednessChange(at, 'Request body', previous.required, next.required, 'request'));
    }
    changes.push(...diffSchemas(previous.schema, next.schema, at, 'request'));
    return changes;
  }

  if (previous) {
    return [change('removed', 'breaking', at, 'Request body removed')];
  }

  if (next) {
    return next.required
      ? [change('added', 'breaking', at, 'Required request body added')]
      : [change('added', 'compatible', at, 'Optional request body added')];
  }

  return [];
}

function diffResponses(before: Operation, after: Operation, location: string): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const statuses = [
    ...new Set([...Object.keys(before.responses), ...Object.keys(after.responses)]),
  ].sort();

  for (const status of statuses) {
    const at = `${location}.responses.${status}`;

    if (!Object.hasOwn(after.responses, status)) {
      changes.push(change('removed', 'breaking', at, `Response ${status} removed`));
      continue;
    }
    if (!Object.hasOwn(before.responses, status)) {
      changes.push(change('added', 'compatible', at, `Response ${status} added`));
      continue;
    }

    const previous = before.responses[status];
    const next = after.responses[status];

    if (previous && next) {
      changes.push(...diffSchemas(previous, next, at, 'response'));
    } else if (previous) {
      changes.push(change('removed', 'breaking', at, `Response ${status} no longer has a body`));
    } else if (next) {
      changes.push(change('added', 'compatible', at, `Response ${status} now has a body (${typeLabel(next)})`));
    }
  }

  return changes;
}

function diffMetadata(before: Operation, after: Operation, location: string): ChangeRecord[] {
  const changes: ChangeRecord[] = [];

  if (!before.deprecated && after.deprecated) {
    changes.push(change('deprecated', 'deprecation', location, `Operation deprecated: ${location}`));
  } else if (before.deprecated && !after.deprecated) {
    changes.push(change('metadata_changed', 'compatible', location, `Operation no longer deprecated: ${location}`));
  }

  if (
    before.operationId !== undefined &&
    after.operationId !== undefined &&
    before.operationId !== after.operationId
  ) {
    changes.push(
      change(
        'metadata_changed',
        'compatible',
        location,
        `operationId changed: "${before.operationId}" → "${after.operationId}"`
      )
    );
  }

  return changes;
}

function diffOperations(
  beforeItem: PathItem,
  before: Operation,
  afterItem: PathItem,
  after: Operation
): ChangeRecord[] {
  const location = operationLabel(after.method, afterItem.path);

  return [
    ...diffParameters(beforeItem, before, afterItem, after, location),
    ...diffRequestBodies(before, after, location),
    ...diffResponses(before, after, location),
    ...diffMetadata(before, after, location),
  ];
}

// ─── Main Diff ──────────────────────────────────────────────────────────────

function indexPaths(model: SpecModel): Map<string, PathItem> {
  return new Map(Object.values(model.paths).map((item) => [templateKey(item.path), item]));
}

/**
 * Compare two normalized models.
 *
 * Output is grouped by path template (old document order, then templates
 * only the new model has), then by method, then by pass: operation,
 * parameters, request body, responses, metadata.
 */
export function diff(oldModel: SpecModel, newModel: SpecModel): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const oldPaths = indexPaths(oldModel);
  const newPaths = indexPaths(newModel);
  const keys = [...oldPaths.keys(), ...[...newPaths.keys()].filter((key) => !oldPaths.has(key))];

  for (const key of keys) {
    const beforeItem = oldPaths.get(key);
    const afterItem = newPaths.get(key);

    for (const method of HTTP_METHODS) {
      const before = beforeItem?.operations[method];
      const after = afterItem?.operations[method];

      if (beforeItem && afterItem && before && after) {
        changes.push(...diffOperations(beforeItem, before, afterItem, after));
      } else if (beforeItem && before) {
        const location = operationLabel(method, beforeItem.path);
        changes.push(change('removed', 'breaking', location, `Operation removed: ${location}`));
      } else if (afterItem && after) {
        const location = operationLabel(method, afterItem.path);
        changes.push(change('added', 'compatible', location, `Operation added: ${location}`));
      }
    }
  }

  return changes;
}
