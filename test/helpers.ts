/**
 * Document builders shared by the test suites
 */

import { isRecord } from '../src/core/refs';

export type RawDocument = Record<string, unknown>;

export function document(
  paths: Record<string, unknown>,
  extra: Record<string, unknown> = {}
): RawDocument {
  return {
    openapi: '3.0.3',
    info: { title: 'Orders API', version: '1.0.0' },
    paths,
    ...extra,
  };
}

export function object(properties: Record<string, unknown>, required: string[] = []): RawDocument {
  return { type: 'object', properties, required };
}

export function jsonResponse(schema: unknown, description = 'OK'): RawDocument {
  return { description, content: { 'application/json': { schema } } };
}

export function jsonBody(schema: unknown, required = true): RawDocument {
  return { required, content: { 'application/json': { schema } } };
}

/**
 * A small orders API. Order is shared through a $ref by three responses.
 */
export function ordersDocument(): RawDocument {
  return document(
    {
      '/orders': {
        get: {
          operationId: 'listOrders',
          parameters: [{ name: 'limit', in: 'query', schema: { type: 'integer' } }],
          responses: {
            '200': jsonResponse({ type: 'array', items: { $ref: '#/components/schemas/Order' } }),
          },
        },
        delete: {
          operationId: 'purgeOrders',
          responses: { '204': { description: 'Purged' } },
        },
      },
      '/orders/{id}': {
        parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'string' } }],
        get: {
          operationId: 'getOrder',
          responses: { '200': jsonResponse({ $ref: '#/components/schemas/Order' }) },
        },
        post: {
          operationId: 'updateOrder',
          requestBody: jsonBody(
            object({ amount: { type: 'integer' }, note: { type: 'string' } }, ['amount'])
          ),
          responses: { '200': jsonResponse({ $ref: '#/components/schemas/Order' }) },
        },
      },
    },
    {
      components: {
        schemas: {
          Order: object(
            { id: { type: 'string' }, amount: { type: 'integer' }, status: { type: 'string' } },
            ['id', 'amount', 'status']
          ),
        },
      },
    }
  );
}

/**
 * A single operation returning one payment object.
 */
export function paymentsDocument(
  properties: Record<string, unknown> = { id: { type: 'string' }, amount: { type: 'integer' } },
  required: string[] = ['id', 'amount']
): RawDocument {
  return document({
    '/payments': {
      get: {
        operationId: 'listPayments',
        responses: { '200': jsonResponse(object(properties, required)) },
      },
    },
  });
}

// ─── Mutation ───────────────────────────────────────────────────────────────

type Key = string | number;

function isContainer(value: unknown): value is Record<string, unknown> | unknown[] {
  return typeof value === 'object' && value !== null;
}

function child(container: unknown, key: Key): unknown {
  if (Array.isArray(container)) return container[Number(key)];
  if (isRecord(container)) return container[String(key)];
  return undefined;
}

function parentOf(target: unknown, keys: Key[]): Record<string, unknown> | unknown[] {
  const parent = keys.slice(0, -1).reduce<unknown>(child, target);
  if (!isContainer(parent)) {
    throw new Error(`No container at ${keys.slice(0, -1).join('/')}`);
  }
  return parent;
}

/**
 * Set a value deep inside a raw document: setIn(doc, ['paths', '/a', 'get'], {...})
 */
export function setIn(target: unknown, keys: Key[], value: unknown): void {
  const parent = parentOf(target, keys);
  const last = keys[keys.length - 1];
  if (Array.isArray(parent)) parent[Number(last)] = value;
  else parent[String(last)] = value;
}

export function removeIn(target: unknown, keys: Key[]): void {
  const parent = parentOf(target, keys);
  const last = keys[keys.length - 1];
  if (Array.isArray(parent)) parent.splice(Number(last), 1);
  else delete parent[String(last)];
}

export function getIn(target: unknown, keys: Key[]): unknown {
  return keys.reduce<unknown>(child, target);
}

// ─── Errors ─────────────────────────────────────────────────────────────────

/**
 * Run `fn` and return the error it throws, checked against `type`.
 */
export function captureError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
