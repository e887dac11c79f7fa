/**
 * JSON Pointer & $ref Resolution
 *
 * Only document-internal references ('#/...') are supported. Resolution is
 * eager: the normalizer inlines every target, so nothing downstream ever sees
 * a `$ref`.
 */

import { ReferenceResolutionError } from './errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Add an own enumerable entry. Plain assignment of a `__proto__` key would set
 * the prototype instead.
 */
export function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isRef(value: unknown): value is { $ref: string } {
  return isRecord(value) && typeof value.$ref === 'string';
}

// ─── Pointers ───────────────────────────────────────────────────────────────

function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

function unescapeToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Append tokens to a JSON pointer: pointer('#/paths', '/users') → '#/paths/~1users'
 */
export function pointer(base: string, ...tokens: Array<string | number>): string {
  return tokens.reduce<string>((acc, token) => `${acc}/${escapeToken(String(token))}`, base);
}

// ─── Resolver ───────────────────────────────────────────────────────────────

export class RefResolver {
  private readonly root: Record<string, unknown>;

  /** Refs currently being expanded, outermost first */
  private readonly active: string[] = [];

  constructor(root: Record<string, unknown>) {
    this.root = root;
  }

  /**
   * Return the raw value a reference points at.
   */
  lookup(ref: string, location: string): unknown {
    if (!ref.startsWith('#')) {
      throw new ReferenceResolutionError(location, ref, `External reference "${ref}" is not supported`);
    }

    const body = ref.slice(1);
    if (body === '') return this.root;
    if (!body.startsWith('/')) {
      throw new ReferenceResolutionError(location, ref, `Malformed reference "${ref}"`);
    }

    let current: unknown = this.root;
    for (const rawToken of body.slice(1).split('/')) {
      let token: string;
      try {
        token = unescapeToken(decodeURIComponent(rawToken));
      } catch {
        throw new ReferenceResolutionError(location, ref, `Malformed reference "${ref}"`);
      }

      if (Array.isArray(current) && /^\d+$/.test(token) && Number(token) < current.length) {
        current = current[Number(token)];
      } else if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, token)) {
        current = current[token];
      } else {
        throw new ReferenceResolutionError(location, ref, `Unresolved reference "${ref}"`);
      }
    }

    return current;
  }

  /**
   * Follow a chain of `$ref` objects until a concrete value is reached.
   * Returns the value and the pointer it was found at.
   */
  deref(value: unknown, location: string): { value: unknown; location: string } {
    const chain: string[] = [];
    let current = value;
    let at = location;

    while (isRef(current)) {
      const ref = current.$ref;
      if (chain.includes(ref)) {
        throw new ReferenceResolutionError(
          location,
          ref,
          `Circular reference: ${[...chain, ref].join(' → ')}`
        );
      }
      chain.push(ref);
      current = this.lookup(ref, at);
      at = ref;
    }

    return { value: current, location: at };
  }

  /**
   * Run `expand` with `ref` marked as in progress. Re-entering a ref that is
   * still being expanded means the schema graph has a cycle.
   */
  enter<T>(ref: string, location: string, expand: () => T): T {
    const start = this.active.indexOf(ref);
    if (start !== -1) {
      throw new ReferenceResolutionError(
        location,
        ref,
        `Circular reference: ${[...this.active.slice(start), ref].join(' → ')}`
      );
    }

    this.active.push(ref);
    try {
      return expand();
    } finally {
      this.active.pop();
    }
  }
}
