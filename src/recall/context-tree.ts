/**
 * Read-only view over whatever context object the host hands to one
 * invocation. Every shape is reduced to one of five node kinds so the
 * scanner never reads host values directly.
 */
export type ContextNode =
  | { kind: 'mapping'; fields: ReadonlyMap<string, unknown> }
  | { kind: 'record'; typeName: string; fields: ReadonlyMap<string, unknown> }
  | { kind: 'sequence'; items: Iterable<unknown> }
  | { kind: 'scalar'; value: string | number | boolean | bigint }
  | { kind: 'none' };

export const DEFAULT_SCAN_DEPTH = 4;
export const DEFAULT_SCAN_BREADTH = 50;

const NONE: ContextNode = { kind: 'none' };

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function readMapFields(map: Map<unknown, unknown>): ReadonlyMap<string, unknown> {
  const fields = new Map<string, unknown>();
  for (const [key, value] of map) {
    const name = String(key);
    if (!fields.has(name)) {
      fields.set(name, value);
    }
  }
  return fields;
}

export function toContextNode(value: unknown): ContextNode {
  try {
    if (value === null || value === undefined) return NONE;

    if (
      typeof value === 'string'
      || typeof value === 'number'
      || typeof value === 'boolean'
      || typeof value === 'bigint'
    ) {
      return { kind: 'scalar', value };
    }

    if (typeof value !== 'object') return NONE;

    if (Array.isArray(value) || value instanceof Set) {
      return { kind: 'sequence', items: value };
    }

    if (value instanceof Map) {
      return { kind: 'mapping', fields: readMapFields(value) };
    }

    const fields = new Map<string, unknown>(Object.entries(value));
    if (isPlainObject(value)) {
      return { kind: 'mapping', fields };
    }

    const typeName = typeof value.constructor === 'function' && value.constructor.name
      ? value.constructor.name
      : 'Object';
    return { kind: 'record', typeName, fields };
  } catch {
    // Throwing getters and revoked proxies read as "no keys here".
    return NONE;
  }
}

export interface ScanHit {
  path: string;
  value: unknown;
}

export interface ScanOptions {
  maxDepth?: number;
  maxChildren?: number;
  /** Decides whether a value bound to a candidate key counts as a hit. */
  accept?: (value: unknown) => boolean;
}

function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/**
 * Depth-first search for the first value bound to one of `candidateKeys`.
 * Keys on the current node are tested in priority order before any child is
 * visited, so a shallow hit always beats a deeper one. The root is depth 0;
 * nodes below `maxDepth` are never examined and at most `maxChildren`
 * children of a node are visited.
 */
export function findFirst(
  root: unknown,
  candidateKeys: readonly string[],
  options: ScanOptions = {},
  rootPath: string = '',
): ScanHit | null {
  const maxDepth = options.maxDepth ?? DEFAULT_SCAN_DEPTH;
  const maxChildren = options.maxChildren ?? DEFAULT_SCAN_BREADTH;
  const accept = options.accept ?? isPresent;

  const visit = (value: unknown, path: string, depth: number): ScanHit | null => {
    if (depth > maxDepth) return null;

    const node = toContextNode(value);

    if (node.kind === 'mapping' || node.kind === 'record') {
      for (const key of candidateKeys) {
        if (!node.fields.has(key)) continue;
        const candidate = node.fields.get(key);
        if (isPresent(candidate) && accept(candidate)) {
          return { path: joinPath(path, key), value: candidate };
        }
      }

      let visited = 0;
      for (const [key, child] of node.fields) {
        if (visited >= maxChildren) break;
        visited += 1;
        const hit = visit(child, joinPath(path, key), depth + 1);
        if (hit) return hit;
      }
      return null;
    }

    if (node.kind === 'sequence') {
      let index = 0;
      try {
        for (const item of node.items) {
          if (index >= maxChildren) break;
          const hit = visit(item, `${path}[${index}]`, depth + 1);
          if (hit) return hit;
          index += 1;
        }
      } catch {
        return null;
      }
    }

    return null;
  };

  return visit(root, rootPath, 0);
}

type ContextSummary = string | ContextSummary[] | { [key: string]: ContextSummary };

/**
 * Bounded JSON rendering of a context value for debug logs.
 */
export function describeContext(value: unknown, maxDepth: number = 3): string {
  const clip = (text: string): string => text.slice(0, 50);

  const summarize = (current: unknown, depth: number): ContextSummary => {
    const node = toContextNode(current);
    if (depth >= maxDepth || node.kind === 'none' || node.kind === 'scalar') {
      return node.kind === 'scalar' ? clip(String(node.value)) : clip(String(current));
    }

    if (node.kind === 'sequence') {
      const items: ContextSummary[] = [];
      for (const item of node.items) {
        if (items.length >= DEFAULT_SCAN_BREADTH) break;
        items.push(summarize(item, depth + 1));
      }
      return items;
    }

    if (node.kind === 'record') {
      return {
        __class__: node.typeName,
        __keys__: [...node.fields.keys()].slice(0, DEFAULT_SCAN_BREADTH),
      };
    }

    const result: { [key: string]: ContextSummary } = {};
    let count = 0;
    for (const [key, child] of node.fields) {
      if (count >= DEFAULT_SCAN_BREADTH) break;
      result[key] = summarize(child, depth + 1);
      count += 1;
    }
    return result;
  };

  try {
    return JSON.stringify(summarize(value, 0));
  } catch {
    return '<unserializable>';
  }
}
