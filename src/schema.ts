import type { UpstreamSchema } from './types.js';
import { isRecord } from './utils.js';

function typeToken(value: unknown): string | undefined {
  if (typeof value === 'string') return value.toUpperCase();
  if (Array.isArray(value)) {
    // ["string", "null"] style nullable types keep their first concrete member
    const first: unknown = value.find((t) => typeof t === 'string' && t !== 'null');
    return typeof first === 'string' ? first.toUpperCase() : undefined;
  }
  return undefined;
}

function unionBranches(schema: Record<string, unknown>): Record<string, unknown>[] | undefined {
  const branches = schema['anyOf'] ?? schema['oneOf'];
  return Array.isArray(branches) ? branches.filter(isRecord) : undefined;
}

/**
 * Collapses anyOf/oneOf. An array-typed branch is preferred and contributes
 * only its type and items; otherwise the first branch is taken.
 */
function resolveUnion(schema: Record<string, unknown>): Record<string, unknown> {
  const branches = unionBranches(schema);
  if (!branches) return schema;

  const { anyOf: _anyOf, oneOf: _oneOf, ...outer } = schema;
  const arrayBranch = branches.find((branch) => typeToken(branch['type']) === 'ARRAY');
  if (arrayBranch) {
    return { ...outer, type: arrayBranch['type'], items: arrayBranch['items'] };
  }

  const first = branches[0];
  return first ? { ...resolveUnion(first), ...outer } : outer;
}

/**
 * Converts a JSON Schema into the reduced dialect accepted by function
 * declarations: type, description, properties, items, required and enum.
 * Everything else is dropped.
 */
export function convertSchema(schema: unknown): UpstreamSchema {
  if (!isRecord(schema)) return {};
  const source = resolveUnion(schema);
  const result: UpstreamSchema = {};

  const type = typeToken(source['type']);
  if (type) result.type = type;

  const description = source['description'];
  if (typeof description === 'string') result.description = description;

  const properties = source['properties'];
  if (isRecord(properties)) {
    const converted: Record<string, UpstreamSchema> = {};
    for (const [name, child] of Object.entries(properties)) {
      converted[name] = convertSchema(child);
    }
    result.properties = converted;
  }

  const items = source['items'];
  if (isRecord(items)) result.items = convertSchema(items);

  const required = source['required'];
  if (Array.isArray(required)) {
    result.required = required.filter((name): name is string => typeof name === 'string');
  }

  const values = source['enum'];
  if (Array.isArray(values)) {
    result.enum = values
      .filter((v): v is string | number | boolean => ['string', 'number', 'boolean'].includes(typeof v))
      .map(String);
  }

  return result;
}
