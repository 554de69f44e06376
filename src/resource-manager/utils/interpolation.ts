export const EXPRESSION_REGEX = new RegExp(`\\\${{\\s*(.*?)\\s*}}`, 'g');
export const SINGLE_EXPRESSION_REGEX = new RegExp(`^\\\${{\\s*(.*?)\\s*}}$`);
export const RESOURCE_ID_REGEX_BASE = '[a-z0-9](?:[-_a-z0-9]*[a-z0-9])?';
export const RESOURCE_ID_REGEX = new RegExp(`^${RESOURCE_ID_REGEX_BASE}$`);
export const REFERENCE_REGEX = new RegExp(`^resources\\.(?<resource_id>${RESOURCE_ID_REGEX_BASE})\\.(?<output>[\\w.-]+)$`);

export interface Reference {
  /** Attribute path the placeholder was found at, e.g. `ingress.0.security_groups.1` */
  path: string;
  resource_id: string;
  output: string;
  expression: string;
}

/**
 * Returned by a lookup when the referenced output won't exist until the referenced resource is applied.
 */
export const UNKNOWN = Symbol('known-after-apply');

export type ReferenceLookup = (resource_id: string, output: string) => unknown;

const joinPath = (prefix: string, key: string | number): string => prefix ? `${prefix}.${key}` : `${key}`;

export const parseReference = (expression: string): { resource_id: string; output: string } | undefined => {
  const match = REFERENCE_REGEX.exec(expression.trim());
  if (!match?.groups) {
    return undefined;
  }
  return { resource_id: match.groups.resource_id, output: match.groups.output };
};

export const findReferences = (value: unknown, path = ''): Reference[] => {
  const references: Reference[] = [];
  if (typeof value === 'string') {
    for (const match of value.matchAll(EXPRESSION_REGEX)) {
      const parsed = parseReference(match[1]);
      if (parsed) {
        references.push({ path, expression: match[1], ...parsed });
      }
    }
  } else if (Array.isArray(value)) {
    for (const [index, item] of value.entries()) {
      references.push(...findReferences(item, joinPath(path, index)));
    }
  } else if (value instanceof Object) {
    for (const [key, item] of Object.entries(value)) {
      references.push(...findReferences(item, joinPath(path, key)));
    }
  }
  return references;
};

export const getPath = (obj: unknown, path: string): unknown => {
  let current = obj;
  for (const key of path.split('.')) {
    if (current instanceof Object && key in current) {
      current = Reflect.get(current, key);
    } else {
      return undefined;
    }
  }
  return current;
};

export interface ResolvedValue {
  value: unknown;
  known: boolean;
}

/**
 * Replaces `${{ resources.<id>.<output> }}` placeholders. A string made of exactly one placeholder takes the
 * referenced value as-is (keeping numbers, lists and maps); placeholders embedded in longer strings are stringified.
 * When any lookup yields UNKNOWN the original placeholder text is kept and `known` is false.
 */
export const resolveReferences = (value: unknown, lookup: ReferenceLookup): ResolvedValue => {
  if (typeof value === 'string') {
    const single = SINGLE_EXPRESSION_REGEX.exec(value);
    const single_reference = single ? parseReference(single[1]) : undefined;
    if (single_reference) {
      const resolved = lookup(single_reference.resource_id, single_reference.output);
      return resolved === UNKNOWN ? { value, known: false } : { value: resolved, known: true };
    }

    let known = true;
    let res = value;
    for (const match of value.matchAll(EXPRESSION_REGEX)) {
      const parsed = parseReference(match[1]);
      if (!parsed) {
        continue;
      }
      const resolved = lookup(parsed.resource_id, parsed.output);
      if (resolved === UNKNOWN) {
        known = false;
        continue;
      }
      res = res.replace(match[0], () => `${resolved}`);
    }
    return { value: res, known };
  }

  if (Array.isArray(value)) {
    let known = true;
    const res = value.map((item) => {
      const resolved = resolveReferences(item, lookup);
      known = known && resolved.known;
      return resolved.value;
    });
    return { value: res, known };
  }

  if (value instanceof Object) {
    let known = true;
    const res: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const resolved = resolveReferences(item, lookup);
      known = known && resolved.known;
      res[key] = resolved.value;
    }
    return { value: res, known };
  }

  return { value, known: true };
};
