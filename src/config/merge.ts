export type ConfigRecord = Record<string, unknown>;

export function isObject(item: unknown): item is ConfigRecord {
  return Boolean(item) && typeof item === 'object' && !Array.isArray(item);
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isObject(value)) {
    const out: ConfigRecord = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = cloneValue(v);
    }
    return out;
  }
  return value;
}

function mergeRecords(target: ConfigRecord, source: ConfigRecord): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = target[key];

    // Arrays replace, never concatenate
    if (Array.isArray(sourceValue)) {
      target[key] = cloneValue(sourceValue);
      continue;
    }

    if (isObject(sourceValue) && isObject(targetValue)) {
      mergeRecords(targetValue, sourceValue);
      continue;
    }

    target[key] = cloneValue(sourceValue);
  }
}

/** Merges `sources` into `target` left to right; later sources win. Sources are not mutated. */
export function deepMerge(target: ConfigRecord, ...sources: Array<ConfigRecord | null | undefined>): ConfigRecord {
  for (const source of sources) {
    if (!source) {
      continue;
    }
    mergeRecords(target, source);
  }
  return target;
}
