import type { PropValue } from '../types.js';

/** Converts parsed data (front matter, notebook metadata) into JSON-safe prop values. */
export function toPropValue(value: unknown): PropValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toPropValue);
  if (value instanceof Map) {
    return Object.fromEntries([...value].map(([k, v]) => [String(k), toPropValue(v)]));
  }
  if (typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPropValue(v)]));
  }
  return String(value);
}

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::?-[^}]*)?\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;
const URL_PATTERN = /https?:\/\/[^\s'"<>]+/g;

export function findEnvVars(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(ENV_VAR_PATTERN)) {
    const name = match[1] ?? match[2];
    if (name && !names.includes(name)) names.push(name);
  }
  return names;
}

export function findUrls(text: string): string[] {
  return [...new Set(text.match(URL_PATTERN) ?? [])];
}
