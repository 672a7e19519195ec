import {
  DEFAULT_SEVERITY,
  ErrorCategorySchema,
  SeveritySchema,
  UNKNOWN_CATEGORY,
  type ErrorCategory,
  type Severity,
} from '@domain/types/classification.js';

/**
 * Map a free-form category label onto the fixed vocabulary.
 * "Missing Package" and "missing-package" both become `missing_package`;
 * anything unrecognized becomes `unknown`.
 */
export function coerceCategory(raw: unknown): ErrorCategory {
  if (typeof raw !== 'string') return UNKNOWN_CATEGORY;
  const label = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  const parsed = ErrorCategorySchema.safeParse(label);
  return parsed.success ? parsed.data : UNKNOWN_CATEGORY;
}

export function coerceSeverity(raw: unknown): Severity {
  if (typeof raw !== 'string') return DEFAULT_SEVERITY;
  const parsed = SeveritySchema.safeParse(raw.trim().toLowerCase());
  return parsed.success ? parsed.data : DEFAULT_SEVERITY;
}

/**
 * Clamp a confidence to [0, 1].
 *
 * Numbers and numeric strings are clamped to the nearest bound (1.4 -> 1,
 * -0.2 -> 0). Anything non-numeric becomes 0.
 */
export function clampConfidence(raw: unknown): number {
  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  } else {
    return 0;
  }
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Trimmed, non-empty text, or the fallback. */
export function coerceText(raw: unknown, fallback = ''): string {
  if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
  if (typeof raw !== 'string') return fallback;
  const text = raw.trim();
  return text === '' ? fallback : text;
}

/**
 * A list of strings from whatever the service sent. Non-string entries are
 * dropped; a lone string becomes a one-element list.
 */
export function coerceStringList(raw: unknown): string[] {
  if (typeof raw === 'string') {
    const text = raw.trim();
    return text === '' ? [] : [text];
  }
  if (!Array.isArray(raw)) return [];
  const items: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const text = entry.trim();
    if (text !== '') items.push(text);
  }
  return items;
}

/** De-duplicate, keeping first-seen order. */
export function uniqueStrings(items: readonly string[]): string[] {
  return [...new Set(items)];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
