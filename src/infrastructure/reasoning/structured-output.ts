import type { ServiceResult, ShapeSpec, StructuredValue } from '@domain/ports/reasoning-service.js';
import { err, ok } from '@shared/lib/result.js';

/**
 * Output instructions appended to the system prompt for the requested shape.
 */
export function renderShapeInstructions(shape: ShapeSpec): string {
  if (shape.format === 'text') {
    return 'Respond with plain prose only. No JSON, no code fences.';
  }
  const keys = Object.entries(shape.fields).map(([key, description]) => `- "${key}": ${description}`);
  return [
    'Respond with ONLY a JSON object with these keys:',
    ...keys,
    'Use double quotes for all strings and no trailing commas.',
  ].join('\n');
}

function parseLenient(raw: string): StructuredValue | undefined {
  for (const candidate of [raw, raw.replace(/,\s*([}\]])/g, '$1')]) {
    try {
      const parsed: StructuredValue = JSON.parse(candidate);
      return parsed;
    } catch {
      continue;
    }
  }
  return undefined;
}

/** Index just past the `{...}` block opening at `start`, ignoring braces inside strings. */
function balancedEnd(text: string, start: number): number | undefined {
  let depth = 0;
  let inString = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return undefined;
}

/**
 * Pull a JSON value out of a model answer.
 *
 * Parsing priority:
 * 1. Last ```json ... ``` (or bare ```) fenced block
 * 2. Bare {...} object anchored to the end of the answer
 * 3. First balanced {...} object anywhere in the answer
 * Each candidate is retried with trailing commas removed.
 */
export function extractJson(text: string): StructuredValue | undefined {
  const fenced = [...text.matchAll(/```(?:json)?\s*([\s\S]*?)\s*```/g)].at(-1)?.[1];
  const trailing = text.match(/(\{[\s\S]*\})\s*$/)?.[1];
  const start = text.indexOf('{');
  const end = start >= 0 ? balancedEnd(text, start) : undefined;
  const balanced = end !== undefined ? text.slice(start, end) : undefined;

  for (const raw of [fenced, trailing, balanced]) {
    if (raw === undefined) continue;
    const parsed = parseLenient(raw);
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

/** Shape a raw model answer into the value the request asked for. */
export function toStructured(text: string, shape: ShapeSpec): ServiceResult<StructuredValue> {
  if (shape.format === 'text') return ok(text.trim());
  const value = extractJson(text);
  if (value === undefined) {
    return err({ kind: 'malformed', message: `no JSON object in answer: ${text.slice(0, 120)}` });
  }
  return ok(value);
}
