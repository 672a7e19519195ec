import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod/v4';
import { BuildBriefError } from '@shared/lib/errors.js';

export class JsonStoreError extends BuildBriefError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'JsonStoreError';
  }
}

type Issue = { path: PropertyKey[]; message: string };

function formatIssues(issues: ReadonlyArray<Issue>): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function validate<T>(data: unknown, schema: z.ZodType<T>, path: string, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new JsonStoreError(`${what}: ${formatIssues(result.error.issues)}`, path, result.error);
  }
  return result.data;
}

function writeFile(path: string, content: string): void {
  JsonStore.ensureDir(dirname(path));
  try {
    writeFileSync(path, content, 'utf-8');
  } catch (err) {
    throw new JsonStoreError(`Failed to write file: ${path}`, path, err);
  }
}

/**
 * Typed file persistence for `buildbrief.config.json` and saved briefs.
 * JSON goes through a Zod schema both ways; rendered markdown is written as-is.
 */
export const JsonStore = {
  /**
   * @throws JsonStoreError if file missing, invalid JSON, or validation fails
   */
  read<T>(path: string, schema: z.ZodType<T>): T {
    if (!existsSync(path)) {
      throw new JsonStoreError(`File not found: ${path}`, path);
    }

    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (err) {
      throw new JsonStoreError(`Failed to read file: ${path}`, path, err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new JsonStoreError(`Invalid JSON in file: ${path}`, path, err);
    }

    return validate(parsed, schema, path, `Validation failed for ${path}`);
  },

  /** Validate, then write pretty-printed JSON. Parent directories are created. */
  write<T>(path: string, data: T, schema: z.ZodType<T>): void {
    const valid = validate(data, schema, path, 'Validation failed before write');
    writeFile(path, JSON.stringify(valid, null, 2) + '\n');
  },

  writeText(path: string, content: string): void {
    writeFile(path, content);
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  ensureDir(dir: string): void {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  },
};
