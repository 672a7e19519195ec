import { readFile } from 'node:fs/promises';
import type { BuildFailureRef, IBuildLogSource } from '@domain/ports/build-log-source.js';
import { LogSourceError } from '@shared/lib/errors.js';

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export interface FileLogSourceOptions {
  /** Reads the whole of stdin; replaced in tests. */
  readStdin?: () => Promise<string>;
}

/** Reads a build log from disk, or from stdin when the path is `-`. */
export class FileLogSource implements IBuildLogSource {
  private readonly readStdin: () => Promise<string>;

  constructor(options: FileLogSourceOptions = {}) {
    this.readStdin = options.readStdin ?? readProcessStdin;
  }

  async fetchLog(ref: BuildFailureRef): Promise<string> {
    if (ref.kind !== 'file') {
      throw new LogSourceError(`FileLogSource cannot read a ${ref.kind} reference`);
    }
    try {
      return ref.path === '-' ? await this.readStdin() : await readFile(ref.path, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LogSourceError(`Cannot read build log from ${ref.path === '-' ? 'stdin' : ref.path}: ${message}`, error);
    }
  }
}
