import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { writeFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import type {
  IReasoningService,
  ReasoningRequest,
  ServiceCallOptions,
  ServiceResult,
  StructuredValue,
} from '@domain/ports/reasoning-service.js';
import { logger } from '@shared/lib/logger.js';
import { err } from '@shared/lib/result.js';
import { renderShapeInstructions, toStructured } from './structured-output.js';

const execFileAsync = promisify(execFile);

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  encoding: 'utf-8';
  signal: AbortSignal;
}

export type ExecFunction = (
  file: string,
  args: string[],
  options: ExecOptions,
) => Promise<{ stdout: string; stderr: string }>;

/**
 * Options for configuring the Claude CLI reasoning service.
 */
export interface ClaudeCliReasoningOptions {
  /** Path to the claude binary. Defaults to 'claude'. */
  binaryPath?: string;
  /** Passed as `--model` when set. */
  model?: string;
}

/**
 * Check if a binary exists on the system PATH.
 * Exported for testing purposes.
 */
export async function checkBinaryExists(binaryPath: string): Promise<boolean> {
  try {
    await execFileAsync('which', [binaryPath]);
    return true;
  } catch {
    return false;
  }
}

function isTimeoutFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError') return true;
  return 'killed' in error && error.killed === true;
}

/**
 * Reasoning service that runs `claude -p` as a subprocess.
 *
 * The system prompt (role, rules and the output shape) is written to a temp
 * file and passed with `--system-prompt-file`; the task goes as the prompt
 * argument. The answer is read from stdout.
 */
export class ClaudeCliReasoningService implements IReasoningService {
  readonly name = 'claude-cli';

  private readonly binaryPath: string;
  /** Undefined lets the CLI pick its own default model. */
  readonly model?: string;

  // Injection points for testing
  private _checkBinary: (path: string) => Promise<boolean>;
  private _execFile: ExecFunction;
  private _writeFile: (path: string, content: string) => void;
  private _deleteFile: (path: string) => void;
  private _generateId: () => string;

  constructor(options: ClaudeCliReasoningOptions = {}) {
    this.binaryPath = options.binaryPath ?? 'claude';
    this.model = options.model;
    this._checkBinary = checkBinaryExists;
    this._execFile = (file, args, execOptions) => execFileAsync(file, args, execOptions);
    this._writeFile = (path, content) => writeFileSync(path, content, 'utf-8');
    this._deleteFile = (path) => unlinkSync(path);
    this._generateId = () => randomUUID().replace(/-/g, '').slice(0, 8);
  }

  /** Replace the binary existence check (for testing). */
  setBinaryChecker(checker: (path: string) => Promise<boolean>): void {
    this._checkBinary = checker;
  }

  /** Replace the exec function (for testing). */
  setExecFunction(execFn: ExecFunction): void {
    this._execFile = execFn;
  }

  /** Replace file write (for testing). */
  setFileWriter(fn: (path: string, content: string) => void): void {
    this._writeFile = fn;
  }

  /** Replace file delete (for testing). */
  setFileDeleter(fn: (path: string) => void): void {
    this._deleteFile = fn;
  }

  /** Replace ID generator for deterministic testing. */
  setIdGenerator(fn: () => string): void {
    this._generateId = fn;
  }

  async call(request: ReasoningRequest, options: ServiceCallOptions): Promise<ServiceResult<StructuredValue>> {
    const exists = await this._checkBinary(this.binaryPath);
    if (!exists) {
      return err({
        kind: 'unavailable',
        message: `Claude CLI binary not found at "${this.binaryPath}". Install it or use the "anthropic" backend instead.`,
      });
    }

    const promptPath = join(tmpdir(), `buildbrief-prompt-${this._generateId()}.md`);
    try {
      this._writeFile(promptPath, `${request.prompt.system}\n\n${renderShapeInstructions(request.shape)}\n`);
      const { stdout } = await this._execFile(this.binaryPath, this.buildArgs(promptPath, request.prompt.user), {
        timeout: options.timeoutMs,
        maxBuffer: 10 * 1024 * 1024, // 10MB
        encoding: 'utf-8',
        signal: options.signal,
      });
      const result = toStructured(stdout, request.shape);
      if (!result.ok) {
        logger.warn('Claude CLI produced no structured output', {
          purpose: request.prompt.purpose,
          stdoutPreview: stdout.slice(0, 200),
        });
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (isTimeoutFailure(error)) {
        return err({ kind: 'timeout', message: `Claude CLI did not answer within ${options.timeoutMs}ms` });
      }
      logger.error('Claude CLI call failed', { purpose: request.prompt.purpose, error: message });
      return err({ kind: 'unavailable', message: `Claude CLI execution failed: ${message}` });
    } finally {
      this.cleanup(promptPath);
    }
  }

  private buildArgs(promptPath: string, user: string): string[] {
    const args = ['-p', '--system-prompt-file', promptPath];
    if (this.model) args.push('--model', this.model);
    args.push(user);
    return args;
  }

  private cleanup(promptPath: string): void {
    try {
      this._deleteFile(promptPath);
    } catch (error) {
      logger.debug('Could not remove prompt file', {
        promptPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
