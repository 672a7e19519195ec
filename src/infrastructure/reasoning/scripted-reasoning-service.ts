import type {
  IReasoningService,
  ReasoningPurpose,
  ReasoningRequest,
  ServiceCallOptions,
  ServiceError,
  ServiceResult,
  StructuredValue,
} from '@domain/ports/reasoning-service.js';
import { err, ok } from '@shared/lib/result.js';

export type ScriptedStep =
  | ServiceResult<StructuredValue>
  | ((request: ReasoningRequest, options: ServiceCallOptions) => Promise<ServiceResult<StructuredValue>>);

export type ReasoningScript = Partial<Record<ReasoningPurpose, ScriptedStep[]>>;

/** A successful scripted answer. */
export function reply(value: StructuredValue): ServiceResult<StructuredValue> {
  return ok(value);
}

/** A failed scripted answer. */
export function failure(kind: ServiceError['kind'], message = `scripted ${kind}`): ServiceResult<StructuredValue> {
  return err({ kind, message });
}

/**
 * In-memory IReasoningService that answers from a per-purpose script.
 *
 * Each purpose has a queue of steps consumed in order; the last step repeats
 * once the queue is down to one. A step is either a fixed result or a
 * function of the request. Purposes without a script answer `unavailable`.
 *
 * Example:
 * ```ts
 * const reasoning = new ScriptedReasoningService({
 *   triage: [failure('unavailable'), reply({ errorType: 'SyntaxError', category: 'syntax_error' })],
 *   narrative: [reply('SyntaxError ...')],
 * });
 * ```
 */
export class ScriptedReasoningService implements IReasoningService {
  readonly name = 'scripted';
  /** Every request received, in order. */
  readonly calls: ReasoningRequest[] = [];
  private readonly queues: Map<ReasoningPurpose, ScriptedStep[]>;

  constructor(script: ReasoningScript = {}) {
    this.queues = new Map();
    for (const purpose of ['triage', 'research', 'narrative'] as const) {
      const steps = script[purpose];
      if (steps && steps.length > 0) this.queues.set(purpose, [...steps]);
    }
  }

  callsFor(purpose: ReasoningPurpose): ReasoningRequest[] {
    return this.calls.filter((request) => request.prompt.purpose === purpose);
  }

  async call(request: ReasoningRequest, options: ServiceCallOptions): Promise<ServiceResult<StructuredValue>> {
    this.calls.push(request);
    const queue = this.queues.get(request.prompt.purpose);
    const step = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!step) return failure('unavailable', `no scripted reply for ${request.prompt.purpose}`);
    return typeof step === 'function' ? step(request, options) : step;
  }
}
