import type {
  CascadeAttempt,
  CascadeOutcome,
  ModelCandidate,
  Prompt,
} from '@hemascope/shared/src/types/analysis.types.js';
import { createChildLogger } from '@hemascope/shared/src/logger.js';
import { CancellationError, ModelTimeoutError } from '@hemascope/shared/src/utils/errors.js';
import { classifyFailure, type FailureClassification } from './failure-classifier.js';
import type { ModelClient, ModelClientFactory } from './model-client.js';

const log = createChildLogger('llm:model-manager');

const CLIENT_UNAVAILABLE = 'client unavailable';
const EMPTY_RESPONSE = 'empty response';

export interface CascadeOptions {
  readonly signal?: AbortSignal;
}

export interface ModelManager {
  readonly candidates: readonly ModelCandidate[];
  invokeCascade(prompt: Prompt, options?: CascadeOptions): Promise<CascadeOutcome>;
}

export interface ModelManagerDeps {
  readonly candidates: readonly ModelCandidate[];
  readonly clientFactory: ModelClientFactory;
  readonly rateLimitBackoffMs: number;
  readonly now?: () => number;
  readonly onAttempt?: (attempt: CascadeAttempt) => void;
}

type InvocationResult =
  | { readonly ok: true; readonly content: string }
  | { readonly ok: false; readonly error: unknown };

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new CancellationError();
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    signal.addEventListener('abort', () => reject(abortReason(signal)), { once: true });
  });
}

function sleep(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function invokeWithDeadline(
  client: ModelClient,
  candidate: ModelCandidate,
  prompt: Prompt,
  parentSignal: AbortSignal | undefined,
): Promise<InvocationResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new ModelTimeoutError(candidate.id, candidate.timeoutMs));
  }, candidate.timeoutMs);
  const onParentAbort = (): void => {
    controller.abort(new CancellationError());
  };

  if (parentSignal?.aborted) {
    onParentAbort();
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    const response = await Promise.race([
      client.invoke(
        { systemPrompt: prompt.systemPrompt, userMessage: prompt.userMessage },
        { signal: controller.signal },
      ),
      waitForAbort(controller.signal),
    ]);
    return { ok: true, content: response.content };
  } catch (error) {
    return { ok: false, error: controller.signal.aborted ? abortReason(controller.signal) : error };
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Builds one client per candidate up front. A candidate whose client cannot be
 * built stays in the cascade and is recorded as unavailable on every pass.
 */
export async function createModelManager(deps: ModelManagerDeps): Promise<ModelManager> {
  const now = deps.now ?? Date.now;
  const clients = new Map<string, ModelClient>();

  for (const candidate of deps.candidates) {
    try {
      clients.set(candidate.id, await deps.clientFactory(candidate));
    } catch (error) {
      log.warn(
        {
          candidateId: candidate.id,
          model: candidate.endpoint.model,
          error: error instanceof Error ? error.message : String(error),
        },
        'Model client unavailable',
      );
    }
  }

  log.info(
    { candidates: deps.candidates.length, available: clients.size },
    'Model manager initialized',
  );

  return {
    candidates: deps.candidates,

    async invokeCascade(prompt: Prompt, options: CascadeOptions = {}): Promise<CascadeOutcome> {
      const { signal } = options;
      const attempts: CascadeAttempt[] = [];

      const record = (attempt: CascadeAttempt): void => {
        attempts.push(attempt);
        deps.onAttempt?.(attempt);
      };

      for (const candidate of deps.candidates) {
        if (signal?.aborted) {
          log.info({ attempted: attempts.length }, 'Cascade cancelled');
          return { status: 'cancelled' };
        }

        const client = clients.get(candidate.id);
        if (!client) {
          record({
            candidateId: candidate.id,
            model: candidate.endpoint.model,
            outcome: 'fatal_failure',
            failureReason: CLIENT_UNAVAILABLE,
            latencyMs: 0,
          });
          continue;
        }

        const startedAt = now();
        const result = await invokeWithDeadline(client, candidate, prompt, signal);
        const latencyMs = Math.max(0, now() - startedAt);

        if (signal?.aborted) {
          log.info({ candidateId: candidate.id, latencyMs }, 'Cascade cancelled');
          return { status: 'cancelled' };
        }

        if (result.ok && result.content.trim() !== '') {
          record({
            candidateId: candidate.id,
            model: candidate.endpoint.model,
            outcome: 'success',
            latencyMs,
          });
          log.info(
            { candidateId: candidate.id, latencyMs, attempts: attempts.length },
            'Cascade succeeded',
          );
          return { status: 'succeeded', content: result.content, candidate, attempts };
        }

        const classification: FailureClassification = result.ok
          ? { outcome: 'fatal_failure', reason: EMPTY_RESPONSE, isRateLimit: false }
          : classifyFailure(result.error);

        record({
          candidateId: candidate.id,
          model: candidate.endpoint.model,
          outcome: classification.outcome,
          failureReason: classification.reason,
          latencyMs,
        });
        log.warn(
          {
            candidateId: candidate.id,
            outcome: classification.outcome,
            reason: classification.reason,
            latencyMs,
          },
          'Candidate failed, advancing',
        );

        const hasNext = attempts.length < deps.candidates.length;
        if (classification.isRateLimit && hasNext && deps.rateLimitBackoffMs > 0) {
          try {
            await sleep(deps.rateLimitBackoffMs, signal);
          } catch (error) {
            if (error instanceof CancellationError) {
              log.info({ candidateId: candidate.id }, 'Cascade cancelled during backoff');
              return { status: 'cancelled' };
            }
            throw error;
          }
        }
      }

      log.warn({ attempts: attempts.length }, 'All model candidates failed');
      return { status: 'exhausted', attempts };
    },
  };
}
