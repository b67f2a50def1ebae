import { WRITER_CONFIG } from '../config/writer';
import type { TextGenerator } from './openai';

export const OVERLOADED_MESSAGE =
  'The text generation service is overloaded. Please try again in a few minutes.';

export type GenerationFailureKind = 'overloaded' | 'error';

export type GenerationFailure = {
  kind: GenerationFailureKind;
  message: string;
};

export type GenerationResult =
  | { ok: true; text: string }
  | { ok: false; failure: GenerationFailure };

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before the next attempt, given the zero-based attempt that just failed. */
  backoffMs(attempt: number): number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: WRITER_CONFIG.MAX_ATTEMPTS,
  backoffMs: (attempt) => 5000 * 2 ** attempt,
};

export type GenerateOptions = {
  temperature?: number;
  maxAttempts?: number;
};

export interface GenerationGateway {
  generate(prompt: string, maxOutputTokens: number, options?: GenerateOptions): Promise<GenerationResult>;
}

export type GenerationGatewayDeps = {
  generator: TextGenerator;
  retryPolicy?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  onNotice?: (message: string) => void;
  temperature?: number;
};

const OVERLOAD_STATUSES = new Set([503, 529]);

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

export function isOverloadError(err: unknown): boolean {
  if (err && typeof err === 'object' && 'status' in err) {
    if (typeof err.status === 'number' && OVERLOAD_STATUSES.has(err.status)) {
      return true;
    }
  }

  const message = describeError(err);
  if (/overloaded/i.test(message)) {
    return true;
  }
  const match = message.match(/status\s+(\d{3})/i);
  return match ? OVERLOAD_STATUSES.has(Number.parseInt(match[1], 10)) : false;
}

export function createGenerationGateway({
  generator,
  retryPolicy = DEFAULT_RETRY_POLICY,
  sleep = delay,
  onNotice,
  temperature = WRITER_CONFIG.TEMPERATURE,
}: GenerationGatewayDeps): GenerationGateway {
  return {
    async generate(prompt, maxOutputTokens, options = {}) {
      const maxAttempts = Math.max(1, options.maxAttempts ?? retryPolicy.maxAttempts);

      for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
        try {
          const text = await generator.complete({
            prompt,
            maxTokens: maxOutputTokens,
            temperature: options.temperature ?? temperature,
          });
          const trimmed = text.trim();
          if (!trimmed) {
            return { ok: false, failure: { kind: 'error', message: 'Model returned no content' } };
          }
          return { ok: true, text: trimmed };
        } catch (err) {
          if (!isOverloadError(err)) {
            console.error('[generation] request failed', err);
            return { ok: false, failure: { kind: 'error', message: describeError(err) } };
          }
          if (attempt < maxAttempts - 1) {
            const waitMs = retryPolicy.backoffMs(attempt);
            console.warn(`[generation] service overloaded, retrying in ${waitMs}ms`);
            onNotice?.(
              `The text generation service is overloaded. Waiting ${Math.round(waitMs / 1000)} seconds before retry...`
            );
            await sleep(waitMs);
          }
        }
      }

      console.error(`[generation] service still overloaded after ${maxAttempts} attempts`);
      return { ok: false, failure: { kind: 'overloaded', message: OVERLOADED_MESSAGE } };
    },
  };
}
