/**
 * LocalModelClassifier - adapter over a locally hosted text-classification
 * model (for example a distilroberta emotion model behind an inference
 * server). The model's own vocabulary is mapped through label
 * normalization.
 */

import { z } from 'zod';
import { CONFIG } from '../utils/config';
import { ClassifierResponseError, ClassifierUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { normalizeRanking } from './normalize';
import { ClassifierResult, EmotionClassifier } from './types';

const logger = createLogger('LocalModelClassifier');

export interface LabelScore {
  label: string;
  score: number;
}

/**
 * Anything that maps text to label/score pairs
 */
export interface InferenceBackend {
  readonly name: string;
  classify(text: string): Promise<LabelScore[]>;
}

const labelScoreSchema = z.object({
  label: z.string(),
  score: z.number(),
});

/**
 * Text-classification servers answer either `[{label, score}]` or, for
 * batched pipelines, `[[{label, score}]]`.
 */
const inferenceResponseSchema = z.union([
  z.array(labelScoreSchema),
  z.array(z.array(labelScoreSchema)).min(1).transform((batches) => batches[0]),
]);

export class InferenceResponseError extends Error {
  constructor(message: string, public readonly details?: unknown) {
    super(message);
    this.name = 'InferenceResponseError';
  }
}

export interface HttpInferenceBackendOptions {
  url: string;
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * Posts `{ text }` to a local inference endpoint
 */
export class HttpInferenceBackend implements InferenceBackend {
  readonly name: string;
  private readonly timeout: number;

  constructor(private readonly options: HttpInferenceBackendOptions) {
    this.name = `http:${options.url}`;
    this.timeout = options.timeout ?? CONFIG.localModel.timeout;
  }

  async classify(text: string): Promise<LabelScore[]> {
    const response = await fetch(this.options.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        ...this.options.headers,
      },
      body: JSON.stringify({ text }),
      signal: AbortSignal.timeout(this.timeout),
    });

    if (!response.ok) {
      throw new Error(`Inference server responded ${response.status} ${response.statusText}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InferenceResponseError('Inference server returned invalid JSON', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = inferenceResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceResponseError('Unexpected inference response shape', {
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }
}

export interface LocalModelClassifierOptions {
  backend?: InferenceBackend | null;
  maxResults?: number;
}

export class LocalModelClassifier implements EmotionClassifier {
  readonly name = 'local-model';

  private readonly backend: InferenceBackend | null;
  private readonly maxResults: number;

  constructor(options: LocalModelClassifierOptions = {}) {
    this.backend = options.backend ?? null;
    this.maxResults = options.maxResults ?? CONFIG.detection.maxAdapterResults;
  }

  isAvailable(): boolean {
    return this.backend !== null;
  }

  async classify(text: string): Promise<ClassifierResult> {
    if (!this.backend) {
      return {
        ok: false,
        error: new ClassifierUnavailableError(this.name, 'No local inference backend configured'),
      };
    }

    let raw: LabelScore[];
    try {
      raw = await this.backend.classify(text);
    } catch (error) {
      logger.debug('Local inference call failed', {
        backend: this.backend.name,
        reason: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof InferenceResponseError) {
        return {
          ok: false,
          error: new ClassifierResponseError(this.name, error.message, error.details),
        };
      }
      return {
        ok: false,
        error: new ClassifierUnavailableError(
          this.name,
          error instanceof Error ? error.message : String(error)
        ),
      };
    }

    const emotions = normalizeRanking(
      raw.map(({ label, score }) => ({ label, confidence: score })),
      this.maxResults
    );

    if (emotions.length === 0) {
      return { ok: false, error: new ClassifierResponseError(this.name, 'Backend returned no labels') };
    }

    return { ok: true, emotions };
  }
}
