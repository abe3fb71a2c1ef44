import { GoogleGenerativeAI } from '@google/generative-ai';
import { z } from 'zod';
import { CONFIG } from '../utils/config';
import { ClassifierResponseError, ClassifierUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { normalizeRanking } from './normalize';
import { CANONICAL_EMOTIONS, ClassifierResult, EmotionClassifier } from './types';

const logger = createLogger('GeminiClassifier');

/**
 * The slice of the Gemini model API this classifier relies on
 */
export interface EmotionTextModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

export interface GeminiClassifierOptions {
  apiKey?: string;
  model?: string;
  temperature?: number;
  maxRetries?: number;
  retryDelay?: number;
  timeout?: number;
  maxResults?: number;
  /** Pre-built model, used instead of constructing one from `apiKey` */
  client?: EmotionTextModel;
}

const geminiEmotionSchema = z.object({
  emotions: z.array(
    z.object({
      emotion: z.string(),
      confidence: z.coerce.number().optional(),
    })
  ),
});

export const buildEmotionPrompt = (text: string, maxResults: number): string =>
  `Analyze the following text and identify the PRIMARY emotions expressed.
Focus on the top ${maxResults} most prominent emotions. Return a JSON object with emotions and their confidence scores (0.0 to 1.0).

Available emotions: ${CANONICAL_EMOTIONS.join(', ')}

Text: ${JSON.stringify(text)}

Return ONLY a JSON object in this exact format (no markdown, no explanations):
{
  "emotions": [
    {"emotion": "Joy", "confidence": 0.85},
    {"emotion": "Anxiety", "confidence": 0.65}
  ]
}

Instructions:
- Identify ONLY the top ${maxResults} most prominent emotions
- Use emotion names exactly as listed above (capitalized)
- Confidence scores should be between 0.0 and 1.0
- Return ONLY the JSON object, no other text`;

/**
 * Pull the JSON object out of a model reply, tolerating markdown fences
 */
export function extractJson(responseText: string): string | null {
  const fenced = responseText.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = fenced ? fenced[1] : responseText;
  const jsonMatch = candidate.match(/\{[\s\S]*\}/);
  return jsonMatch ? jsonMatch[0] : null;
}

/**
 * Remote LLM emotion classifier backed by the Gemini API
 */
export class GeminiClassifier implements EmotionClassifier {
  readonly name = 'gemini';

  private model: EmotionTextModel | null = null;
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly timeout: number;
  private readonly maxResults: number;

  constructor(options: GeminiClassifierOptions = {}) {
    this.maxRetries = options.maxRetries ?? CONFIG.gemini.maxRetries;
    this.retryDelay = options.retryDelay ?? CONFIG.gemini.retryDelay;
    this.timeout = options.timeout ?? CONFIG.gemini.timeout;
    this.maxResults = options.maxResults ?? CONFIG.detection.maxAdapterResults;

    if (options.client) {
      this.model = options.client;
    } else if (options.apiKey) {
      const genAI = new GoogleGenerativeAI(options.apiKey);
      this.model = genAI.getGenerativeModel({
        model: options.model ?? CONFIG.gemini.model,
        generationConfig: { temperature: options.temperature ?? CONFIG.gemini.temperature },
      });
    }
  }

  isAvailable(): boolean {
    return this.model !== null;
  }

  async classify(text: string): Promise<ClassifierResult> {
    const model = this.model;
    if (!model) {
      return {
        ok: false,
        error: new ClassifierUnavailableError(this.name, 'Gemini API key not configured'),
      };
    }

    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      let responseText: string;
      try {
        responseText = await this.callWithTimeout(model, buildEmotionPrompt(text, this.maxResults));
      } catch (error) {
        lastError = error;
        logger.debug(`Gemini attempt ${attempt}/${this.maxRetries} failed`, {
          reason: error instanceof Error ? error.message : String(error),
        });
        if (attempt < this.maxRetries) {
          // Exponential backoff
          await this.sleep(Math.pow(2, attempt - 1) * this.retryDelay);
        }
        continue;
      }

      return this.parseResponse(responseText);
    }

    return {
      ok: false,
      error: new ClassifierUnavailableError(
        this.name,
        `request failed after ${this.maxRetries} attempt(s)`,
        { reason: lastError instanceof Error ? lastError.message : String(lastError) }
      ),
    };
  }

  /**
   * Validate the reply and reduce it to the ranked, normalized top entries
   */
  parseResponse(responseText: string): ClassifierResult {
    const json = extractJson(responseText.trim());
    if (!json) {
      return { ok: false, error: new ClassifierResponseError(this.name, 'No JSON found in response') };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(json);
    } catch (error) {
      return {
        ok: false,
        error: new ClassifierResponseError(this.name, 'Response is not valid JSON', {
          reason: error instanceof Error ? error.message : String(error),
        }),
      };
    }

    const parsed = geminiEmotionSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        ok: false,
        error: new ClassifierResponseError(this.name, 'Response does not match the emotion schema', {
          issues: parsed.error.issues,
        }),
      };
    }

    const emotions = normalizeRanking(
      parsed.data.emotions.map(({ emotion, confidence }) => ({
        label: emotion,
        confidence: confidence ?? 0.5,
      })),
      this.maxResults
    );

    if (emotions.length === 0) {
      return { ok: false, error: new ClassifierResponseError(this.name, 'Response listed no emotions') };
    }

    return { ok: true, emotions };
  }

  private async callWithTimeout(model: EmotionTextModel, prompt: string): Promise<string> {
    let timeoutId: NodeJS.Timeout | undefined;

    try {
      const result = await Promise.race([
        model.generateContent(prompt),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(() => reject(new Error('Request timeout')), this.timeout);
        }),
      ]);
      return result.response.text();
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
