/**
 * KeywordClassifier - deterministic fallback emotion estimator
 *
 * Scores fixed keyword lists against the lower-cased text. Used when no
 * classifier backend is available or all of them fail, and as the
 * reference detector when re-verifying decrypted messages offline.
 */

import { z } from 'zod';
import keywordData from './data/emotion-keywords.json';
import { rankEmotions } from './normalize';
import { CanonicalEmotion, CANONICAL_EMOTIONS, ClassifierResult, EmotionClassifier, EmotionScore } from './types';

const canonicalEmotion = z.enum(CANONICAL_EMOTIONS);

const keywordTableSchema = z.object({
  keywords: z.record(canonicalEmotion, z.array(z.string().min(1))),
  dualKeywords: z.record(z.string().min(1), z.array(canonicalEmotion)),
  excitementPhrases: z.array(z.string().min(1)),
  outcomeWords: z.array(z.string().min(1)),
  outcomeContexts: z.array(z.string().min(1)),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;

export const DEFAULT_KEYWORD_TABLE: KeywordTable = keywordTableSchema.parse(keywordData);

/** Confidence of a label's first hit */
const FIRST_MATCH = 0.4;
/** Increment for repeated dual-keyword or phrase hits */
const REPEAT_MATCH = 0.2;
/** Bonus once a category has two or more keyword hits */
const MULTI_MATCH_BONUS = 0.1;
const PHRASE_JOY = 0.3;
const OUTCOME_JOY = 0.35;
const OUTCOME_JOY_BOOST = 0.15;
const MAX_CONFIDENCE = 0.95;

export const NEUTRAL_RESULT: readonly EmotionScore[] = Object.freeze([
  Object.freeze({ emotion: 'Neutral', confidence: 0.5 }),
]);

const cap = (value: number): number => Math.min(value, MAX_CONFIDENCE);

/**
 * Lower-case and fold typographic apostrophes so "can’t" matches "can't"
 */
const prepare = (text: string): string => text.toLowerCase().replace(/[‘’ʼ]/g, "'");

export class KeywordClassifier implements EmotionClassifier {
  readonly name = 'keyword';

  constructor(private readonly table: KeywordTable = DEFAULT_KEYWORD_TABLE) {}

  isAvailable(): boolean {
    return true;
  }

  async classify(text: string): Promise<ClassifierResult> {
    return { ok: true, emotions: this.score(text) };
  }

  /**
   * Synchronous scoring. Identical input always yields identical output.
   */
  score(text: string): EmotionScore[] {
    const lowerText = prepare(text);
    const scores = new Map<CanonicalEmotion, number>();

    const bump = (emotion: CanonicalEmotion, initial: number, increment: number): void => {
      const existing = scores.get(emotion);
      scores.set(emotion, existing === undefined ? initial : cap(existing + increment));
    };

    // Intense words count toward every emotion they list
    for (const [keyword, emotions] of Object.entries(this.table.dualKeywords)) {
      if (lowerText.includes(keyword)) {
        for (const emotion of emotions) {
          bump(emotion, FIRST_MATCH, REPEAT_MATCH);
        }
      }
    }

    for (const phrase of this.table.excitementPhrases) {
      if (lowerText.includes(phrase)) {
        bump('Excitement', FIRST_MATCH, REPEAT_MATCH);
        if (!scores.has('Joy')) {
          scores.set('Joy', PHRASE_JOY);
        }
      }
    }

    const hasOutcome = this.table.outcomeWords.some((word) => lowerText.includes(word));
    const hasContext = this.table.outcomeContexts.some((word) => lowerText.includes(word));
    if (hasOutcome && hasContext) {
      bump('Joy', OUTCOME_JOY, OUTCOME_JOY_BOOST);
    }

    for (const emotion of CANONICAL_EMOTIONS) {
      const keywords = this.table.keywords[emotion] ?? [];
      const matches = keywords.filter(
        (keyword) => lowerText.includes(keyword) && !Object.hasOwn(this.table.dualKeywords, keyword)
      ).length;

      if (matches === 0) {
        continue;
      }

      let base = cap(matches * FIRST_MATCH);
      if (matches >= 2) {
        base = cap(base + MULTI_MATCH_BONUS);
      }
      bump(emotion, base, base * 0.5);
    }

    if (scores.size === 0) {
      return NEUTRAL_RESULT.map((score) => ({ ...score }));
    }

    return rankEmotions(Array.from(scores, ([emotion, confidence]) => ({ emotion, confidence })));
  }
}
