/**
 * EmotionDetector Unit Tests
 */

import { EmotionDetector } from '../../../src/emotion/detector';
import { ClassifierResult, EmotionClassifier } from '../../../src/emotion/types';
import { ClassifierResponseError, ClassifierUnavailableError } from '../../../src/utils/errors';

const createMockClassifier = (
  name: string,
  result: ClassifierResult,
  available: boolean = true
): EmotionClassifier & { classify: jest.Mock<Promise<ClassifierResult>, [string]> } => ({
  name,
  isAvailable: () => available,
  classify: jest.fn<Promise<ClassifierResult>, [string]>().mockResolvedValue(result),
});

describe('EmotionDetector', () => {
  const text = 'I love this so much';

  describe('analyze', () => {
    it('should use the first classifier that succeeds', async () => {
      // Arrange
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [{ emotion: 'Joy', confidence: 0.85 }],
      });
      const local = createMockClassifier('local', {
        ok: true,
        emotions: [{ emotion: 'Love', confidence: 0.9 }],
      });
      const detector = new EmotionDetector([remote, local]);

      // Act
      const result = await detector.analyze(text);

      // Assert
      expect(result).toEqual({ emotions: [{ emotion: 'Joy', confidence: 0.85 }], source: 'remote' });
      expect(remote.classify).toHaveBeenCalledWith(text);
      expect(local.classify).not.toHaveBeenCalled();
    });

    it('should fall through a failing classifier to the next tier', async () => {
      // Arrange
      const remote = createMockClassifier('remote', {
        ok: false,
        error: new ClassifierResponseError('remote', 'No JSON found in response'),
      });
      const local = createMockClassifier('local', {
        ok: true,
        emotions: [{ emotion: 'Fear', confidence: 0.7 }],
      });
      const detector = new EmotionDetector([remote, local]);

      // Act
      const result = await detector.analyze(text);

      // Assert
      expect(result.source).toBe('local');
      expect(result.emotions).toEqual([{ emotion: 'Fear', confidence: 0.7 }]);
    });

    it('should skip unavailable classifiers without calling them', async () => {
      const remote = createMockClassifier(
        'remote',
        { ok: true, emotions: [{ emotion: 'Joy', confidence: 1 }] },
        false
      );
      const detector = new EmotionDetector([remote]);

      const result = await detector.analyze(text);

      expect(remote.classify).not.toHaveBeenCalled();
      expect(result).toEqual({ emotions: [{ emotion: 'Love', confidence: 0.4 }], source: 'keyword' });
    });

    it('should use the keyword fallback when every tier fails', async () => {
      const failing = [
        createMockClassifier('remote', {
          ok: false,
          error: new ClassifierUnavailableError('remote', 'request failed after 3 attempt(s)'),
        }),
        createMockClassifier('local', {
          ok: false,
          error: new ClassifierUnavailableError('local', 'connection refused'),
        }),
      ];
      const detector = new EmotionDetector(failing);

      const result = await detector.analyze("I'm so disappointed and frustrated");

      expect(result.source).toBe('keyword');
      expect(result.emotions.map(({ emotion }) => emotion)).toEqual(['Anger', 'Sadness']);
    });

    it('should answer blank text from the fallback without calling classifiers', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [{ emotion: 'Joy', confidence: 1 }],
      });
      const detector = new EmotionDetector([remote]);

      const result = await detector.analyze('   ');

      expect(remote.classify).not.toHaveBeenCalled();
      expect(result).toEqual({ emotions: [{ emotion: 'Neutral', confidence: 0.5 }], source: 'keyword' });
    });
  });

  describe('primary', () => {
    it('should filter by the default threshold and order by priority', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [
          { emotion: 'Sadness', confidence: 0.8 },
          { emotion: 'Anxiety', confidence: 0.35 },
        ],
      });
      const detector = new EmotionDetector([remote]);

      expect(await detector.primary(text)).toEqual(['Anxiety', 'Sadness']);
    });

    it('should honour an explicit threshold', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [
          { emotion: 'Sadness', confidence: 0.8 },
          { emotion: 'Anxiety', confidence: 0.35 },
        ],
      });
      const detector = new EmotionDetector([remote]);

      expect(await detector.primary(text, 0.5)).toEqual(['Sadness']);
    });

    it('should return the top label when nothing clears the threshold', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [
          { emotion: 'Surprise', confidence: 0.2 },
          { emotion: 'Joy', confidence: 0.1 },
        ],
      });
      const detector = new EmotionDetector([remote]);

      expect(await detector.primary(text)).toEqual(['Surprise']);
    });

    it('should return Neutral for empty and neutral input with no classifiers', async () => {
      const detector = new EmotionDetector();

      expect(await detector.primary('')).toEqual(['Neutral']);
      expect(await detector.primary('The meeting is at 3pm.')).toEqual(['Neutral']);
    });
  });

  describe('vector', () => {
    it('should normalize detected confidences', async () => {
      const detector = new EmotionDetector();

      expect(await detector.vector("I'm so disappointed and frustrated")).toEqual({ Anger: 0.5, Sadness: 0.5 });
    });

    it('should be Neutral 1.0 when a classifier reports zero confidence', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [{ emotion: 'Fear', confidence: 0 }],
      });
      const detector = new EmotionDetector([remote]);

      expect(await detector.vector(text)).toEqual({ Neutral: 1 });
    });
  });

  describe('signature', () => {
    it('should derive every field from a single classifier call', async () => {
      const remote = createMockClassifier('remote', {
        ok: true,
        emotions: [
          { emotion: 'Joy', confidence: 0.6 },
          { emotion: 'Anxiety', confidence: 0.2 },
        ],
      });
      const detector = new EmotionDetector([remote]);

      const signature = await detector.signature(text);

      expect(remote.classify).toHaveBeenCalledTimes(1);
      expect(signature.primary_emotions).toEqual(['Joy']);
      expect(signature.emotion_scores).toEqual({ Joy: 0.6, Anxiety: 0.2 });
      expect(signature.emotional_vector.Joy).toBeCloseTo(0.75);
      expect(signature.emotional_vector.Anxiety).toBeCloseTo(0.25);
      expect(signature.message_hash).toHaveLength(16);
    });

    it('should use the configured threshold', async () => {
      const detector = new EmotionDetector([], { threshold: 0.5 });

      const signature = await detector.signature(
        'Feeling ecstatic about joining the new AI research team, though a bit anxious about the deadlines ahead.'
      );

      // Every score is 0.4, so only the top-ranked label survives
      expect(signature.primary_emotions).toEqual(['Joy']);
    });
  });

  describe('describeChain', () => {
    it('should list classifiers in priority order followed by the fallback', () => {
      const detector = new EmotionDetector([
        createMockClassifier('gemini', { ok: true, emotions: [] }),
        createMockClassifier('local-model', { ok: true, emotions: [] }),
      ]);

      expect(detector.describeChain()).toEqual(['gemini', 'local-model', 'keyword']);
    });
  });
});
