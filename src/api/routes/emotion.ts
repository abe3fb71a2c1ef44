import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { EmotionDetector } from '../../emotion/detector';
import { isCanonicalEmotion } from '../../emotion/normalize';
import { buildEmotionalVector, selectPrimaryEmotions } from '../../emotion/signature';
import { EmotionLabel, EmotionScore } from '../../emotion/types';
import { ApiResponse, apiResponse } from '../middleware/error-handler';

interface DetectionResponse {
  emotions: EmotionScore[];
  source: string;
  primary: EmotionLabel[];
  vector: Record<string, number>;
  unrecognizedLabels: string[];
}

const detectSchema = z.object({
  text: z.string().max(10000, 'text must be at most 10000 characters'),
  threshold: z.number().min(0).max(1).optional(),
});

export function createEmotionRouter(detector: EmotionDetector): Router {
  const router = Router();

  /**
   * POST /api/v1/emotion/detect
   * Ranked emotions for a text, with the tier that produced them
   */
  router.post(
    '/detect',
    async (req: Request, res: Response<ApiResponse<DetectionResponse>>, next: NextFunction) => {
      try {
        const { text, threshold } = detectSchema.parse(req.body);
        const { emotions, source } = await detector.analyze(text);

        res.json(apiResponse({
          emotions,
          source,
          primary: selectPrimaryEmotions(emotions, threshold ?? detector.threshold),
          vector: buildEmotionalVector(emotions),
          unrecognizedLabels: emotions
            .map(({ emotion }) => emotion)
            .filter((emotion) => !isCanonicalEmotion(emotion)),
        }));
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
