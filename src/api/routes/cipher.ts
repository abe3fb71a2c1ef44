import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DecryptionResult, EmotionCipher } from '../../cipher/emotion-cipher';
import { Envelope } from '../../cipher/envelope';
import { SAMPLE_MESSAGES, SampleMessage } from '../../cipher/examples';
import { ApiResponse, apiResponse } from '../middleware/error-handler';

const encryptSchema = z.object({
  message: z.string().max(10000, 'message must be at most 10000 characters'),
});

const decryptSchema = z.object({
  // Shape is checked by the cipher so malformed envelopes get their own error code
  envelope: z.unknown().refine((value) => value !== undefined, 'envelope is required'),
});

export function createCipherRouter(cipher: EmotionCipher): Router {
  const router = Router();

  /**
   * POST /api/v1/cipher/encrypt
   */
  router.post(
    '/encrypt',
    async (req: Request, res: Response<ApiResponse<Envelope>>, next: NextFunction) => {
      try {
        const { message } = encryptSchema.parse(req.body);
        const envelope = await cipher.encrypt(message);
        res.status(201).json(apiResponse(envelope));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * POST /api/v1/cipher/decrypt
   */
  router.post(
    '/decrypt',
    async (req: Request, res: Response<ApiResponse<DecryptionResult>>, next: NextFunction) => {
      try {
        const { envelope } = decryptSchema.parse(req.body);
        const result = await cipher.decrypt(envelope);
        res.json(apiResponse(result));
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/v1/cipher/examples
   */
  router.get('/examples', (req: Request, res: Response<ApiResponse<readonly SampleMessage[]>>) => {
    res.json(apiResponse(SAMPLE_MESSAGES));
  });

  return router;
}
