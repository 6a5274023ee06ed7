import { Router } from 'express';
import { asyncHandler } from '../middleware/errorHandler.js';
import { auditContext, requireActor } from '../middleware/auth.js';
import { validate } from '../middleware/validate.js';
import { completeReviewValidator, createReviewValidator, idParam } from '../middleware/validators.js';
import type { ReviewService } from '../services/review.service.js';
import { bodyOf, intParam, nullableStr, str } from './input.js';

export function createReviewRouter(reviews: ReviewService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const data = await reviews.listReviews();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/pending',
    asyncHandler(async (_req, res) => {
      const data = await reviews.listPending();
      res.json({ success: true, data });
    }),
  );

  router.get(
    '/:id',
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      const data = await reviews.getReview(intParam(req));
      res.json({ success: true, data });
    }),
  );

  router.post(
    '/',
    requireActor,
    createReviewValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await reviews.scheduleReview(
        {
          title: str(body, 'title') ?? '',
          scheduledDate: str(body, 'scheduledDate') ?? '',
          notes: nullableStr(body, 'notes'),
        },
        auditContext(req),
      );
      res.status(201).json({ success: true, data });
    }),
  );

  router.post(
    '/:id/complete',
    requireActor,
    idParam(),
    completeReviewValidator,
    validate,
    asyncHandler(async (req, res) => {
      const body = bodyOf(req);
      const data = await reviews.completeReview(
        intParam(req),
        { conductedDate: nullableStr(body, 'conductedDate') ?? undefined, notes: nullableStr(body, 'notes') },
        auditContext(req),
      );
      res.json({ success: true, data });
    }),
  );

  router.delete(
    '/:id',
    requireActor,
    idParam(),
    validate,
    asyncHandler(async (req, res) => {
      await reviews.deleteReview(intParam(req), auditContext(req));
      res.json({ success: true, message: 'Review deleted' });
    }),
  );

  return router;
}
