import { describe, it, expect } from 'vitest';
import { ACTOR, createTestContext } from '../testing/fixtures.js';
import { ConflictError, ValidationError } from '../utils/errors.js';

describe('ReviewService', () => {
  it('lists pending reviews earliest first', async () => {
    const { services } = createTestContext();
    await services.reviews.scheduleReview({ title: 'Q3', scheduledDate: '2025-09-01' }, ACTOR);
    await services.reviews.scheduleReview({ title: 'Q1', scheduledDate: '2025-03-01' }, ACTOR);
    const done = await services.reviews.scheduleReview({ title: 'Q2', scheduledDate: '2025-06-01' }, ACTOR);
    await services.reviews.completeReview(done.id, { conductedDate: '2025-03-05' }, ACTOR);

    expect((await services.reviews.listPending()).map((review) => review.title)).toEqual(['Q1', 'Q3']);
  });

  it('completes a review once', async () => {
    const { services } = createTestContext();
    const review = await services.reviews.scheduleReview({ title: 'Annual', scheduledDate: '2025-03-01' }, ACTOR);

    const completed = await services.reviews.completeReview(review.id, { notes: 'No findings' }, ACTOR);
    expect(completed).toMatchObject({ conductedDate: '2025-03-10', notes: 'No findings' });

    await expect(services.reviews.completeReview(review.id, {}, ACTOR)).rejects.toThrow(
      new ConflictError('Review 1 was already conducted on 2025-03-10'),
    );

    const { entries } = await services.audit.history('review', review.id);
    expect(entries[0]).toMatchObject({ oldValues: { conducted_date: null }, newValues: { conducted_date: '2025-03-10' } });
  });

  it('requires a title and a valid date', async () => {
    const { services } = createTestContext();
    await expect(
      services.reviews.scheduleReview({ title: ' ', scheduledDate: '2025-03-01' }, ACTOR),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      services.reviews.scheduleReview({ title: 'Annual', scheduledDate: '2025-13-01' }, ACTOR),
    ).rejects.toBeInstanceOf(ValidationError);
  });
});
