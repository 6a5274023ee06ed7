import type { EntityStore, ReviewRecord } from '../store/types.js';
import { parseIsoDate, toIsoDate, type IsoDate } from '../utils/dates.js';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { AuditContext, AuditService } from './audit.service.js';

export interface ReviewInput {
  title: string;
  scheduledDate: IsoDate;
  notes?: string | null;
}

const ENTITY = 'review';

export class ReviewService {
  constructor(
    private readonly store: EntityStore,
    private readonly audit: AuditService,
    private readonly clock: () => Date,
  ) {}

  async getReview(id: number): Promise<ReviewRecord> {
    const review = await this.store.reviews.findById(id);
    if (!review) throw new NotFoundError(ENTITY, id);
    return review;
  }

  listReviews(): Promise<ReviewRecord[]> {
    return this.store.reviews.findAll();
  }

  /** Reviews not yet conducted, earliest scheduled first. */
  async listPending(): Promise<ReviewRecord[]> {
    const reviews = await this.store.reviews.findAll();
    return reviews
      .filter((review) => review.conductedDate === null)
      .sort((a, b) => a.scheduledDate.localeCompare(b.scheduledDate) || a.id - b.id);
  }

  async scheduleReview(input: ReviewInput, context: AuditContext): Promise<ReviewRecord> {
    if (typeof input.title !== 'string' || input.title.trim().length === 0) {
      throw ValidationError.field('title', 'title is required');
    }
    const scheduledDate = parseIsoDate(input.scheduledDate, 'scheduledDate');
    return this.store.transaction(async (uow) => {
      const review = await uow.reviews.create({
        title: input.title.trim(),
        scheduledDate,
        conductedDate: null,
        notes: input.notes ?? null,
      });
      await this.audit.logCreate(uow, context, ENTITY, review.id, {
        title: review.title,
        scheduled_date: review.scheduledDate,
      });
      return review;
    });
  }

  async completeReview(
    id: number,
    input: { conductedDate?: IsoDate; notes?: string | null },
    context: AuditContext,
  ): Promise<ReviewRecord> {
    const conductedDate =
      input.conductedDate === undefined ? toIsoDate(this.clock()) : parseIsoDate(input.conductedDate, 'conductedDate');
    return this.store.transaction(async (uow) => {
      const existing = await uow.reviews.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      if (existing.conductedDate !== null) {
        throw new ConflictError(`Review ${id} was already conducted on ${existing.conductedDate}`);
      }
      const updated = await uow.reviews.update(id, {
        conductedDate,
        ...(input.notes !== undefined && { notes: input.notes }),
      });
      await this.audit.logUpdate(
        uow,
        context,
        ENTITY,
        id,
        { conducted_date: null },
        { conducted_date: updated.conductedDate },
      );
      return updated;
    });
  }

  async deleteReview(id: number, context: AuditContext): Promise<void> {
    await this.store.transaction(async (uow) => {
      const existing = await uow.reviews.findById(id);
      if (!existing) throw new NotFoundError(ENTITY, id);
      await uow.reviews.delete(id);
      await this.audit.logDelete(uow, context, ENTITY, id, {
        title: existing.title,
        scheduled_date: existing.scheduledDate,
      });
    });
  }
}
