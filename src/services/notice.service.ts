import logger from '../config/logger';
import { DataStore, NoticeChanges } from '../repositories/types';
import {
  AuthUser,
  ListResult,
  NoticeAudience,
  NoticeCategory,
  NoticePriority,
  NoticeRecord,
} from '../types';
import { ApiError } from '../utils/ApiError';
import { AudienceResolver } from '../utils/noticeAudience';

export interface NoticeInput {
  category: NoticeCategory;
  audience?: NoticeAudience | null;
  title?: string | null;
  content?: string | null;
  date?: Date | null;
  datetime?: Date | null;
  priority?: NoticePriority;
  expiryDate?: Date | null;
}

export type NoticeUpdate = NoticeChanges;

type Reader = Pick<AuthUser, 'role'>;

const hasText = (value: string | null | undefined): boolean => Boolean(value && value.trim());

function assertHasBody(title: string | null | undefined, content: string | null | undefined): void {
  if (!hasText(title) && !hasText(content)) {
    throw ApiError.validation('A notice needs a title or content.', {
      title: ['Provide a title or content.'],
      content: ['Provide a title or content.'],
    });
  }
}

/** Students read only what is addressed to everyone; staff and admins read it all. */
const audiencesFor = (reader: Reader): readonly NoticeAudience[] | undefined =>
  reader.role === 'student' ? ['all'] : undefined;

export class NoticeService {
  constructor(
    private readonly store: DataStore,
    private readonly audience: AudienceResolver
  ) {}

  async list(reader: Reader): Promise<ListResult<NoticeRecord>> {
    const items = await this.store.notices.list({ audiences: audiencesFor(reader) });
    return { count: items.length, items };
  }

  async get(reader: Reader, id: string): Promise<NoticeRecord> {
    const notice = await this.store.notices.findById(id);
    if (!notice) {
      throw ApiError.notFound('Notice not found.');
    }
    const allowed = audiencesFor(reader);
    if (allowed && !(notice.audience && allowed.includes(notice.audience))) {
      throw ApiError.forbidden('You do not have permission to view this notice.');
    }
    return notice;
  }

  async create(author: Pick<AuthUser, 'userId'>, input: NoticeInput): Promise<NoticeRecord> {
    assertHasBody(input.title, input.content);
    const notice = await this.store.notices.create({
      category: input.category,
      audience: this.audience.onCreate(input.category, input.audience),
      title: input.title ?? null,
      content: input.content ?? null,
      date: input.date ?? null,
      datetime: input.datetime ?? null,
      priority: input.priority ?? 'normal',
      postedBy: author.userId,
      expiryDate: input.expiryDate ?? null,
    });
    logger.info('Notice created', { noticeId: notice.id, category: notice.category, audience: notice.audience });
    return notice;
  }

  async update(id: string, changes: NoticeUpdate): Promise<NoticeRecord> {
    return this.store.transaction(async (tx) => {
      const stored = await tx.notices.findById(id);
      if (!stored) {
        throw ApiError.notFound('Notice not found.');
      }
      assertHasBody(
        changes.title !== undefined ? changes.title : stored.title,
        changes.content !== undefined ? changes.content : stored.content
      );
      const updated = await tx.notices.update(id, {
        ...changes,
        audience: this.audience.onUpdate(stored, changes),
      });
      if (!updated) {
        throw ApiError.notFound('Notice not found.');
      }
      return updated;
    });
  }

  async delete(id: string): Promise<void> {
    if (!(await this.store.notices.delete(id))) {
      throw ApiError.notFound('Notice not found.');
    }
    logger.info('Notice deleted', { noticeId: id });
  }

  /** Deletes every notice created before `cutoff`. Safe to repeat. */
  async purgeOlderThan(cutoff: Date): Promise<number> {
    const removed = await this.store.notices.deleteCreatedBefore(cutoff);
    logger.info('Old notices purged', { removed, cutoff: cutoff.toISOString() });
    return removed;
  }
}
