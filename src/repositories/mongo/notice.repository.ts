import { ClientSession } from 'mongoose';
import Notice, { toNoticeRecord } from '../../models/Notice.model';
import { NoticeAudience, NoticeRecord } from '../../types';
import { NewNotice, NoticeChanges, NoticeRepository } from '../types';
import { toObjectId } from './objectId';

export class MongoNoticeRepository implements NoticeRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<NoticeRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Notice.findById(_id).session(this.session ?? null);
    return doc ? toNoticeRecord(doc) : null;
  }

  async list(filter: { audiences?: readonly NoticeAudience[] } = {}): Promise<NoticeRecord[]> {
    const query = filter.audiences ? { audience: { $in: [...filter.audiences] } } : {};
    const docs = await Notice.find(query).sort({ createdAt: -1 }).session(this.session ?? null);
    return docs.map(toNoticeRecord);
  }

  async create(input: NewNotice): Promise<NoticeRecord> {
    const { postedBy, ...fields } = input;
    const doc = await new Notice({
      ...fields,
      postedBy: postedBy ? toObjectId(postedBy) : null,
    }).save({ session: this.session });
    return toNoticeRecord(doc);
  }

  async update(id: string, changes: NoticeChanges): Promise<NoticeRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Notice.findByIdAndUpdate(
      _id,
      { $set: changes },
      { new: true, runValidators: true, session: this.session }
    );
    return doc ? toNoticeRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const result = await Notice.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }

  async deleteCreatedBefore(cutoff: Date): Promise<number> {
    const result = await Notice.deleteMany({ createdAt: { $lt: cutoff } }, { session: this.session });
    return result.deletedCount;
  }

  async clearPostedBy(userId: string): Promise<number> {
    const postedBy = toObjectId(userId);
    if (!postedBy) return 0;
    const result = await Notice.updateMany(
      { postedBy },
      { $set: { postedBy: null } },
      { session: this.session }
    );
    return result.modifiedCount;
  }
}
