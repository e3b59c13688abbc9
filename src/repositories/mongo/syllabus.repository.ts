import { ClientSession } from 'mongoose';
import Syllabus, { toSyllabusRecord } from '../../models/Syllabus.model';
import { SyllabusRecord } from '../../types';
import { translateWriteError } from '../errors';
import { SyllabusRepository } from '../types';
import { requireObjectId, toObjectId, toObjectIds } from './objectId';

const INDEX_FIELDS = { subject: 'subjectId' };

export class MongoSyllabusRepository implements SyllabusRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<SyllabusRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Syllabus.findById(_id).session(this.session ?? null);
    return doc ? toSyllabusRecord(doc) : null;
  }

  async findBySubject(subjectId: string): Promise<SyllabusRecord | null> {
    const subject = toObjectId(subjectId);
    if (!subject) return null;
    const doc = await Syllabus.findOne({ subject }).session(this.session ?? null);
    return doc ? toSyllabusRecord(doc) : null;
  }

  async findBySubjects(subjectIds: readonly string[]): Promise<SyllabusRecord[]> {
    const docs = await Syllabus.find({ subject: { $in: toObjectIds(subjectIds) } }).session(this.session ?? null);
    return docs.map(toSyllabusRecord);
  }

  async upsert(subjectId: string, pdfUrl: string): Promise<{ record: SyllabusRecord; created: boolean }> {
    const subject = requireObjectId(subjectId, 'subjectId');
    try {
      const existing = await Syllabus.findOne({ subject }).session(this.session ?? null);
      if (existing) {
        existing.pdfUrl = pdfUrl;
        const saved = await existing.save({ session: this.session });
        return { record: toSyllabusRecord(saved), created: false };
      }
      const doc = await new Syllabus({ subject, pdfUrl }).save({ session: this.session });
      return { record: toSyllabusRecord(doc), created: true };
    } catch (error) {
      throw translateWriteError(error, 'syllabus', INDEX_FIELDS);
    }
  }

  async update(id: string, pdfUrl: string): Promise<SyllabusRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Syllabus.findByIdAndUpdate(
      _id,
      { $set: { pdfUrl } },
      { new: true, runValidators: true, session: this.session }
    );
    return doc ? toSyllabusRecord(doc) : null;
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const result = await Syllabus.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }

  async deleteBySubject(subjectId: string): Promise<number> {
    const subject = toObjectId(subjectId);
    if (!subject) return 0;
    const result = await Syllabus.deleteMany({ subject }, { session: this.session });
    return result.deletedCount;
  }
}
