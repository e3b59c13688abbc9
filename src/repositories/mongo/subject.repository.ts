import { ClientSession } from 'mongoose';
import Subject, { toSubjectRecord } from '../../models/Subject.model';
import { CatalogDepartment, SubjectRecord } from '../../types';
import { translateWriteError } from '../errors';
import { NewSubject, SubjectChanges, SubjectFilter, SubjectRepository } from '../types';
import { toObjectId, toObjectIds } from './objectId';

export class MongoSubjectRepository implements SubjectRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<SubjectRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await Subject.findById(_id).session(this.session ?? null);
    return doc ? toSubjectRecord(doc) : null;
  }

  async findByIds(ids: readonly string[]): Promise<SubjectRecord[]> {
    const docs = await Subject.find({ _id: { $in: toObjectIds(ids) } }).session(this.session ?? null);
    return docs.map(toSubjectRecord);
  }

  async findByNameInPair(
    name: string,
    department: CatalogDepartment,
    semester: number
  ): Promise<SubjectRecord | null> {
    const doc = await Subject.findOne({ name, department, semester }).session(this.session ?? null);
    return doc ? toSubjectRecord(doc) : null;
  }

  async listCodes(prefix: string): Promise<string[]> {
    // Prefixes are uppercase letters and digits, so they need no regex escaping.
    const docs = await Subject.find({ subjectCode: { $regex: `^${prefix}` } })
      .select('subjectCode')
      .session(this.session ?? null);
    return docs.map((doc) => doc.subjectCode);
  }

  async list(filter: SubjectFilter = {}): Promise<SubjectRecord[]> {
    const query: SubjectFilter = {};
    if (filter.department) query.department = filter.department;
    if (filter.semester !== undefined) query.semester = filter.semester;
    const docs = await Subject.find(query).session(this.session ?? null);
    return docs.map(toSubjectRecord);
  }

  async create(input: NewSubject): Promise<SubjectRecord> {
    try {
      const doc = await new Subject(input).save({ session: this.session });
      return toSubjectRecord(doc);
    } catch (error) {
      throw translateWriteError(error, 'subject');
    }
  }

  async update(id: string, changes: SubjectChanges): Promise<SubjectRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    try {
      const doc = await Subject.findByIdAndUpdate(
        _id,
        { $set: changes },
        { new: true, runValidators: true, session: this.session }
      );
      return doc ? toSubjectRecord(doc) : null;
    } catch (error) {
      throw translateWriteError(error, 'subject');
    }
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const result = await Subject.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }
}
