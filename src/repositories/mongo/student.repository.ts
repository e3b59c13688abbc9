import { ClientSession } from 'mongoose';
import Student, { toStudentProfile } from '../../models/Student.model';
import { StudentProfile } from '../../types';
import { translateWriteError } from '../errors';
import { NewStudent, StudentChanges, StudentRepository } from '../types';
import { requireObjectId, toObjectId } from './objectId';

export class MongoStudentRepository implements StudentRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByUserId(userId: string): Promise<StudentProfile | null> {
    const _id = toObjectId(userId);
    if (!_id) return null;
    const doc = await Student.findById(_id).session(this.session ?? null);
    return doc ? toStudentProfile(doc) : null;
  }

  async findByStudentId(studentId: string): Promise<StudentProfile | null> {
    const doc = await Student.findOne({ studentId }).session(this.session ?? null);
    return doc ? toStudentProfile(doc) : null;
  }

  async list(): Promise<StudentProfile[]> {
    const docs = await Student.find().sort({ createdAt: -1 }).session(this.session ?? null);
    return docs.map(toStudentProfile);
  }

  async create(input: NewStudent): Promise<StudentProfile> {
    const { userId, ...fields } = input;
    try {
      const doc = await new Student({ _id: requireObjectId(userId, 'userId'), ...fields }).save({
        session: this.session,
      });
      return toStudentProfile(doc);
    } catch (error) {
      throw translateWriteError(error, 'student');
    }
  }

  async update(userId: string, changes: StudentChanges): Promise<StudentProfile | null> {
    const _id = toObjectId(userId);
    if (!_id) return null;
    try {
      const doc = await Student.findByIdAndUpdate(
        _id,
        { $set: changes },
        { new: true, runValidators: true, session: this.session }
      );
      return doc ? toStudentProfile(doc) : null;
    } catch (error) {
      throw translateWriteError(error, 'student');
    }
  }

  async delete(userId: string): Promise<boolean> {
    const _id = toObjectId(userId);
    if (!_id) return false;
    const result = await Student.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }
}
