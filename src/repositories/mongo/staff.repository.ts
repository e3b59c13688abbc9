import { ClientSession } from 'mongoose';
import Staff, { toStaffProfile } from '../../models/Staff.model';
import { StaffProfile } from '../../types';
import { translateWriteError } from '../errors';
import { NewStaff, StaffChanges, StaffRepository } from '../types';
import { requireObjectId, toObjectId, toObjectIds } from './objectId';

export class MongoStaffRepository implements StaffRepository {
  constructor(private readonly session?: ClientSession) {}

  async findByUserId(userId: string): Promise<StaffProfile | null> {
    const _id = toObjectId(userId);
    if (!_id) return null;
    const doc = await Staff.findById(_id).session(this.session ?? null);
    return doc ? toStaffProfile(doc) : null;
  }

  async findByUserIds(userIds: readonly string[]): Promise<StaffProfile[]> {
    const docs = await Staff.find({ _id: { $in: toObjectIds(userIds) } }).session(this.session ?? null);
    return docs.map(toStaffProfile);
  }

  async findByStaffId(staffId: string): Promise<StaffProfile | null> {
    const doc = await Staff.findOne({ staffId }).session(this.session ?? null);
    return doc ? toStaffProfile(doc) : null;
  }

  async list(): Promise<StaffProfile[]> {
    const docs = await Staff.find().sort({ createdAt: -1 }).session(this.session ?? null);
    return docs.map(toStaffProfile);
  }

  async create(input: NewStaff): Promise<StaffProfile> {
    const { userId, ...fields } = input;
    try {
      const doc = await new Staff({ _id: requireObjectId(userId, 'userId'), ...fields }).save({
        session: this.session,
      });
      return toStaffProfile(doc);
    } catch (error) {
      throw translateWriteError(error, 'staff');
    }
  }

  async update(userId: string, changes: StaffChanges): Promise<StaffProfile | null> {
    const _id = toObjectId(userId);
    if (!_id) return null;
    try {
      const doc = await Staff.findByIdAndUpdate(
        _id,
        { $set: changes },
        { new: true, runValidators: true, session: this.session }
      );
      return doc ? toStaffProfile(doc) : null;
    } catch (error) {
      throw translateWriteError(error, 'staff');
    }
  }

  async delete(userId: string): Promise<boolean> {
    const _id = toObjectId(userId);
    if (!_id) return false;
    const result = await Staff.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }
}
