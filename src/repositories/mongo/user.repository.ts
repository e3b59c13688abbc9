import { ClientSession } from 'mongoose';
import User, { toUserRecord } from '../../models/User.model';
import { UserRecord } from '../../types';
import { translateWriteError } from '../errors';
import { NewUser, UserChanges, UserRepository } from '../types';
import { toObjectId, toObjectIds } from './objectId';

export class MongoUserRepository implements UserRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<UserRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await User.findById(_id).session(this.session ?? null);
    return doc ? toUserRecord(doc) : null;
  }

  async findByIds(ids: readonly string[]): Promise<UserRecord[]> {
    const docs = await User.find({ _id: { $in: toObjectIds(ids) } }).session(this.session ?? null);
    return docs.map(toUserRecord);
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email: email.toLowerCase() }).session(this.session ?? null);
    return doc ? toUserRecord(doc) : null;
  }

  async findCredentials(email: string): Promise<{ user: UserRecord; passwordHash: string } | null> {
    const doc = await User.findOne({ email: email.toLowerCase() })
      .select('+passwordHash')
      .session(this.session ?? null);
    return doc ? { user: toUserRecord(doc), passwordHash: doc.passwordHash } : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    try {
      const doc = await new User({
        email: input.email,
        passwordHash: input.passwordHash,
        firstName: input.firstName,
        lastName: input.lastName,
        role: input.role,
        isStaff: input.isStaff,
        isActive: input.isActive ?? true,
      }).save({ session: this.session });
      return toUserRecord(doc);
    } catch (error) {
      throw translateWriteError(error, 'user');
    }
  }

  async update(id: string, changes: UserChanges): Promise<UserRecord | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    try {
      const doc = await User.findByIdAndUpdate(
        _id,
        { $set: changes },
        { new: true, runValidators: true, session: this.session }
      );
      return doc ? toUserRecord(doc) : null;
    } catch (error) {
      throw translateWriteError(error, 'user');
    }
  }

  async delete(id: string): Promise<boolean> {
    const _id = toObjectId(id);
    if (!_id) return false;
    const result = await User.deleteOne({ _id }, { session: this.session });
    return result.deletedCount > 0;
  }
}
