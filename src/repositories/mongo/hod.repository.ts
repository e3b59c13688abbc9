import { ClientSession } from 'mongoose';
import HeadOfDepartment, { toHodAppointment } from '../../models/HeadOfDepartment.model';
import { HodAppointment, PersonDepartment } from '../../types';
import { translateWriteError } from '../errors';
import { HodFilter, HodRepository, NewHodAppointment } from '../types';
import { requireObjectId, toObjectId } from './objectId';

const INDEX_FIELDS = { staff: 'staffId' };

export class MongoHodRepository implements HodRepository {
  constructor(private readonly session?: ClientSession) {}

  async findById(id: string): Promise<HodAppointment | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await HeadOfDepartment.findById(_id).session(this.session ?? null);
    return doc ? toHodAppointment(doc) : null;
  }

  async findActiveByDepartment(department: PersonDepartment): Promise<HodAppointment | null> {
    const doc = await HeadOfDepartment.findOne({ department, isActive: true }).session(this.session ?? null);
    return doc ? toHodAppointment(doc) : null;
  }

  async findActiveByStaff(staffId: string): Promise<HodAppointment | null> {
    const staff = toObjectId(staffId);
    if (!staff) return null;
    const doc = await HeadOfDepartment.findOne({ staff, isActive: true }).session(this.session ?? null);
    return doc ? toHodAppointment(doc) : null;
  }

  async list(filter: HodFilter = {}): Promise<HodAppointment[]> {
    const query: { department?: PersonDepartment; isActive?: boolean } = {};
    if (filter.department) query.department = filter.department;
    if (filter.isActive !== undefined) query.isActive = filter.isActive;

    const docs = await HeadOfDepartment.find(query)
      .sort({ department: 1, isActive: -1, startDate: -1 })
      .session(this.session ?? null);
    return docs.map(toHodAppointment);
  }

  async create(input: NewHodAppointment): Promise<HodAppointment> {
    try {
      const doc = await new HeadOfDepartment({
        staff: requireObjectId(input.staffId, 'staffId'),
        department: input.department,
        startDate: input.startDate,
        notes: input.notes,
        isActive: true,
        endDate: null,
      }).save({ session: this.session });
      return toHodAppointment(doc);
    } catch (error) {
      throw translateWriteError(error, 'hod', INDEX_FIELDS);
    }
  }

  async updateDetails(
    id: string,
    changes: { startDate?: Date; notes?: string | null }
  ): Promise<HodAppointment | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await HeadOfDepartment.findByIdAndUpdate(
      _id,
      { $set: changes },
      { new: true, runValidators: true, session: this.session }
    );
    return doc ? toHodAppointment(doc) : null;
  }

  async retire(id: string, endDate: Date): Promise<HodAppointment | null> {
    const _id = toObjectId(id);
    if (!_id) return null;
    const doc = await HeadOfDepartment.findOneAndUpdate(
      { _id, isActive: true },
      { $set: { isActive: false, endDate } },
      { new: true, session: this.session }
    );
    return doc ? toHodAppointment(doc) : null;
  }

  async retireActiveInDepartment(department: PersonDepartment, endDate: Date): Promise<number> {
    const result = await HeadOfDepartment.updateMany(
      { department, isActive: true },
      { $set: { isActive: false, endDate } },
      { session: this.session }
    );
    return result.modifiedCount;
  }
}
