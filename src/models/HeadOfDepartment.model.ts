import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';
import { HodAppointment, PersonDepartment } from '../types';
import { PERSON_DEPARTMENTS } from '../utils/constants';

export interface IHeadOfDepartment {
  staff: Types.ObjectId;
  department: PersonDepartment;
  startDate: Date;
  endDate?: Date | null;
  isActive: boolean;
  notes?: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const headOfDepartmentSchema = new Schema<IHeadOfDepartment>(
  {
    staff: {
      type: Schema.Types.ObjectId,
      ref: 'Staff',
      required: true,
      index: true,
    },
    department: {
      type: String,
      enum: Object.keys(PERSON_DEPARTMENTS),
      required: true,
    },
    startDate: {
      type: Date,
      required: true,
    },
    endDate: {
      type: Date,
      default: null,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    notes: {
      type: String,
      default: null,
    },
  },
  {
    timestamps: true,
    collection: 'head_of_department',
  }
);

// The store-level guarantee behind succession: one active head per department,
// one active headship per staff member.
headOfDepartmentSchema.index(
  { department: 1 },
  { unique: true, partialFilterExpression: { isActive: true }, name: 'unique_active_hod_per_department' }
);
headOfDepartmentSchema.index(
  { staff: 1 },
  { unique: true, partialFilterExpression: { isActive: true }, name: 'unique_active_hod_per_staff' }
);
headOfDepartmentSchema.index({ department: 1, isActive: -1, startDate: -1 });

export const toHodAppointment = (doc: HydratedDocument<IHeadOfDepartment>): HodAppointment => ({
  id: doc._id.toString(),
  staffId: doc.staff.toString(),
  department: doc.department,
  startDate: doc.startDate,
  notes: doc.notes ?? null,
  // A row written as inactive without an end date is read back as ended when last touched.
  status: doc.isActive ? { state: 'active' } : { state: 'retired', endDate: doc.endDate ?? doc.updatedAt },
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const HeadOfDepartment = mongoose.model<IHeadOfDepartment>('HeadOfDepartment', headOfDepartmentSchema);

export default HeadOfDepartment;
