import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';
import { Gender, PersonDepartment, StaffProfile } from '../types';
import { GENDERS, PERSON_DEPARTMENTS } from '../utils/constants';

export interface IStaff {
  _id: Types.ObjectId;
  staffId: string;
  department?: PersonDepartment | null;
  designation?: string | null;
  qualification?: string | null;
  salary?: number | null;
  dateOfBirth?: Date | null;
  gender?: Gender | null;
  phone?: string | null;
  address?: string | null;
  joiningDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

const staffSchema = new Schema<IStaff>(
  {
    _id: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      required: true,
    },
    staffId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      maxlength: 50,
      match: [/^[A-Z0-9]+$/, 'Staff ID must contain only uppercase letters and numbers.'],
    },
    department: {
      type: String,
      enum: Object.keys(PERSON_DEPARTMENTS),
      default: null,
    },
    designation: { type: String, default: null, maxlength: 100 },
    qualification: { type: String, default: null, maxlength: 200 },
    salary: { type: Number, default: null, min: 0 },
    dateOfBirth: { type: Date, default: null },
    gender: { type: String, enum: [...GENDERS], default: null },
    phone: { type: String, default: null, maxlength: 15 },
    address: { type: String, default: null },
    joiningDate: {
      type: Date,
      required: true,
      immutable: true,
    },
  },
  {
    timestamps: true,
    collection: 'staff',
  }
);

staffSchema.index({ createdAt: -1 });

export const toStaffProfile = (doc: HydratedDocument<IStaff>): StaffProfile => ({
  userId: doc._id.toString(),
  staffId: doc.staffId,
  department: doc.department ?? null,
  designation: doc.designation ?? null,
  qualification: doc.qualification ?? null,
  salary: doc.salary ?? null,
  dateOfBirth: doc.dateOfBirth ?? null,
  gender: doc.gender ?? null,
  phone: doc.phone ?? null,
  address: doc.address ?? null,
  joiningDate: doc.joiningDate,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const Staff = mongoose.model<IStaff>('Staff', staffSchema);

export default Staff;
