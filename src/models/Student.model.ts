import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';
import { Gender, PersonDepartment, StudentProfile } from '../types';
import { GENDERS, PERSON_DEPARTMENTS } from '../utils/constants';

export interface IStudent {
  _id: Types.ObjectId;
  studentId: string;
  department?: PersonDepartment | null;
  dateOfBirth?: Date | null;
  gender?: Gender | null;
  phone?: string | null;
  address?: string | null;
  enrollmentDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

// _id is the owning user's id: one profile per user, removed with it.
const studentSchema = new Schema<IStudent>(
  {
    _id: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      required: true,
    },
    studentId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      maxlength: 50,
      match: [/^[A-Z0-9]+$/, 'Student ID must contain only uppercase letters and numbers.'],
    },
    department: {
      type: String,
      enum: Object.keys(PERSON_DEPARTMENTS),
      default: null,
    },
    dateOfBirth: { type: Date, default: null },
    gender: { type: String, enum: [...GENDERS], default: null },
    phone: { type: String, default: null, maxlength: 15 },
    address: { type: String, default: null },
    enrollmentDate: {
      type: Date,
      required: true,
      immutable: true,
    },
  },
  {
    timestamps: true,
  }
);

studentSchema.index({ createdAt: -1 });

export const toStudentProfile = (doc: HydratedDocument<IStudent>): StudentProfile => ({
  userId: doc._id.toString(),
  studentId: doc.studentId,
  department: doc.department ?? null,
  dateOfBirth: doc.dateOfBirth ?? null,
  gender: doc.gender ?? null,
  phone: doc.phone ?? null,
  address: doc.address ?? null,
  enrollmentDate: doc.enrollmentDate,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const Student = mongoose.model<IStudent>('Student', studentSchema);

export default Student;
