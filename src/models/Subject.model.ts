import mongoose, { HydratedDocument, Schema } from 'mongoose';
import { CatalogDepartment, SubjectRecord } from '../types';
import { CATALOG_DEPARTMENTS, MAX_SEMESTER, MIN_SEMESTER } from '../utils/constants';

export interface ISubject {
  name: string;
  subjectCode: string;
  department: CatalogDepartment;
  semester: number;
  createdAt: Date;
  updatedAt: Date;
}

const subjectSchema = new Schema<ISubject>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 150,
    },
    subjectCode: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    department: {
      type: String,
      enum: Object.keys(CATALOG_DEPARTMENTS),
      required: true,
    },
    semester: {
      type: Number,
      required: true,
      min: MIN_SEMESTER,
      max: MAX_SEMESTER,
    },
  },
  {
    timestamps: true,
  }
);

subjectSchema.index({ name: 1, department: 1, semester: 1 }, { unique: true });
subjectSchema.index({ department: 1, semester: 1, subjectCode: 1 });

export const toSubjectRecord = (doc: HydratedDocument<ISubject>): SubjectRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  subjectCode: doc.subjectCode,
  department: doc.department,
  semester: doc.semester,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const Subject = mongoose.model<ISubject>('Subject', subjectSchema);

export default Subject;
