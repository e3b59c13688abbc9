import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';
import { SyllabusRecord } from '../types';

export interface ISyllabus {
  subject: Types.ObjectId;
  pdfUrl: string;
  uploadedAt: Date;
  updatedAt: Date;
}

const syllabusSchema = new Schema<ISyllabus>(
  {
    subject: {
      type: Schema.Types.ObjectId,
      ref: 'Subject',
      required: true,
      unique: true,
    },
    pdfUrl: {
      type: String,
      required: true,
      trim: true,
    },
  },
  {
    timestamps: { createdAt: 'uploadedAt', updatedAt: true },
    collection: 'syllabi',
  }
);

export const toSyllabusRecord = (doc: HydratedDocument<ISyllabus>): SyllabusRecord => ({
  id: doc._id.toString(),
  subjectId: doc.subject.toString(),
  pdfUrl: doc.pdfUrl,
  uploadedAt: doc.uploadedAt,
  updatedAt: doc.updatedAt,
});

const Syllabus = mongoose.model<ISyllabus>('Syllabus', syllabusSchema);

export default Syllabus;
