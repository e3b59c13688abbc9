import mongoose, { HydratedDocument, Schema, Types } from 'mongoose';
import { NoticeAudience, NoticeCategory, NoticePriority, NoticeRecord } from '../types';
import { NOTICE_AUDIENCES, NOTICE_CATEGORIES, NOTICE_PRIORITIES } from '../utils/constants';

export interface INotice {
  category: NoticeCategory;
  audience?: NoticeAudience | null;
  title?: string | null;
  content?: string | null;
  date?: Date | null;
  datetime?: Date | null;
  priority: NoticePriority;
  postedBy?: Types.ObjectId | null;
  expiryDate?: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const noticeSchema = new Schema<INotice>(
  {
    category: {
      type: String,
      enum: [...NOTICE_CATEGORIES],
      required: true,
    },
    audience: {
      type: String,
      enum: [...NOTICE_AUDIENCES],
      default: null,
    },
    title: { type: String, default: null, trim: true, maxlength: 200 },
    content: { type: String, default: null },
    date: { type: Date, default: null },
    datetime: { type: Date, default: null },
    priority: {
      type: String,
      enum: [...NOTICE_PRIORITIES],
      default: 'normal',
    },
    // Weak reference: cleared, not cascaded, when the author is removed.
    postedBy: {
      type: Schema.Types.ObjectId,
      ref: 'User',
      default: null,
    },
    expiryDate: { type: Date, default: null },
  },
  {
    timestamps: true,
  }
);

noticeSchema.index({ createdAt: -1 });
noticeSchema.index({ audience: 1, createdAt: -1 });

export const toNoticeRecord = (doc: HydratedDocument<INotice>): NoticeRecord => ({
  id: doc._id.toString(),
  category: doc.category,
  audience: doc.audience ?? null,
  title: doc.title ?? null,
  content: doc.content ?? null,
  date: doc.date ?? null,
  datetime: doc.datetime ?? null,
  priority: doc.priority,
  postedBy: doc.postedBy ? doc.postedBy.toString() : null,
  expiryDate: doc.expiryDate ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const Notice = mongoose.model<INotice>('Notice', noticeSchema);

export default Notice;
