import mongoose, { HydratedDocument, Schema } from 'mongoose';
import { UserRecord, UserRole } from '../types';
import { USER_ROLES } from '../utils/constants';

export interface IUser {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isActive: boolean;
  isStaff: boolean;
  dateJoined: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>(
  {
    // Login name; stored lowercased so lookups are case-insensitive.
    email: { type: String, required: true, unique: true, lowercase: true, trim: true, maxlength: 254 },
    passwordHash: { type: String, required: true, select: false },
    firstName: { type: String, required: true, trim: true, maxlength: 100 },
    lastName: { type: String, required: true, trim: true, maxlength: 100 },
    role: {
      type: String,
      enum: Object.values(USER_ROLES),
      required: true,
      index: true,
    },
    isActive: { type: Boolean, default: true },
    isStaff: { type: Boolean, default: false },
  },
  {
    timestamps: { createdAt: 'dateJoined', updatedAt: 'updatedAt' },
    collection: 'users',
  }
);

userSchema.index({ dateJoined: -1 });

export const toUserRecord = (doc: HydratedDocument<IUser>): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  firstName: doc.firstName,
  lastName: doc.lastName,
  role: doc.role,
  isActive: doc.isActive,
  isStaff: doc.isStaff,
  dateJoined: doc.dateJoined,
  updatedAt: doc.updatedAt,
});

const User = mongoose.model<IUser>('User', userSchema);

export default User;
