import logger from '../config/logger';
import { UniqueConstraintError } from '../repositories/errors';
import {
  DataStore,
  StaffChanges,
  StudentChanges,
  UserChanges,
  UserRepository,
} from '../repositories/types';
import {
  Gender,
  HodStaffDeletePolicy,
  ListResult,
  PersonDepartment,
  StaffProfile,
  StudentProfile,
  UserRecord,
} from '../types';
import { ApiError } from '../utils/ApiError';
import { personDepartmentName } from '../utils/departments';
import { AuthService } from './auth.service';

export type ProfileRole = 'student' | 'staff';

export interface RegisterInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  role: ProfileRole;
}

interface PersonalInput {
  department?: PersonDepartment | null;
  dateOfBirth?: Date | null;
  gender?: Gender | null;
  phone?: string | null;
  address?: string | null;
}

interface AccountInput {
  email: string;
  password: string;
  firstName: string;
  lastName: string;
}

export interface NewStudentInput extends AccountInput, PersonalInput {
  studentId: string;
}

export interface NewStaffInput extends AccountInput, PersonalInput {
  staffId: string;
  designation?: string | null;
  qualification?: string | null;
  salary?: number | null;
}

type AccountChanges = Partial<Pick<UserRecord, 'email' | 'firstName' | 'lastName'>>;

export type StudentUpdate = AccountChanges & StudentChanges;
export type StaffUpdate = AccountChanges & StaffChanges;

export interface StudentView extends StudentProfile {
  user: UserRecord;
}

export interface StaffView extends StaffProfile {
  user: UserRecord;
}

export interface ProfileView extends UserRecord {
  profile: StudentProfile | StaffProfile | null;
}

export interface UserServiceOptions {
  hodStaffDeletePolicy: HodStaffDeletePolicy;
}

/**
 * Keeps the owning user's role in line with the profile it carries. Called
 * whenever a profile is updated or its owner is appointed to a headship.
 */
export async function ensureProfileRole(
  users: UserRepository,
  user: UserRecord,
  role: ProfileRole
): Promise<UserRecord> {
  const isStaff = role === 'staff';
  if (user.role === role && user.isStaff === isStaff) {
    return user;
  }
  const updated = await users.update(user.id, { role, isStaff });
  if (!updated) {
    throw ApiError.notFound('User not found.');
  }
  return updated;
}

const DUPLICATE_MESSAGES: Record<string, string> = {
  email: 'A user with this email already exists.',
  studentId: 'Student with this Student ID already exists.',
  staffId: 'Staff with this Staff ID already exists.',
};

function duplicateToValidation(error: unknown): unknown {
  if (!(error instanceof UniqueConstraintError)) return error;
  const field = error.fields[0] ?? error.entity;
  return ApiError.invalidField(field, DUPLICATE_MESSAGES[field] ?? `A ${error.entity} with this ${field} already exists.`);
}

/** Registration, the student and staff registries, and their deletion cascades. */
export class UserService {
  constructor(
    private readonly store: DataStore,
    private readonly auth: AuthService,
    private readonly options: UserServiceOptions
  ) {}

  async register(input: RegisterInput): Promise<UserRecord> {
    const passwordHash = await this.auth.hashPassword(input.password);
    try {
      const user = await this.store.transaction(async (tx) => {
        await this.assertEmailFree(tx, input.email);
        return tx.users.create({
          email: input.email,
          passwordHash,
          firstName: input.firstName,
          lastName: input.lastName,
          role: input.role,
          isStaff: input.role === 'staff',
        });
      });
      logger.info('User registered', { userId: user.id, role: user.role });
      return user;
    } catch (error) {
      throw duplicateToValidation(error);
    }
  }

  async profile(userId: string): Promise<ProfileView> {
    const user = await this.store.users.findById(userId);
    if (!user) {
      throw ApiError.notFound('User not found.');
    }
    let profile: StudentProfile | StaffProfile | null = null;
    if (user.role === 'student') {
      profile = await this.store.students.findByUserId(user.id);
    } else if (user.role === 'staff') {
      profile = await this.store.staff.findByUserId(user.id);
    }
    return { ...user, profile };
  }

  // Students

  async addStudent(input: NewStudentInput): Promise<StudentView> {
    const { email, password, firstName, lastName, ...profile } = input;
    const passwordHash = await this.auth.hashPassword(password);
    try {
      const view = await this.store.transaction(async (tx) => {
        await this.assertEmailFree(tx, email);
        if (await tx.students.findByStudentId(profile.studentId)) {
          throw ApiError.invalidField('studentId', DUPLICATE_MESSAGES.studentId);
        }
        const user = await tx.users.create({
          email,
          passwordHash,
          firstName,
          lastName,
          role: 'student',
          isStaff: false,
        });
        const student = await tx.students.create({
          userId: user.id,
          studentId: profile.studentId,
          department: profile.department ?? null,
          dateOfBirth: profile.dateOfBirth ?? null,
          gender: profile.gender ?? null,
          phone: profile.phone ?? null,
          address: profile.address ?? null,
          enrollmentDate: new Date(),
        });
        return { ...student, user };
      });
      logger.info('Student added', { studentId: view.studentId, userId: view.userId });
      return view;
    } catch (error) {
      throw duplicateToValidation(error);
    }
  }

  async listStudents(): Promise<ListResult<StudentView>> {
    const profiles = await this.store.students.list();
    const users = await this.usersById(profiles.map((profile) => profile.userId));
    const items = profiles
      .flatMap((profile) => {
        const user = users.get(profile.userId);
        return user ? [{ ...profile, user }] : [];
      })
      .sort((a, b) => b.user.dateJoined.getTime() - a.user.dateJoined.getTime());
    return { count: items.length, items };
  }

  async getStudent(studentId: string): Promise<StudentView> {
    const profile = await this.store.students.findByStudentId(studentId);
    if (!profile) {
      throw ApiError.notFound('Student not found.');
    }
    const user = await this.requireUser(this.store, profile.userId);
    return { ...profile, user };
  }

  async updateStudent(studentId: string, changes: StudentUpdate): Promise<StudentView> {
    const { email, firstName, lastName, ...profileChanges } = changes;
    try {
      return await this.store.transaction(async (tx) => {
        const profile = await tx.students.findByStudentId(studentId);
        if (!profile) {
          throw ApiError.notFound('Student not found.');
        }
        if (profileChanges.studentId !== undefined && profileChanges.studentId !== profile.studentId) {
          if (await tx.students.findByStudentId(profileChanges.studentId)) {
            throw ApiError.invalidField('studentId', DUPLICATE_MESSAGES.studentId);
          }
        }

        let user = await this.requireUser(tx, profile.userId);
        user = await this.applyAccountChanges(tx, user, { email, firstName, lastName });
        user = await ensureProfileRole(tx.users, user, 'student');

        const updated = await tx.students.update(profile.userId, profileChanges);
        if (!updated) {
          throw ApiError.notFound('Student not found.');
        }
        return { ...updated, user };
      });
    } catch (error) {
      throw duplicateToValidation(error);
    }
  }

  async deleteStudent(studentId: string): Promise<void> {
    const userId = await this.store.transaction(async (tx) => {
      const profile = await tx.students.findByStudentId(studentId);
      if (!profile) {
        throw ApiError.notFound('Student not found.');
      }
      await tx.notices.clearPostedBy(profile.userId);
      await tx.students.delete(profile.userId);
      await tx.users.delete(profile.userId);
      return profile.userId;
    });
    logger.info('Student deleted', { studentId, userId });
  }

  // Staff

  async addStaff(input: NewStaffInput): Promise<StaffView> {
    const { email, password, firstName, lastName, ...profile } = input;
    const passwordHash = await this.auth.hashPassword(password);
    try {
      const view = await this.store.transaction(async (tx) => {
        await this.assertEmailFree(tx, email);
        if (await tx.staff.findByStaffId(profile.staffId)) {
          throw ApiError.invalidField('staffId', DUPLICATE_MESSAGES.staffId);
        }
        const user = await tx.users.create({
          email,
          passwordHash,
          firstName,
          lastName,
          role: 'staff',
          isStaff: true,
        });
        const staff = await tx.staff.create({
          userId: user.id,
          staffId: profile.staffId,
          department: profile.department ?? null,
          designation: profile.designation ?? null,
          qualification: profile.qualification ?? null,
          salary: profile.salary ?? null,
          dateOfBirth: profile.dateOfBirth ?? null,
          gender: profile.gender ?? null,
          phone: profile.phone ?? null,
          address: profile.address ?? null,
          joiningDate: new Date(),
        });
        return { ...staff, user };
      });
      logger.info('Staff added', { staffId: view.staffId, userId: view.userId });
      return view;
    } catch (error) {
      throw duplicateToValidation(error);
    }
  }

  async listStaff(): Promise<ListResult<StaffView>> {
    const profiles = await this.store.staff.list();
    const users = await this.usersById(profiles.map((profile) => profile.userId));
    const items = profiles
      .flatMap((profile) => {
        const user = users.get(profile.userId);
        return user ? [{ ...profile, user }] : [];
      })
      .sort((a, b) => b.user.dateJoined.getTime() - a.user.dateJoined.getTime());
    return { count: items.length, items };
  }

  async getStaff(staffId: string): Promise<StaffView> {
    const profile = await this.store.staff.findByStaffId(staffId);
    if (!profile) {
      throw ApiError.notFound('Staff not found.');
    }
    const user = await this.requireUser(this.store, profile.userId);
    return { ...profile, user };
  }

  async updateStaff(staffId: string, changes: StaffUpdate): Promise<StaffView> {
    const { email, firstName, lastName, ...profileChanges } = changes;
    try {
      return await this.store.transaction(async (tx) => {
        const profile = await tx.staff.findByStaffId(staffId);
        if (!profile) {
          throw ApiError.notFound('Staff not found.');
        }
        if (profileChanges.staffId !== undefined && profileChanges.staffId !== profile.staffId) {
          if (await tx.staff.findByStaffId(profileChanges.staffId)) {
            throw ApiError.invalidField('staffId', DUPLICATE_MESSAGES.staffId);
          }
        }

        let user = await this.requireUser(tx, profile.userId);
        user = await this.applyAccountChanges(tx, user, { email, firstName, lastName });
        user = await ensureProfileRole(tx.users, user, 'staff');

        const updated = await tx.staff.update(profile.userId, profileChanges);
        if (!updated) {
          throw ApiError.notFound('Staff not found.');
        }
        return { ...updated, user };
      });
    } catch (error) {
      throw duplicateToValidation(error);
    }
  }

  /**
   * Removes the staff profile and its user. An active headship is retired first
   * under `cascade-retire`, or blocks the deletion under `block`.
   */
  async deleteStaff(staffId: string): Promise<void> {
    const userId = await this.store.transaction(async (tx) => {
      const profile = await tx.staff.findByStaffId(staffId);
      if (!profile) {
        throw ApiError.notFound('Staff not found.');
      }

      const headship = await tx.hods.findActiveByStaff(profile.userId);
      if (headship) {
        if (this.options.hodStaffDeletePolicy === 'block') {
          throw ApiError.conflict(
            `Staff ${staffId} is the active HOD of ${personDepartmentName(headship.department)} department; retire the appointment first.`
          );
        }
        await tx.hods.retire(headship.id, new Date());
        logger.info('HOD retired with deleted staff', { hodId: headship.id, department: headship.department });
      }

      await tx.notices.clearPostedBy(profile.userId);
      await tx.staff.delete(profile.userId);
      await tx.users.delete(profile.userId);
      return profile.userId;
    });
    logger.info('Staff deleted', { staffId, userId });
  }

  private async assertEmailFree(tx: DataStore, email: string, exceptUserId?: string): Promise<void> {
    const existing = await tx.users.findByEmail(email);
    if (existing && existing.id !== exceptUserId) {
      throw ApiError.invalidField('email', DUPLICATE_MESSAGES.email);
    }
  }

  private async requireUser(store: DataStore, userId: string): Promise<UserRecord> {
    const user = await store.users.findById(userId);
    if (!user) {
      throw ApiError.notFound('User not found.');
    }
    return user;
  }

  private async applyAccountChanges(tx: DataStore, user: UserRecord, changes: AccountChanges): Promise<UserRecord> {
    const patch: UserChanges = {};
    if (changes.email !== undefined && changes.email !== user.email) {
      await this.assertEmailFree(tx, changes.email, user.id);
      patch.email = changes.email;
    }
    if (changes.firstName !== undefined) patch.firstName = changes.firstName;
    if (changes.lastName !== undefined) patch.lastName = changes.lastName;
    if (Object.keys(patch).length === 0) {
      return user;
    }
    const updated = await tx.users.update(user.id, patch);
    if (!updated) {
      throw ApiError.notFound('User not found.');
    }
    return updated;
  }

  private async usersById(ids: readonly string[]): Promise<Map<string, UserRecord>> {
    const users = await this.store.users.findByIds(ids);
    return new Map(users.map((user) => [user.id, user]));
  }
}

