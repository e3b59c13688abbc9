import {
  CatalogDepartment,
  HodAppointment,
  NoticeAudience,
  NoticeRecord,
  PersonDepartment,
  StaffProfile,
  StudentProfile,
  SubjectRecord,
  SyllabusRecord,
  UserRecord,
  UserRole,
} from '../types';

export interface NewUser {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isStaff: boolean;
  isActive?: boolean;
}

export type UserChanges = Partial<
  Pick<UserRecord, 'email' | 'firstName' | 'lastName' | 'role' | 'isStaff' | 'isActive'>
>;

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByIds(ids: readonly string[]): Promise<UserRecord[]>;
  findByEmail(email: string): Promise<UserRecord | null>;
  /** The only read that exposes the stored hash. */
  findCredentials(email: string): Promise<{ user: UserRecord; passwordHash: string } | null>;
  create(input: NewUser): Promise<UserRecord>;
  update(id: string, changes: UserChanges): Promise<UserRecord | null>;
  delete(id: string): Promise<boolean>;
}

export type NewStudent = Omit<StudentProfile, 'createdAt' | 'updatedAt'>;
export type StudentChanges = Partial<Omit<StudentProfile, 'userId' | 'enrollmentDate' | 'createdAt' | 'updatedAt'>>;

export interface StudentRepository {
  findByUserId(userId: string): Promise<StudentProfile | null>;
  findByStudentId(studentId: string): Promise<StudentProfile | null>;
  list(): Promise<StudentProfile[]>;
  create(input: NewStudent): Promise<StudentProfile>;
  update(userId: string, changes: StudentChanges): Promise<StudentProfile | null>;
  delete(userId: string): Promise<boolean>;
}

export type NewStaff = Omit<StaffProfile, 'createdAt' | 'updatedAt'>;
export type StaffChanges = Partial<Omit<StaffProfile, 'userId' | 'joiningDate' | 'createdAt' | 'updatedAt'>>;

export interface StaffRepository {
  findByUserId(userId: string): Promise<StaffProfile | null>;
  findByUserIds(userIds: readonly string[]): Promise<StaffProfile[]>;
  findByStaffId(staffId: string): Promise<StaffProfile | null>;
  list(): Promise<StaffProfile[]>;
  create(input: NewStaff): Promise<StaffProfile>;
  update(userId: string, changes: StaffChanges): Promise<StaffProfile | null>;
  delete(userId: string): Promise<boolean>;
}

export interface NewHodAppointment {
  staffId: string;
  department: PersonDepartment;
  startDate: Date;
  notes: string | null;
}

export interface HodFilter {
  department?: PersonDepartment;
  isActive?: boolean;
}

export interface HodRepository {
  findById(id: string): Promise<HodAppointment | null>;
  findActiveByDepartment(department: PersonDepartment): Promise<HodAppointment | null>;
  findActiveByStaff(staffId: string): Promise<HodAppointment | null>;
  /** Ordered by department, active first, then most recent start. */
  list(filter?: HodFilter): Promise<HodAppointment[]>;
  /** Inserts an active appointment. */
  create(input: NewHodAppointment): Promise<HodAppointment>;
  updateDetails(id: string, changes: { startDate?: Date; notes?: string | null }): Promise<HodAppointment | null>;
  /** Retires the appointment if it is active; returns null when it was not. */
  retire(id: string, endDate: Date): Promise<HodAppointment | null>;
  /** Retires every active appointment of the department and returns how many. */
  retireActiveInDepartment(department: PersonDepartment, endDate: Date): Promise<number>;
}

export type NewSubject = Pick<SubjectRecord, 'name' | 'subjectCode' | 'department' | 'semester'>;
export type SubjectChanges = Partial<Pick<SubjectRecord, 'name' | 'department' | 'semester'>>;

export interface SubjectFilter {
  department?: CatalogDepartment;
  semester?: number;
}

export interface SubjectRepository {
  findById(id: string): Promise<SubjectRecord | null>;
  findByIds(ids: readonly string[]): Promise<SubjectRecord[]>;
  findByNameInPair(name: string, department: CatalogDepartment, semester: number): Promise<SubjectRecord | null>;
  /** Every code issued under `prefix`, wherever its subject sits now. */
  listCodes(prefix: string): Promise<string[]>;
  list(filter?: SubjectFilter): Promise<SubjectRecord[]>;
  create(input: NewSubject): Promise<SubjectRecord>;
  update(id: string, changes: SubjectChanges): Promise<SubjectRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface SyllabusRepository {
  findById(id: string): Promise<SyllabusRecord | null>;
  findBySubject(subjectId: string): Promise<SyllabusRecord | null>;
  findBySubjects(subjectIds: readonly string[]): Promise<SyllabusRecord[]>;
  upsert(subjectId: string, pdfUrl: string): Promise<{ record: SyllabusRecord; created: boolean }>;
  update(id: string, pdfUrl: string): Promise<SyllabusRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteBySubject(subjectId: string): Promise<number>;
}

export type NewNotice = Omit<NoticeRecord, 'id' | 'createdAt' | 'updatedAt'>;
export type NoticeChanges = Partial<Omit<NoticeRecord, 'id' | 'postedBy' | 'createdAt' | 'updatedAt'>>;

export interface NoticeRepository {
  findById(id: string): Promise<NoticeRecord | null>;
  /** Newest first; `audiences` restricts to notices addressed to one of them. */
  list(filter?: { audiences?: readonly NoticeAudience[] }): Promise<NoticeRecord[]>;
  create(input: NewNotice): Promise<NoticeRecord>;
  update(id: string, changes: NoticeChanges): Promise<NoticeRecord | null>;
  delete(id: string): Promise<boolean>;
  deleteCreatedBefore(cutoff: Date): Promise<number>;
  /** Detaches the author from their notices; returns how many were touched. */
  clearPostedBy(userId: string): Promise<number>;
}

export interface Repositories {
  users: UserRepository;
  students: StudentRepository;
  staff: StaffRepository;
  hods: HodRepository;
  subjects: SubjectRepository;
  syllabi: SyllabusRepository;
  notices: NoticeRepository;
}

export interface DataStore extends Repositories {
  /**
   * Runs `work` atomically against a transactional view of the store. Calling
   * `transaction` on that view joins the running transaction.
   */
  transaction<T>(work: (tx: DataStore) => Promise<T>): Promise<T>;
}
