import {
  CATALOG_DEPARTMENTS,
  GENDERS,
  HOD_STAFF_DELETE_POLICIES,
  NOTICE_AUDIENCES,
  NOTICE_CATEGORIES,
  NOTICE_PRIORITIES,
  PERSON_DEPARTMENTS,
  USER_ROLES,
} from '../utils/constants';

export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];
export type Gender = (typeof GENDERS)[number];
export type PersonDepartment = keyof typeof PERSON_DEPARTMENTS;
export type CatalogDepartment = keyof typeof CATALOG_DEPARTMENTS;
export type NoticeCategory = (typeof NOTICE_CATEGORIES)[number];
export type NoticeAudience = (typeof NOTICE_AUDIENCES)[number];
export type NoticePriority = (typeof NOTICE_PRIORITIES)[number];
export type HodStaffDeletePolicy = (typeof HOD_STAFF_DELETE_POLICIES)[number];

export interface UserRecord {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
  isActive: boolean;
  isStaff: boolean;
  dateJoined: Date;
  updatedAt: Date;
}

interface PersonalDetails {
  department: PersonDepartment | null;
  dateOfBirth: Date | null;
  gender: Gender | null;
  phone: string | null;
  address: string | null;
}

export interface StudentProfile extends PersonalDetails {
  userId: string;
  studentId: string;
  enrollmentDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

export interface StaffProfile extends PersonalDetails {
  userId: string;
  staffId: string;
  designation: string | null;
  qualification: string | null;
  salary: number | null;
  joiningDate: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type HodStatus = { state: 'active' } | { state: 'retired'; endDate: Date };

export interface HodAppointment {
  id: string;
  staffId: string;
  department: PersonDepartment;
  startDate: Date;
  notes: string | null;
  status: HodStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubjectRecord {
  id: string;
  name: string;
  subjectCode: string;
  department: CatalogDepartment;
  semester: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SyllabusRecord {
  id: string;
  subjectId: string;
  pdfUrl: string;
  uploadedAt: Date;
  updatedAt: Date;
}

export interface NoticeRecord {
  id: string;
  category: NoticeCategory;
  audience: NoticeAudience | null;
  title: string | null;
  content: string | null;
  date: Date | null;
  datetime: Date | null;
  priority: NoticePriority;
  postedBy: string | null;
  expiryDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** The caller as seen by the role policy and the controllers. */
export interface AuthUser {
  userId: string;
  email: string;
  role: UserRole;
  isStaff: boolean;
}

export interface TokenPair {
  access: string;
  refresh: string;
}

export interface ListResult<T> {
  count: number;
  items: T[];
}
