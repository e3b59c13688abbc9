export const USER_ROLES = {
  ADMIN: 'admin',
  STAFF: 'staff',
  STUDENT: 'student',
} as const;

export const GENDERS = ['M', 'F', 'O'] as const;

// Departments a student or staff member can belong to (and be HOD of).
export const PERSON_DEPARTMENTS = {
  IT: 'Information Technology',
  CS: 'Computer Science',
  EE: 'Electrical Engineering',
  ME: 'Mechanical Engineering',
  CE: 'Civil Engineering',
  ADMIN: 'Administration',
  ACCOUNTS: 'Accounts',
  LIBRARY: 'Library',
  OTHER: 'Other',
} as const;

// Departments that own subjects in the catalog.
export const CATALOG_DEPARTMENTS = {
  CS: 'Computer Science & Engineering',
  ECE: 'Electronics & Communication Engineering',
  EE: 'Electrical & Electronics Engineering',
  MECH: 'Mechanical Engineering',
  CIVIL: 'Civil Engineering',
  IT: 'Information Technology',
} as const;

export const MIN_SEMESTER = 1;
export const MAX_SEMESTER = 8;

export const NOTICE_PRIORITIES = ['normal', 'important', 'urgent'] as const;
export const NOTICE_AUDIENCES = ['staff', 'all'] as const;

export const NOTICE_CATEGORIES = [
  'Staff Meeting',
  'Invigilation Duty',
  'Internal Circular',
  'Timetable Work',
  'Leave / Policy Update',
  'Faculty Training',
  'Research Opportunities',
  'Staff Achievements',
  'Maintenance Notices',
  'IT & System Updates',
  'Holiday Announcement',
  'Exam Timetable',
  'Events',
  'Results',
  'Fee Notices',
  'Emergency Alerts',
  'Workshops / Seminars',
  'Scholarship / Grants',
  'Campus News',
  'Sports / Cultural Updates',
] as const;

/**
 * The one category → audience table. Handed to the notice service at startup;
 * nothing else should carry its own copy.
 */
export const NOTICE_CATEGORY_AUDIENCE = Object.freeze({
  'Staff Meeting': 'staff',
  'Invigilation Duty': 'staff',
  'Internal Circular': 'staff',
  'Timetable Work': 'staff',
  'Leave / Policy Update': 'staff',
  'Faculty Training': 'staff',
  'Research Opportunities': 'staff',
  'Staff Achievements': 'staff',
  'Maintenance Notices': 'staff',
  'IT & System Updates': 'staff',
  'Holiday Announcement': 'all',
  'Exam Timetable': 'all',
  Events: 'all',
  Results: 'all',
  'Fee Notices': 'all',
  'Emergency Alerts': 'all',
  'Workshops / Seminars': 'all',
  'Scholarship / Grants': 'all',
  'Campus News': 'all',
  'Sports / Cultural Updates': 'all',
} as const);

export const HOD_STAFF_DELETE_POLICIES = ['cascade-retire', 'block'] as const;

export const SALT_ROUNDS = 12;
export const MIN_PASSWORD_LENGTH = 8;
export const ACCESS_TOKEN_EXPIRY = '15m';
export const REFRESH_TOKEN_EXPIRY = '7d';
export const SUBJECT_CODE_MAX_ATTEMPTS = 5;
export const NOTICE_RETENTION_MINUTES = 5;
export const MS_PER_DAY = 86400000;
