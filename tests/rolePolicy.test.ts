import { authorize, PolicyActor } from '../src/utils/rolePolicy';

const admin: PolicyActor = { role: 'admin', isStaff: true };
const staff: PolicyActor = { role: 'staff', isStaff: true };
const student: PolicyActor = { role: 'student', isStaff: false };

describe('authorize', () => {
  it('lets admin and staff create notices but only admin edit them', () => {
    expect(authorize(staff, 'create', 'notice')).toBe(true);
    expect(authorize(student, 'create', 'notice')).toBe(false);
    expect(authorize(staff, 'update', 'notice')).toBe(false);
    expect(authorize(admin, 'delete', 'notice')).toBe(true);
  });

  it('keeps the staff registry and HOD records admin-only', () => {
    expect(authorize(admin, 'create', 'staff')).toBe(true);
    expect(authorize(staff, 'list', 'staff')).toBe(false);
    expect(authorize(staff, 'create', 'hod')).toBe(false);
    expect(authorize(student, 'read', 'departmentHod')).toBe(true);
  });

  it('allows staff to add students but not to list them', () => {
    expect(authorize(staff, 'create', 'student')).toBe(true);
    expect(authorize(staff, 'list', 'student')).toBe(false);
  });

  it('gates catalog writes on the staff flag', () => {
    expect(authorize({ role: 'student', isStaff: true }, 'create', 'syllabus')).toBe(true);
    expect(authorize(student, 'update', 'subject')).toBe(false);
    expect(authorize(student, 'list', 'syllabus')).toBe(true);
  });

  it('denies actions a resource does not list', () => {
    expect(authorize(admin, 'delete', 'departmentHod')).toBe(false);
    expect(authorize(admin, 'update', 'profile')).toBe(false);
  });
});
