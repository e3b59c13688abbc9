import {
  createAdmin,
  createStaffMember,
  createStudent,
  createTestContext,
  TEST_PASSWORD,
  TestContext,
} from '../utils/testApp';

describe('UserService', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('students', () => {
    it('creates the user and profile together', async () => {
      const { student } = await createStudent(ctx, 'STU100', 'IT');

      expect(student).toMatchObject({
        studentId: 'STU100',
        department: 'IT',
        user: { email: 'stu100@campus.test', role: 'student', isStaff: false, isActive: true },
      });
      expect(await ctx.store.students.findByUserId(student.user.id)).not.toBeNull();
    });

    it('writes the login once when adding a student', async () => {
      const update = jest.spyOn(ctx.store.users, 'update');

      const { student } = await createStudent(ctx, 'STU100');

      expect(student.user).toMatchObject({ role: 'student', isStaff: false });
      expect(update).not.toHaveBeenCalled();
    });

    it('reports a taken student ID or email on the offending field', async () => {
      await createStudent(ctx, 'STU100');

      await expect(
        ctx.services.users.addStudent({
          email: 'someone@campus.test',
          password: TEST_PASSWORD,
          firstName: 'Other',
          lastName: 'Person',
          studentId: 'STU100',
        })
      ).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        details: { studentId: ['Student with this Student ID already exists.'] },
      });
      await expect(
        ctx.services.users.addStudent({
          email: 'STU100@campus.test',
          password: TEST_PASSWORD,
          firstName: 'Other',
          lastName: 'Person',
          studentId: 'STU101',
        })
      ).rejects.toMatchObject({ details: { email: ['A user with this email already exists.'] } });
      expect((await ctx.services.users.listStudents()).count).toBe(1);
    });

    it('lists the most recently joined first', async () => {
      await createStudent(ctx, 'STU100');
      await createStudent(ctx, 'STU101');

      const list = await ctx.services.users.listStudents();
      expect(list.items.map((item) => item.studentId)).toEqual(['STU101', 'STU100']);
    });

    it('updates account and profile fields in one call', async () => {
      await createStudent(ctx, 'STU100');

      const updated = await ctx.services.users.updateStudent('STU100', {
        email: 'renamed@campus.test',
        firstName: 'Renamed',
        phone: '5550100',
      });

      expect(updated.phone).toBe('5550100');
      expect(updated.user).toMatchObject({ email: 'renamed@campus.test', firstName: 'Renamed', role: 'student' });
    });

    it('deletes the user with the profile and detaches their notices', async () => {
      const { student } = await createStudent(ctx, 'STU100');
      const notice = await ctx.services.notices.create(
        { userId: student.user.id },
        { category: 'Events', title: 'Club fair' }
      );

      await ctx.services.users.deleteStudent('STU100');

      expect(await ctx.store.users.findById(student.user.id)).toBeNull();
      expect((await ctx.store.notices.findById(notice.id))?.postedBy).toBeNull();
      await expect(ctx.services.users.getStudent('STU100')).rejects.toMatchObject({
        statusCode: 404,
        message: 'Student not found.',
      });
    });
  });

  describe('staff', () => {
    it('retires an active headship when deleting the staff member', async () => {
      const { staff } = await createStaffMember(ctx, 'STF001');
      const hod = await ctx.services.hods.appoint({ staffId: staff.userId, department: 'CS' });

      await ctx.services.users.deleteStaff('STF001');

      const history = await ctx.services.hods.get(hod.id);
      expect(history).toMatchObject({ isActive: false, staffCode: null, staffName: null });
      expect(await ctx.store.staff.findByUserId(staff.userId)).toBeNull();
    });

    it('blocks deleting an active head under the block policy', async () => {
      ctx = createTestContext({ HOD_STAFF_DELETE_POLICY: 'block' });
      const { staff } = await createStaffMember(ctx, 'STF001');
      await ctx.services.hods.appoint({ staffId: staff.userId, department: 'CS' });

      await expect(ctx.services.users.deleteStaff('STF001')).rejects.toMatchObject({
        statusCode: 409,
        message: 'Staff STF001 is the active HOD of Computer Science department; retire the appointment first.',
      });
      expect((await ctx.services.users.getStaff('STF001')).staffId).toBe('STF001');
    });

    it('restores the staff role on update when the login drifted', async () => {
      const { staff } = await createStaffMember(ctx, 'STF001');
      await ctx.store.users.update(staff.userId, { role: 'student', isStaff: false });

      const updated = await ctx.services.users.updateStaff('STF001', { designation: 'Lecturer' });

      expect(updated.designation).toBe('Lecturer');
      expect(updated.user).toMatchObject({ role: 'staff', isStaff: true });
      expect(await ctx.store.users.findById(staff.userId)).toMatchObject({ role: 'staff', isStaff: true });
    });

    it('rejects a staff ID taken by someone else on update', async () => {
      await createStaffMember(ctx, 'STF001');
      await createStaffMember(ctx, 'STF002');

      await expect(ctx.services.users.updateStaff('STF002', { staffId: 'STF001' })).rejects.toMatchObject({
        details: { staffId: ['Staff with this Staff ID already exists.'] },
      });
    });
  });

  describe('register and profile', () => {
    it('registers a staff account with the staff flag set', async () => {
      const user = await ctx.services.users.register({
        email: 'new.staff@campus.test',
        password: TEST_PASSWORD,
        firstName: 'New',
        lastName: 'Staff',
        role: 'staff',
      });

      expect(user).toMatchObject({ role: 'staff', isStaff: true });
      const profile = await ctx.services.users.profile(user.id);
      expect(profile.profile).toBeNull();
    });

    it('returns an admin profile without a registry record', async () => {
      const { user } = await createAdmin(ctx);

      const profile = await ctx.services.users.profile(user.id);
      expect(profile).toMatchObject({ email: 'admin@campus.test', role: 'admin', profile: null });
    });
  });
});
