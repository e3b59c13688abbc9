import request from 'supertest';
import {
  bearer,
  createAdmin,
  createStaffMember,
  createStudent,
  createTestContext,
  TEST_PASSWORD,
  TestContext,
} from '../utils/testApp';

describe('Student and staff registry', () => {
  let ctx: TestContext;
  let adminToken: string;

  beforeEach(async () => {
    ctx = createTestContext();
    adminToken = (await createAdmin(ctx)).token;
  });

  it('lets staff add a student but only admin list them', async () => {
    const { token: staffToken } = await createStaffMember(ctx, 'STF001');

    const added = await request(ctx.app)
      .post('/api/v1/auth/add-student')
      .set('Authorization', bearer(staffToken))
      .send({
        email: 'learner@campus.test',
        password: TEST_PASSWORD,
        firstName: 'Lee',
        lastName: 'Learner',
        studentId: 'STU200',
        department: 'it',
        gender: 'F',
      });
    expect(added.status).toBe(201);
    expect(added.body.data).toMatchObject({ studentId: 'STU200', department: 'IT', gender: 'F' });

    const forbidden = await request(ctx.app).get('/api/v1/auth/students').set('Authorization', bearer(staffToken));
    expect(forbidden.status).toBe(403);

    const listed = await request(ctx.app).get('/api/v1/auth/students').set('Authorization', bearer(adminToken));
    expect(listed.status).toBe(200);
    expect(listed.body.data.count).toBe(1);
    expect(listed.body.data.items[0].user.email).toBe('learner@campus.test');
  });

  it('validates student fields', async () => {
    const res = await request(ctx.app)
      .post('/api/v1/auth/add-student')
      .set('Authorization', bearer(adminToken))
      .send({
        email: 'learner@campus.test',
        password: TEST_PASSWORD,
        firstName: 'Lee',
        lastName: 'Learner',
        studentId: 'stu-200',
        phone: '12',
      });

    expect(res.status).toBe(400);
    expect(res.body.details.studentId).toEqual(['Student ID must contain only uppercase letters and numbers.']);
    expect(res.body.details.phone).toEqual([
      "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.",
    ]);
  });

  it('keeps students out of the registry', async () => {
    const { token } = await createStudent(ctx, 'STU100');

    const res = await request(ctx.app).get('/api/v1/auth/staff').set('Authorization', bearer(token));
    expect(res.status).toBe(403);
    expect(res.body.code).toBe('FORBIDDEN');
  });

  it('does not let a student edit or delete a student record', async () => {
    const { token } = await createStudent(ctx, 'STU100');
    await createStudent(ctx, 'STU101');

    const own = await request(ctx.app)
      .patch('/api/v1/auth/students/STU100')
      .set('Authorization', bearer(token))
      .send({ address: '1 College Road' });
    const other = await request(ctx.app).delete('/api/v1/auth/students/STU101').set('Authorization', bearer(token));

    expect([own.status, own.body.code]).toEqual([403, 'FORBIDDEN']);
    expect([other.status, other.body.code]).toEqual([403, 'FORBIDDEN']);

    const stillThere = await request(ctx.app)
      .get('/api/v1/auth/students/STU101')
      .set('Authorization', bearer(adminToken));
    expect(stillThere.status).toBe(200);
  });

  it('updates a student through the user aliases', async () => {
    await createStudent(ctx, 'STU100');

    const res = await request(ctx.app)
      .patch('/api/v1/auth/students/STU100')
      .set('Authorization', bearer(adminToken))
      .send({ userFirstName: 'Renamed', address: '1 College Road' });

    expect(res.status).toBe(200);
    expect(res.body.data.address).toBe('1 College Road');
    expect(res.body.data.user.firstName).toBe('Renamed');
  });

  it('deletes a student together with the login', async () => {
    const { student } = await createStudent(ctx, 'STU100');

    const res = await request(ctx.app)
      .delete('/api/v1/auth/students/STU100')
      .set('Authorization', bearer(adminToken));
    expect(res.status).toBe(200);
    expect(res.body.data).toBeNull();

    const login = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ email: student.user.email, password: TEST_PASSWORD });
    expect(login.status).toBe(401);
  });

  it('adds and fetches a staff member', async () => {
    const added = await request(ctx.app)
      .post('/api/v1/auth/add-staff')
      .set('Authorization', bearer(adminToken))
      .send({
        email: 'lecturer@campus.test',
        password: TEST_PASSWORD,
        firstName: 'Lin',
        lastName: 'Lecturer',
        staffId: 'STF300',
        designation: 'Senior Lecturer',
        salary: '4200.50',
      });
    expect(added.status).toBe(201);
    expect(added.body.data).toMatchObject({ staffId: 'STF300', salary: 4200.5, user: { role: 'staff', isStaff: true } });

    const fetched = await request(ctx.app).get('/api/v1/auth/staff/STF300').set('Authorization', bearer(adminToken));
    expect(fetched.status).toBe(200);
    expect(fetched.body.data.designation).toBe('Senior Lecturer');

    const missing = await request(ctx.app).get('/api/v1/auth/staff/STF999').set('Authorization', bearer(adminToken));
    expect(missing.status).toBe(404);
    expect(missing.body.message).toBe('Staff not found.');
  });
});
