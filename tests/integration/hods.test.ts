import request from 'supertest';
import { bearer, createAdmin, createStaffMember, createStudent, createTestContext, TestContext } from '../utils/testApp';

describe('HOD endpoints', () => {
  let ctx: TestContext;
  let adminToken: string;
  let graceId: string;
  let alanId: string;

  beforeEach(async () => {
    ctx = createTestContext();
    adminToken = (await createAdmin(ctx)).token;
    graceId = (await createStaffMember(ctx, 'STF001', { firstName: 'Grace', lastName: 'Hopper' })).staff.userId;
    alanId = (await createStaffMember(ctx, 'STF002', { firstName: 'Alan', lastName: 'Turing' })).staff.userId;
  });

  const appoint = (body: object) =>
    request(ctx.app).post('/api/v1/auth/hods').set('Authorization', bearer(adminToken)).send(body);

  it('appoints and shows the current head to any signed-in user', async () => {
    const created = await appoint({ staff: graceId, department: 'cs', startDate: '2026-01-05' });
    expect(created.status).toBe(201);
    expect(created.body.data).toMatchObject({
      staffName: 'Grace Hopper',
      department: 'CS',
      isActive: true,
      startDate: '2026-01-05T00:00:00.000Z',
    });

    const { token } = await createStudent(ctx, 'STU100');
    const current = await request(ctx.app).get('/api/v1/auth/departments/CS/hod').set('Authorization', bearer(token));
    expect(current.status).toBe(200);
    expect(current.body.data.staffCode).toBe('STF001');
  });

  it('answers a second appointment to the department with a conflict', async () => {
    await appoint({ staff: graceId, department: 'CS' });

    const res = await appoint({ staff: alanId, department: 'CS' });
    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      success: false,
      message: 'Grace Hopper is already the HOD of Computer Science department.',
      code: 'CONFLICT',
    });

    const superseded = await appoint({ staff: alanId, department: 'CS', supersede: true });
    expect(superseded.status).toBe(201);
  });

  it('filters the history and retires on delete', async () => {
    const created = await appoint({ staff: graceId, department: 'CS' });
    await appoint({ staff: alanId, department: 'IT' });

    const retired = await request(ctx.app)
      .delete(`/api/v1/auth/hods/${created.body.data.id}`)
      .set('Authorization', bearer(adminToken));
    expect(retired.status).toBe(200);
    expect(retired.body.data.isActive).toBe(false);

    const active = await request(ctx.app)
      .get('/api/v1/auth/hods?isActive=true')
      .set('Authorization', bearer(adminToken));
    expect(active.body.data.items.map((item: { department: string }) => item.department)).toEqual(['IT']);

    const none = await request(ctx.app).get('/api/v1/auth/departments/cs/hod').set('Authorization', bearer(adminToken));
    expect(none.status).toBe(404);
    expect(none.body.message).toBe('No active HOD found for Computer Science department.');
  });

  it('rejects unknown departments and staff-only callers', async () => {
    const invalid = await appoint({ staff: graceId, department: 'ARTS' });
    expect(invalid.status).toBe(400);
    expect(invalid.body.details.department).toEqual([
      'Invalid department. Valid choices: IT, CS, EE, ME, CE, ADMIN, ACCOUNTS, LIBRARY, OTHER',
    ]);

    const { token } = await createStaffMember(ctx, 'STF003');
    const forbidden = await request(ctx.app).get('/api/v1/auth/hods').set('Authorization', bearer(token));
    expect(forbidden.status).toBe(403);
  });

  it('rejects a malformed record id', async () => {
    const res = await request(ctx.app).get('/api/v1/auth/hods/not-an-id').set('Authorization', bearer(adminToken));
    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ id: ['Invalid id.'] });
  });
});
