import request from 'supertest';
import { bearer, createAdmin, createStaffMember, createStudent, createTestContext, TestContext } from '../utils/testApp';

describe('Notice endpoints', () => {
  let ctx: TestContext;
  let adminToken: string;
  let staffToken: string;
  let studentToken: string;

  beforeEach(async () => {
    ctx = createTestContext();
    adminToken = (await createAdmin(ctx)).token;
    staffToken = (await createStaffMember(ctx, 'STF001')).token;
    studentToken = (await createStudent(ctx, 'STU100')).token;
  });

  const post = (token: string, body: object) =>
    request(ctx.app).post('/api/v1/notices').set('Authorization', bearer(token)).send(body);

  it('lets staff post and hides staff-only notices from students', async () => {
    const meeting = await post(staffToken, { category: 'Staff Meeting', title: 'Board review', priority: 'important' });
    const fees = await post(adminToken, { category: 'Fee Notices', content: 'Fees due Friday' });
    expect(meeting.status).toBe(201);
    expect(meeting.body.data).toMatchObject({ audience: 'staff', priority: 'important' });

    const studentList = await request(ctx.app).get('/api/v1/notices').set('Authorization', bearer(studentToken));
    expect(studentList.body.data.count).toBe(1);
    expect(studentList.body.data.items[0].id).toBe(fees.body.data.id);

    const hidden = await request(ctx.app)
      .get(`/api/v1/notices/${meeting.body.data.id}`)
      .set('Authorization', bearer(studentToken));
    expect(hidden.status).toBe(403);
  });

  it('does not let students post notices', async () => {
    const res = await post(studentToken, { category: 'Events', title: 'Party' });
    expect(res.status).toBe(403);
  });

  it('validates the category', async () => {
    const res = await post(adminToken, { category: 'Gossip', title: 'Hmm' });
    expect(res.status).toBe(400);
    expect(Object.keys(res.body.details)).toEqual(['category']);
  });

  it('keeps edits and deletion with admin', async () => {
    const created = await post(staffToken, { category: 'Events', title: 'Sports day' });
    const path = `/api/v1/notices/${created.body.data.id}`;

    const byStaff = await request(ctx.app).patch(path).set('Authorization', bearer(staffToken)).send({ title: 'x' });
    expect(byStaff.status).toBe(403);

    const edited = await request(ctx.app)
      .patch(path)
      .set('Authorization', bearer(adminToken))
      .send({ category: 'Faculty Training' });
    expect(edited.body.data).toMatchObject({ category: 'Faculty Training', audience: 'staff', title: 'Sports day' });

    const removed = await request(ctx.app).delete(path).set('Authorization', bearer(adminToken));
    expect(removed.status).toBe(200);
    const again = await request(ctx.app).delete(path).set('Authorization', bearer(adminToken));
    expect(again.status).toBe(404);
    expect(again.body.message).toBe('Notice not found.');
  });
});
