import request from 'supertest';
import { bearer, createTestContext, TEST_PASSWORD, TestContext } from '../utils/testApp';

const testUser = {
  email: 'TestUser@Example.com',
  password: 'Password123!',
  password2: 'Password123!',
  firstName: 'Test',
  lastName: 'User',
  role: 'student',
};

describe('Auth integration', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('returns healthy status', async () => {
    const res = await request(ctx.app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.environment).toBe('test');
  });

  it('registers, logs in, and fetches the profile', async () => {
    const registerRes = await request(ctx.app).post('/api/v1/auth/register').send(testUser);

    expect(registerRes.status).toBe(201);
    expect(registerRes.body.data.user).toMatchObject({
      email: 'testuser@example.com',
      role: 'student',
      isStaff: false,
    });
    expect(registerRes.body.data.user.password).toBeUndefined();
    expect(registerRes.body.data.tokens.access).toEqual(expect.any(String));

    const loginRes = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ email: 'testuser@example.com', password: testUser.password });

    expect(loginRes.status).toBe(200);
    const { access, refresh } = loginRes.body.data.tokens;

    const profileRes = await request(ctx.app).get('/api/v1/auth/profile').set('Authorization', bearer(access));
    expect(profileRes.status).toBe(200);
    expect(profileRes.body.data).toMatchObject({ email: 'testuser@example.com', firstName: 'Test', profile: null });

    const refreshRes = await request(ctx.app).post('/api/v1/auth/token/refresh').send({ refresh });
    expect(refreshRes.status).toBe(200);
    expect(refreshRes.body.data.access).toEqual(expect.any(String));
  });

  it('rejects mismatched passwords and admin self-registration', async () => {
    const res = await request(ctx.app)
      .post('/api/v1/auth/register')
      .send({ ...testUser, password2: 'Different123!', role: 'admin' });

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
    expect(res.body.details.role).toEqual([
      'Role must be student or staff; admin accounts cannot self-register.',
    ]);
  });

  it('reports a duplicate email on the email field', async () => {
    await request(ctx.app).post('/api/v1/auth/register').send(testUser);
    const res = await request(ctx.app).post('/api/v1/auth/register').send(testUser);

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual({ email: ['A user with this email already exists.'] });
  });

  it('refuses bad credentials and disabled accounts', async () => {
    const user = await ctx.services.users.register({
      email: 'disabled@campus.test',
      password: TEST_PASSWORD,
      firstName: 'Dee',
      lastName: 'Abled',
      role: 'staff',
    });
    const { access } = ctx.services.auth.issueTokenPair(user);

    const wrong = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ email: 'disabled@campus.test', password: 'not-the-password' });
    expect(wrong.status).toBe(401);
    expect(wrong.body.message).toBe('Invalid email or password.');

    await ctx.store.users.update(user.id, { isActive: false });

    const login = await request(ctx.app)
      .post('/api/v1/auth/login')
      .send({ email: 'disabled@campus.test', password: TEST_PASSWORD });
    expect(login.status).toBe(403);
    expect(login.body.message).toBe('User account is disabled.');

    const profile = await request(ctx.app).get('/api/v1/auth/profile').set('Authorization', bearer(access));
    expect(profile.status).toBe(401);
  });

  it('requires a bearer token', async () => {
    const res = await request(ctx.app).get('/api/v1/auth/profile');
    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, message: 'No token provided', code: 'UNAUTHORIZED' });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(ctx.app).get('/api/v1/auth/nowhere');
    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Route /api/v1/auth/nowhere not found');
  });
});
