import request from 'supertest';
import { TEST_PASSWORD, TestContext, createTestContext, registerUser } from './helpers/testContext';

describe('Auth API Endpoints', () => {
  let ctx: TestContext;

  const payload = {
    username: 'dana',
    email: 'dana@example.com',
    password: TEST_PASSWORD,
    firstName: 'Dana',
    lastName: 'Tester'
  };

  beforeEach(() => {
    ctx = createTestContext();
  });

  describe('POST /api/auth/register', () => {
    it('creates the user and returns a token', async () => {
      const res = await request(ctx.app).post('/api/auth/register').send(payload);

      expect(res.statusCode).toBe(201);
      expect(typeof res.body.token).toBe('string');
      expect(res.body.user).toMatchObject({
        username: 'dana',
        email: 'dana@example.com',
        firstName: 'Dana',
        lastName: 'Tester',
        isActive: true
      });
      expect(Object.keys(res.body.user).sort()).toEqual([
        'createdAt',
        'email',
        'firstName',
        'id',
        'isActive',
        'lastName',
        'username'
      ]);
    });

    it('rejects a taken username or email', async () => {
      await request(ctx.app).post('/api/auth/register').send(payload).expect(201);

      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ ...payload, username: 'dana_two' });

      expect(res.statusCode).toBe(409);
      expect(res.body).toEqual({ success: false, message: 'User already exists with that email or username' });
    });

    it('validates the username', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/register')
        .send({ ...payload, username: 'da' });

      expect(res.statusCode).toBe(400);
      expect(res.body.errors).toEqual([
        { field: 'username', message: 'Username must be between 3 and 30 characters' }
      ]);
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await registerUser(ctx.services, 'dana');
    });

    it('returns a token for valid credentials', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/login')
        .send({ email: 'dana@example.com', password: TEST_PASSWORD });

      expect(res.statusCode).toBe(200);
      expect(res.body.user.username).toBe('dana');

      const me = await request(ctx.app).get('/api/auth/me').set('Authorization', `Bearer ${res.body.token}`);
      expect(me.statusCode).toBe(200);
      expect(me.body.user.email).toBe('dana@example.com');
    });

    it('rejects a wrong password', async () => {
      const res = await request(ctx.app)
        .post('/api/auth/login')
        .send({ email: 'dana@example.com', password: 'wrong-password' });

      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({ success: false, message: 'Invalid credentials' });
    });
  });

  describe('GET /api/auth/me', () => {
    it('rejects a forged token', async () => {
      const res = await request(ctx.app).get('/api/auth/me').set('Authorization', 'Bearer not.a.token');

      expect(res.statusCode).toBe(401);
      expect(res.body).toEqual({ success: false, message: 'Token is not valid' });
    });
  });
});

describe('User API Endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('reports deletion stats and deletes the account', async () => {
    const erin = await registerUser(ctx.services, 'erin');
    const frank = await registerUser(ctx.services, 'frank');
    await ctx.services.messages.send(erin.user.id, { receiverId: frank.user.id, content: 'Bye' });
    const auth = { Authorization: `Bearer ${erin.token}` };

    const stats = await request(ctx.app).get('/api/users/me/deletion-stats').set(auth);
    expect(stats.body.stats).toEqual({
      username: 'erin',
      email: 'erin@example.com',
      sentMessages: 1,
      receivedMessages: 0,
      totalMessages: 1,
      notifications: 0,
      messageHistories: 0,
      totalDataPoints: 1
    });

    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const res = await request(ctx.app).delete('/api/users/me').set(auth).send({ confirm: true, password: TEST_PASSWORD });
    expect(res.statusCode).toBe(200);
    expect(res.body.message).toBe('Account deleted successfully');
    expect(res.body.deletedData).toEqual(stats.body.stats);

    expect(await ctx.services.notifications.list(frank.user.id)).toEqual([]);
    const me = await request(ctx.app).get('/api/auth/me').set(auth);
    expect(me.statusCode).toBe(401);
    expect(me.body.message).toBe('User not found');
  });

  it('requires the confirm flag', async () => {
    const erin = await registerUser(ctx.services, 'erin');
    const auth = { Authorization: `Bearer ${erin.token}` };

    const missing = await request(ctx.app).delete('/api/users/me').set(auth).send({});
    expect(missing.statusCode).toBe(400);
    expect(missing.body.errors).toEqual([{ field: 'confirm', message: 'confirm must be a boolean' }]);

    const declined = await request(ctx.app).delete('/api/users/me').set(auth).send({ confirm: false });
    expect(declined.statusCode).toBe(400);
    expect(declined.body).toEqual({
      success: false,
      message: 'You must confirm the deletion to proceed.',
      errors: [{ field: 'confirm', message: 'You must confirm the deletion to proceed.' }]
    });
  });

  it('rejects a wrong password', async () => {
    const erin = await registerUser(ctx.services, 'erin');

    const res = await request(ctx.app)
      .delete('/api/users/me')
      .set({ Authorization: `Bearer ${erin.token}` })
      .send({ confirm: true, password: 'wrong-password' });

    expect(res.statusCode).toBe(400);
    expect(res.body.message).toBe('Invalid password confirmation.');
    expect(await ctx.store.users.findById(erin.user.id)).not.toBeNull();
  });
});
