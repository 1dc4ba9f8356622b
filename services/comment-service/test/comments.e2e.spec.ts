import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import Redis from 'ioredis';
import request from 'supertest';
import { configureApp } from '../src/app.setup';
import { REDIS_CLIENT } from '../src/cache/cache.service';
import { CommentModule } from '../src/comment/comment.module';
import { AppConfig } from '../src/config/app.config';
import { hashEmail } from '../src/utils/email-hash.util';
import { InMemoryCommentStore } from './in-memory-comment.store';
import { buildTestConfig } from './test-config';
import { TestInfrastructureModule } from './test-infrastructure.module';

describe('Comments API (e2e)', () => {
  let app: INestApplication;
  let store: InMemoryCommentStore;
  let config: AppConfig;

  const comment = {
    page: '/blog/hello-world',
    email: 'test@example.com',
    username: 'reader',
    content: 'Great article, thanks for sharing.',
  };

  beforeEach(async () => {
    store = new InMemoryCommentStore();
    config = buildTestConfig();

    const moduleRef = await Test.createTestingModule({
      imports: [TestInfrastructureModule.register({ store, config }), CommentModule],
    }).compile();

    app = configureApp(moduleRef.createNestApplication({ logger: false }));
    await app.init();
    await moduleRef.get<Redis>(REDIS_CLIENT).flushall();
  });

  afterEach(async () => {
    await app.close();
  });

  it('creates a comment, a reply, and lists them', async () => {
    const first = await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);

    expect(first.body).toMatchObject({
      id: 1,
      page: '/blog/hello-world',
      username: 'reader',
      emailHash: hashEmail('test@example.com'),
      content: 'Great article, thanks for sharing.',
      parentId: null,
      location: 'local',
    });
    expect(first.body).not.toHaveProperty('email');
    expect(first.body).not.toHaveProperty('ipAddress');

    const reply = await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, username: 'writer', content: 'Glad you enjoyed it!', parentId: first.body.id })
      .expect(201);

    const list = await request(app.getHttpServer())
      .get('/api/comments')
      .query({ page: '/blog/hello-world' })
      .expect(200);

    expect(list.body.hasNext).toBe(false);
    expect(list.body.nextCursor).toBeNull();
    expect(list.body.comments).toHaveLength(1);
    expect(list.body.comments[0]).toMatchObject({ id: first.body.id, replyCount: 1 });

    const replies = await request(app.getHttpServer()).get(`/api/comments/${first.body.id}/replies`).expect(200);

    expect(replies.body.comments).toHaveLength(1);
    expect(replies.body.comments[0]).toMatchObject({ id: reply.body.id, parentId: first.body.id, replyCount: 0 });
  });

  it('pages through top-level comments with the cursor', async () => {
    for (let i = 0; i < 3; i++) {
      await store.insert({
        page: '/p',
        email: 'test@example.com',
        emailHash: hashEmail('test@example.com'),
        username: 'reader',
        content: `Comment number ${i + 1} here`,
        parentId: null,
        ipAddress: null,
        userAgent: null,
        systemType: null,
        location: null,
      });
    }

    const first = await request(app.getHttpServer()).get('/api/comments').query({ page: '/p', limit: 2 }).expect(200);
    const second = await request(app.getHttpServer())
      .get('/api/comments')
      .query({ page: '/p', limit: 2, cursor: first.body.nextCursor })
      .expect(200);

    expect(first.body.comments.map((c: { id: number }) => c.id)).toEqual([3, 2]);
    expect(first.body.hasNext).toBe(true);
    expect(second.body.comments.map((c: { id: number }) => c.id)).toEqual([1]);
    expect(second.body.hasNext).toBe(false);
  });

  it('rejects invalid input with 400', async () => {
    const short = await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, content: 'too short' })
      .expect(400);
    expect(short.body.message).toEqual(['content must be longer than or equal to 10 characters']);

    await request(app.getHttpServer()).post('/api/comments').send({ ...comment, email: 'nope' }).expect(400);
    await request(app.getHttpServer()).post('/api/comments').send({ ...comment, isAdmin: true }).expect(400);
    await request(app.getHttpServer()).get('/api/comments').expect(400);
    await request(app.getHttpServer()).get('/api/comments').query({ page: '/p', sort: 'username' }).expect(400);
    await request(app.getHttpServer()).get('/api/comments/abc').expect(400);
  });

  it('returns 404 for unknown comments and parents', async () => {
    const missing = await request(app.getHttpServer()).get('/api/comments/999').expect(404);
    expect(missing.body).toMatchObject({ statusCode: 404, message: 'Comment not found' });
    expect(missing.body.requestId).toBe(missing.headers['x-request-id']);

    const orphan = await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, parentId: 999 })
      .expect(404);
    expect(orphan.body.message).toBe('Parent comment not found');
  });

  it('rejects spam with 400', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, content: 'Click here to visit my casino' })
      .expect(400);

    expect(response.body.message).toBe('Comment contains disallowed content');
    expect(store.size).toBe(0);
  });

  it('updates and soft-deletes a comment', async () => {
    const created = await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);

    const updated = await request(app.getHttpServer())
      .put(`/api/comments/${created.body.id}`)
      .send({ content: 'Updated text that is long enough' })
      .expect(200);
    expect(updated.body.content).toBe('Updated text that is long enough');

    const deleted = await request(app.getHttpServer()).delete(`/api/comments/${created.body.id}`).expect(200);
    expect(deleted.body).toEqual({ success: true, message: 'Comment deleted successfully' });

    await request(app.getHttpServer()).get(`/api/comments/${created.body.id}`).expect(404);
    expect(store.raw(created.body.id)?.isDeleted).toBe(true);
  });

  it('reports page statistics', async () => {
    const parent = await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);
    await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, parentId: parent.body.id })
      .expect(201);

    const stats = await request(app.getHttpServer())
      .get(`/api/stats/${encodeURIComponent('/blog/hello-world')}`)
      .expect(200);

    expect(stats.body).toEqual({ totalComments: 2, topLevelComments: 1, replies: 1 });
  });

  it('sets rate limit and request id headers on writes', async () => {
    const response = await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);

    expect(response.headers['x-ratelimit-limit']).toBe('5');
    expect(response.headers['x-ratelimit-remaining']).toBe('4');
    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('refuses the fourth comment from one email with 429', async () => {
    for (let i = 0; i < 3; i++) {
      await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);
    }

    const blocked = await request(app.getHttpServer()).post('/api/comments').send(comment).expect(429);

    expect(blocked.headers['retry-after']).toBe('300');
    expect(blocked.body).toMatchObject({ statusCode: 429, retryAfter: 300 });
    expect(store.size).toBe(3);
  });

  it('refuses requests over the per-IP comment limit', async () => {
    config.rateLimit.rules.comment.limit = 1;

    await request(app.getHttpServer()).post('/api/comments').send(comment).expect(201);
    const blocked = await request(app.getHttpServer())
      .post('/api/comments')
      .send({ ...comment, email: 'someone-else@example.com' })
      .expect(429);

    expect(blocked.headers['x-ratelimit-remaining']).toBe('0');
    expect(blocked.body.message).toBe('Too many requests, please try again later');
  });

  it('does not limit reads', async () => {
    config.rateLimit.rules.ip.limit = 1;

    for (let i = 0; i < 3; i++) {
      await request(app.getHttpServer()).get('/api/comments').query({ page: '/p' }).expect(200);
    }
  });

  it('reports health', async () => {
    const response = await request(app.getHttpServer()).get('/api/health').expect(200);

    expect(response.body).toMatchObject({ status: 'healthy', database: true, cache: true, version: '1.0.0-test' });
  });

  it('hides unexpected errors behind a generic 500', async () => {
    jest.spyOn(store, 'ping').mockRejectedValueOnce(new Error('socket hang up'));

    const response = await request(app.getHttpServer()).get('/api/health').expect(500);

    expect(response.body).toEqual({
      statusCode: 500,
      message: 'Internal server error',
      requestId: response.headers['x-request-id'],
    });
  });
});
