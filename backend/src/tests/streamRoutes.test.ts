import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../app';
import { InMemorySettingsStore } from '../services/SettingsStore';
import type { StreamStatus } from '../services/StreamStatusService';

function buildApp() {
  const store = new InMemorySettingsStore([
    { username: 'bob', key: 'live-key', description: 'Live now' },
    { username: 'dave', key: 'test-secret', password: 'test-password' }
  ]);
  const status: StreamStatus = {
    isLive: async (key) => key === 'live-key'
  };
  return createApp({
    store,
    status,
    transform: (text) => text.toUpperCase(),
    corsOrigin: '*',
    viewerCount: () => 3,
    sessionCount: () => 2
  });
}

describe('health route', () => {
  it('reports the session count', async () => {
    const res = await request(buildApp()).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.sessions).toBe(2);
  });
});

describe('stream routes', () => {
  it('lists streamers without exposing keys or passwords', async () => {
    const res = await request(buildApp()).get('/api/streams');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'success',
      data: [
        { username: 'bob', live: true, count: 3, description: 'LIVE NOW', locked: false },
        { username: 'dave', live: false, count: 3, description: '', locked: true }
      ]
    });
  });

  it('returns info for an open stream', async () => {
    const res = await request(buildApp()).get('/api/streams/Bob/info');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ live: true, count: 3, description: 'LIVE NOW' });
  });

  it('requires the password header for a locked stream', async () => {
    const app = buildApp();

    const locked = await request(app).get('/api/streams/dave/info');
    expect(locked.status).toBe(403);
    expect(locked.body).toEqual({ status: 'error', message: 'This stream is password protected' });

    const wrong = await request(app).get('/api/streams/dave/info').set('x-stream-password', 'wrong-password');
    expect(wrong.status).toBe(403);

    const unlocked = await request(app).get('/api/streams/dave/info').set('x-stream-password', 'test-password');
    expect(unlocked.status).toBe(200);
    expect(unlocked.body).toEqual({ live: false, count: 0, description: '' });
  });

  it('returns 404 for unknown streamers', async () => {
    const res = await request(buildApp()).get('/api/streams/zed/info');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ status: 'error', message: 'Streamer not found' });
  });

  it('checks a stream password', async () => {
    const app = buildApp();

    const wrong = await request(app).post('/api/streams/dave/password').send({ password: 'nope' });
    expect(wrong.status).toBe(403);
    expect(wrong.body).toEqual({ status: 'error', message: 'Invalid password' });

    const right = await request(app).post('/api/streams/dave/password').send({ password: 'test-password' });
    expect(right.status).toBe(200);
    expect(right.body).toEqual({ status: 'success' });

    const open = await request(app).post('/api/streams/bob/password').send({});
    expect(open.body).toEqual({ status: 'success' });
  });
});

describe('publish routes', () => {
  it('accepts a registered stream key from the query or a form body', async () => {
    const app = buildApp();

    const byQuery = await request(app).get('/auth/on_publish').query({ name: 'live-key' });
    expect(byQuery.status).toBe(200);
    expect(byQuery.text).toBe('Stream ok!');

    const byForm = await request(app).post('/auth/on_publish').type('form').send({ name: 'test-secret' });
    expect(byForm.status).toBe(200);
  });

  it('rejects missing and unknown keys', async () => {
    const app = buildApp();

    const missing = await request(app).post('/auth/on_publish');
    expect(missing.status).toBe(404);
    expect(missing.text).toBe('No stream key');

    const unknown = await request(app).get('/auth/on_publish').query({ name: 'other-key' });
    expect(unknown.status).toBe(404);
    expect(unknown.text).toBe('Unknown stream key');
  });

  it('acknowledges the end of a publish', async () => {
    const res = await request(buildApp()).post('/auth/on_publish_done');

    expect(res.status).toBe(200);
    expect(res.text).toBe('Stream ok!');
  });
});
