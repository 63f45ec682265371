import type { AppBootstrapper, AppRuntime } from '../../../bootstrap/AppBootstrapper.js';
import { createTestApp, VIDEO } from '../testApp.js';

describe('VideoRoutes', () => {
  let app: AppBootstrapper;
  let runtime: AppRuntime;

  beforeEach(() => {
    ({ app, runtime } = createTestApp());
  });

  afterEach(async () => {
    await runtime.httpServer.stop();
    await app.stop();
  });

  it('ingests a video once and skips it afterwards', async () => {
    const server = runtime.httpServer.instance;

    const first = await server.inject({ method: 'POST', url: '/api/videos/ingest', payload: { video: `https://youtu.be/${VIDEO}` } });
    expect(first.statusCode).toBe(201);
    expect(first.json()).toEqual({
      success: true,
      result: { sourceId: VIDEO, embeddingModel: 'hash-256', language: 'en', status: 'ingested', passages: 3, collection: 'passages' }
    });

    const second = await server.inject({ method: 'POST', url: '/api/videos/ingest', payload: { video: VIDEO } });
    expect(second.statusCode).toBe(200);
    expect(second.json()).toMatchObject({ success: true, result: { status: 'skipped', passages: 3 } });
  });

  it('rejects a reference that names no video', async () => {
    const res = await runtime.httpServer.instance.inject({ method: 'POST', url: '/api/videos/ingest', payload: { video: 'not a video' } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: { message: "Could not extract a video id from 'not a video'", code: 'INVALID_VIDEO_REF', recoverable: true }
    });
  });

  it('reports a missing transcript as not found', async () => {
    const res = await runtime.httpServer.instance.inject({ method: 'POST', url: '/api/videos/ingest', payload: { video: 'zzzzzzzzzzz' } });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({
      error: { message: 'No transcript available for zzzzzzzzzzz (tried: en)', code: 'TRANSCRIPT_UNAVAILABLE' }
    });
  });

  it('validates the request body', async () => {
    const res = await runtime.httpServer.instance.inject({ method: 'POST', url: '/api/videos/ingest', payload: { force: true } });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toMatchObject({ message: 'Invalid request', code: 'BAD_REQUEST' });
    expect(body.error.meta[0].path).toEqual(['video']);
  });

  it('rejects language codes that are not plain tags', async () => {
    const server = runtime.httpServer.instance;
    const res = await server.inject({
      method: 'POST',
      url: '/api/videos/ingest',
      payload: { video: VIDEO, languages: ['/../../secrets/creds'] }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.meta[0]).toMatchObject({ path: ['languages', 0], message: 'Expected a language code such as en or pt-BR' });

    const status = await server.inject({ method: 'GET', url: `/api/videos/${VIDEO}/status` });
    expect(status.json().status).toMatchObject({ ingested: false, passages: 0 });
  });

  it('ingests supplied transcript text and re-ingests on force', async () => {
    const server = runtime.httpServer.instance;
    const url = '/api/videos/talk-1/transcript';

    const first = await server.inject({ method: 'POST', url, payload: { text: 'Some words here.', language: 'fr' } });
    expect(first.statusCode).toBe(201);
    expect(first.json().result).toMatchObject({ sourceId: 'talk-1', language: 'fr', passages: 1 });

    const forced = await server.inject({ method: 'POST', url, payload: { text: 'Other words.', force: true } });
    expect(forced.statusCode).toBe(201);
    expect(await runtime.vectorStore.count('passages', { source_id: 'talk-1' })).toBe(1);
  });

  it('reports ingestion status per embedding model', async () => {
    const server = runtime.httpServer.instance;
    await server.inject({ method: 'POST', url: '/api/videos/ingest', payload: { video: VIDEO } });

    const status = await server.inject({ method: 'GET', url: `/api/videos/${VIDEO}/status` });
    expect(status.json()).toEqual({
      success: true,
      status: { sourceId: VIDEO, embeddingModel: 'hash-256', ingested: true, passages: 3 }
    });

    const unknown = await server.inject({ method: 'GET', url: `/api/videos/${VIDEO}/status?embeddingModel=other` });
    expect(unknown.statusCode).toBe(503);
    expect(unknown.json().error.code).toBe('EMBEDDING_UNAVAILABLE');
  });
});
