import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SessionController } from '../../backend/src/controller.js';
import { createSessionHandler } from '../../backend/src/server.js';
import { FakeActuator, FakeCamera, FakeEngine, JPEG_BYTES, deferred } from '../helpers/fakes.js';

const BASE = 'http://localhost:5000';

function setup(probability = 0.952) {
  const camera = new FakeCamera();
  const actuator = new FakeActuator();
  const controller = new SessionController({
    engine: new FakeEngine(probability),
    peripherals: [{ id: 'pi', camera, actuator }],
    actuation: { canPin: 17, plasticPin: 27, canSeconds: 1, plasticSeconds: 2 },
  });
  const handler = createSessionHandler({ controller, frame: { width: 640, height: 480 }, defaultPeripheral: 'pi' });
  return { camera, actuator, controller, handler };
}

const post = (path: string, body?: unknown) =>
  new Request(`${BASE}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    ...(body !== undefined && { body: typeof body === 'string' ? body : JSON.stringify(body) }),
  });

const get = (path: string) => new Request(`${BASE}${path}`);

describe('session service', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports its status', async () => {
    const { handler } = setup();

    const res = await handler(get('/api/status'));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'online',
      message: 'Inference service is ready',
      session_status: 'idle',
    });
  });

  it('rejects classification outside a session with InvalidState', async () => {
    const { handler } = setup();

    const res = await handler(post('/api/classify', { image: JPEG_BYTES.toString('base64') }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      status: 'error',
      message: 'Session not active. Please start first.',
      kind: 'InvalidState',
    });
  });

  it('starts a session with zeroed scores', async () => {
    const { handler } = setup();

    const res = await handler(post('/api/start'));

    expect(await res.json()).toEqual({
      status: 'success',
      message: 'Session started',
      data: { can_count: 0, plastic_count: 0, is_active: true },
    });
  });

  it('classifies an uploaded image and counts it', async () => {
    const { handler, actuator } = setup(0.952);
    await handler(post('/api/start'));

    const res = await handler(post('/api/classify', { image: `data:image/jpeg;base64,${JPEG_BYTES.toString('base64')}` }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'success',
      prediction: 'Plastic',
      confidence: 95.2,
      can_count: 0,
      plastic_count: 1,
    });
    expect(actuator.commands).toEqual([]);
  });

  it('answers malformed bodies with ProtocolError', async () => {
    const { handler } = setup();
    await handler(post('/api/start'));

    const notJson = await handler(post('/api/classify', '{"image":'));
    expect(notJson.status).toBe(400);
    expect(await notJson.json()).toEqual({
      status: 'error',
      message: 'Request body is not valid JSON',
      kind: 'ProtocolError',
    });

    const missing = await handler(post('/api/classify', {}));
    expect(missing.status).toBe(400);
    expect(await missing.json()).toEqual({
      status: 'error',
      message: 'Invalid request body: image: Required',
      kind: 'ProtocolError',
    });
  });

  it('runs a full cycle on the default peripheral', async () => {
    const { handler, actuator } = setup(0.1);
    await handler(post('/api/start'));

    const res = await handler(post('/api/cycle'));

    expect(await res.json()).toEqual({
      status: 'success',
      prediction: 'Can',
      confidence: 90,
      can_count: 1,
      plastic_count: 0,
      peripheral: 'pi',
    });
    expect(actuator.commands).toEqual([{ label: 'can', channel: 17, durationMs: 1000 }]);
  });

  it('answers 409 to a cycle on a busy peripheral', async () => {
    const { handler, actuator, controller } = setup();
    const gate = deferred();
    actuator.gate = gate.promise;
    await handler(post('/api/start'));

    const first = handler(post('/api/cycle', { peripheral: 'pi' }));
    await vi.waitFor(() => expect(controller.cycleState('pi')).toBe('ACTUATING'));

    const busy = await handler(post('/api/cycle', { peripheral: 'pi' }));
    expect(busy.status).toBe(409);
    expect(await busy.json()).toMatchObject({ status: 'error', kind: 'Busy' });

    gate.resolve();
    expect((await first).status).toBe(200);
  });

  it('maps a camera failure to 503', async () => {
    const { handler, camera } = setup();
    camera.error = new Error('Camera not available');
    await handler(post('/api/start'));

    const res = await handler(post('/api/cycle'));

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      status: 'error',
      message: 'Camera not available',
      kind: 'CaptureUnavailable',
    });
  });

  it('serves scores and final scores', async () => {
    const { handler } = setup(0.9);
    await handler(post('/api/start'));
    await handler(post('/api/cycle'));
    await handler(post('/api/cycle'));

    expect(await (await handler(get('/api/scores'))).json()).toEqual({
      can_count: 0,
      plastic_count: 2,
      is_active: true,
    });

    expect(await (await handler(post('/api/stop'))).json()).toEqual({
      status: 'success',
      message: 'Session stopped',
      final_scores: { can_count: 0, plastic_count: 2 },
    });
    expect(await (await handler(get('/api/scores'))).json()).toMatchObject({ is_active: false });
  });

  it('answers CORS preflight', async () => {
    const { handler } = setup();

    const res = await handler(new Request(`${BASE}/api/classify`, { method: 'OPTIONS' }));

    expect(res.status).toBe(204);
    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('*');
  });

  it('returns 404 for unknown routes', async () => {
    const { handler } = setup();

    const res = await handler(get('/api/nope'));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ status: 'error', message: 'No route for GET /api/nope' });
  });
});
