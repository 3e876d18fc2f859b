import express from 'express';
import { registerRoutes } from '../src/ui/routes';
import { MemoryStore, makeCandidate, openTestEngine, silenceConsole } from './fixtures';

type Captured = { statusCode: number; body: any };

// Runs a route's handler chain in-process; body parsing is skipped by marking the body as already read.
const invoke = (
  app: express.Application,
  method: 'get' | 'post',
  path: string,
  req: { query?: Record<string, string>; body?: unknown; headers?: Record<string, string> } = {}
): Captured => {
  const layer = (app as any)._router.stack.find((l: any) => l.route && l.route.path === path && l.route.methods[method]);
  expect(layer).toBeDefined();
  const captured: Captured = { statusCode: 200, body: undefined };
  const headers = req.headers ?? {};
  const fakeReq: any = {
    method: method.toUpperCase(),
    url: path,
    query: req.query ?? {},
    body: req.body,
    _body: true,
    headers,
    get: (name: string) => headers[name.toLowerCase()]
  };
  const res: any = {
    status(code: number) {
      captured.statusCode = code;
      return this;
    },
    json(payload: any) {
      captured.body = payload;
      return this;
    }
  };
  const handlers = layer.route.stack.map((l: any) => l.handle);
  let i = 0;
  const next = () => {
    const handler = handlers[i++];
    if (handler) handler(fakeReq, res, next);
  };
  next();
  return captured;
};

describe('approval API routes', () => {
  const csrf = 'test-csrf';
  const setup = () => {
    const engine = openTestEngine({ store: new MemoryStore() });
    const app = express();
    registerRoutes(app, engine, csrf);
    return app;
  };

  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports status as of a given time without binding a port', () => {
    const app = setup();
    const { statusCode, body } = invoke(app, 'get', '/status', { query: { asof: '2026-01-13T15:00:00Z' } });
    expect(statusCode).toBe(200);
    expect(body.phase).toBe('OBSERVATION');
    expect(body.tradableNow).toBe(true);
    expect(body.csrfToken).toBe(csrf);
  });

  it('rejects an unparseable as-of time', () => {
    const app = setup();
    expect(invoke(app, 'get', '/status', { query: { asof: 'yesterday-ish' } }).statusCode).toBe(400);
  });

  it('returns an approval request for the current phase', () => {
    const app = setup();
    const { body } = invoke(app, 'get', '/phase/eligibility', { query: { asof: '2026-01-23T14:00:00Z' } });
    expect(body.eligible).toBe(false);
    expect(body.summary).toBe('OBSERVATION not yet eligible (SAMPLE_SIZE, ACCURACY, R_MULTIPLE).');
  });

  it('requires the CSRF header on mutations', () => {
    const app = setup();
    const result = invoke(app, 'post', '/phase/advance', { body: { token: 'test-secret' } });
    expect(result).toEqual({ statusCode: 403, body: { error: 'CSRF_TOKEN_INVALID' } });
  });

  it('answers 401 for a bad advancement token', () => {
    const app = setup();
    const result = invoke(app, 'post', '/phase/advance', {
      headers: { 'x-csrf-token': csrf },
      body: { token: 'wrong' }
    });
    expect(result).toEqual({ statusCode: 401, body: { ok: false, error: 'UNAUTHORIZED' } });
  });

  it('answers 422 for a malformed candidate', () => {
    const app = setup();
    const result = invoke(app, 'post', '/candidates', {
      headers: { 'x-csrf-token': csrf },
      body: { ...makeCandidate(), confidence: 'high' }
    });
    expect(result.statusCode).toBe(422);
    expect(result.body.reasonCodes).toEqual(['MALFORMED_INPUT']);
    expect(result.body.explanations).toEqual(['Candidate failed basic sanity checks.']);
  });

  it('answers 400 for a downgrade to an unknown phase', () => {
    const app = setup();
    const result = invoke(app, 'post', '/phase/downgrade', {
      headers: { 'x-csrf-token': csrf },
      body: { to: 'moon', reason: 'test', token: 'test-admin' }
    });
    expect(result.statusCode).toBe(400);
    expect(result.body.error).toBe('INVALID_REQUEST');
  });

  it('answers 409 for a duplicate outcome', () => {
    const app = setup();
    const payload = {
      headers: { 'x-csrf-token': csrf },
      body: { correlationId: 'ext-1', pnlFraction: 0.01, rMultiple: 1, closedAt: '2026-01-13T15:00:00Z' }
    };
    expect(invoke(app, 'post', '/outcomes', payload).statusCode).toBe(200);
    expect(invoke(app, 'post', '/outcomes', payload).statusCode).toBe(409);
  });
});
