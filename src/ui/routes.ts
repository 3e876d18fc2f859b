import express from 'express';
import { Engine } from '../core/engine';
import { OPERATING_PHASES, OperatingPhase } from '../core/types';
import { buildApprovalRequest, describeReasons } from './approval';

const isPhase = (value: unknown): value is OperatingPhase => OPERATING_PHASES.some((p) => p === value);

const bodyString = (body: unknown, key: string): string | undefined => {
  if (typeof body !== 'object' || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
};

const parseAsOf = (value: unknown): Date | undefined => {
  if (typeof value !== 'string' || !value) return new Date();
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

export const registerRoutes = (app: express.Application, engine: Engine, csrfToken: string) => {
  const requireCsrf: express.RequestHandler = (req, res, next) => {
    if (req.get('x-csrf-token') !== csrfToken) {
      res.status(403).json({ error: 'CSRF_TOKEN_INVALID' });
      return;
    }
    next();
  };

  app.get('/status', (req, res) => {
    const now = parseAsOf(req.query.asof);
    if (!now) {
      res.status(400).json({ error: 'INVALID_ASOF' });
      return;
    }
    res.json({ ...engine.status(now), csrfToken });
  });

  app.get('/phase/eligibility', (req, res) => {
    const now = parseAsOf(req.query.asof);
    if (!now) {
      res.status(400).json({ error: 'INVALID_ASOF' });
      return;
    }
    res.json(buildApprovalRequest(engine.phases.evaluateAdvancement(now)));
  });

  app.post('/candidates', express.json(), requireCsrf, (req, res) => {
    const decision = engine.gate.evaluate(req.body, new Date());
    const explanations = describeReasons(decision.reasonCodes);
    const code = decision.status === 'REJECTED' && decision.category === 'MALFORMED' ? 422 : 200;
    res.status(code).json({ ...decision, explanations });
  });

  app.post('/outcomes', express.json(), requireCsrf, (req, res) => {
    const result = engine.gate.reportOutcome(req.body, new Date());
    if (result.ok) {
      res.json(result);
      return;
    }
    res.status(result.error === 'DUPLICATE_OUTCOME' ? 409 : 422).json(result);
  });

  app.post('/phase/advance', express.json(), requireCsrf, (req, res) => {
    const result = engine.phases.advance(bodyString(req.body, 'token'), new Date());
    if (result.ok) {
      res.json(result);
      return;
    }
    res.status(result.error === 'UNAUTHORIZED' ? 401 : 409).json(result);
  });

  app.post('/phase/downgrade', express.json(), requireCsrf, (req, res) => {
    const target = bodyString(req.body, 'to')?.toUpperCase();
    const reason = bodyString(req.body, 'reason');
    if (!isPhase(target) || !reason) {
      res.status(400).json({ error: 'INVALID_REQUEST', expected: { to: OPERATING_PHASES, reason: 'string' } });
      return;
    }
    const result = engine.phases.forceDowngrade(target, bodyString(req.body, 'token'), reason, new Date());
    if (result.ok) {
      res.json(result);
      return;
    }
    res.status(result.error === 'UNAUTHORIZED' ? 401 : 409).json(result);
  });

  const errorHandler: express.ErrorRequestHandler = (err, _req, res, _next) => {
    console.error('Request failed', err);
    res.status(500).json({ error: err instanceof Error ? err.name : 'INTERNAL_ERROR' });
  };
  app.use(errorHandler);
};
