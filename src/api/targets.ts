/**
 * Target API routes.
 *
 *   GET  /targets                                 Registered target ids
 *   POST /targets/:targetId/updates               Run an update session
 *   GET  /targets/:targetId/sessions              Archived sessions, newest first
 *   GET  /targets/:targetId/sessions/:sessionId   One session
 *   GET  /targets/:targetId/generations           Active generation and history
 *   GET  /targets/:targetId/audit                 Audit trail
 */

import { Router, Request, Response, NextFunction } from 'express';
import { TypedError, notFoundError, targetNotFoundError, validationError } from '../domain/errors';
import { Store, toListResult, ListOptions } from '../storage/store';
import { TargetRegistry } from '../adapters/target-registry';
import { GenerationStoreRegistry } from '../generations/generation-store';
import { AuditService } from '../audit/audit-service';
import { UpdateOrchestrator } from '../engine/orchestrator';
import { parsePolicyOverrides } from '../engine/policy';

/** Route-level error carrying a typed error for the error handler. */
class RouteError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'RouteError';
  }
}

export interface TargetRouteDeps {
  store: Store;
  targets: TargetRegistry;
  generations: GenerationStoreRegistry;
  orchestrator: UpdateOrchestrator;
  auditService: AuditService;
}

const MAX_PAGE_SIZE = 100;

export function createTargetRoutes(deps: TargetRouteDeps): Router {
  const router = Router();

  /** Resolve the target or fail with TARGET.NOT_FOUND. */
  const requireTarget = (req: Request, _res: Response, next: NextFunction) => {
    if (!deps.targets.has(req.params.targetId)) {
      next(new RouteError(targetNotFoundError(req.params.targetId)));
      return;
    }
    next();
  };

  router.get('/targets', (_req, res) => {
    res.json({ targets: deps.targets.ids() });
  });

  /**
   * POST /targets/:targetId/updates
   * Runs a session to completion and returns it.
   */
  router.post('/targets/:targetId/updates', requireTarget, async (req, res, next) => {
    try {
      const body: unknown = req.body;
      const rawPolicy = typeof body === 'object' && body !== null && 'policy' in body ? body.policy : undefined;
      const { policy, errors } = parsePolicyOverrides(rawPolicy);
      if (errors.length > 0) {
        throw new RouteError(validationError(`Invalid update policy: ${errors.join('; ')}`, { problems: errors }));
      }

      const actorHeader = req.header('x-actor-id');
      const session = await deps.orchestrator.runUpdate(req.params.targetId, policy, {
        actorId: actorHeader ? `user:${actorHeader}` : undefined,
      });
      res.status(200).json({ session });
    } catch (err) {
      next(err);
    }
  });

  router.get('/targets/:targetId/sessions', requireTarget, async (req, res, next) => {
    try {
      const options = parseListOptions(req.query.limit, req.query.offset);
      const { targetId } = req.params;
      const [items, total] = await Promise.all([
        deps.store.sessions.listByTarget(targetId, options),
        deps.store.sessions.countByTarget(targetId),
      ]);
      res.json(toListResult(items, total, options));
    } catch (err) {
      next(err);
    }
  });

  router.get('/targets/:targetId/sessions/:sessionId', requireTarget, async (req, res, next) => {
    try {
      const session = await deps.store.sessions.getById(req.params.targetId, req.params.sessionId);
      if (!session) {
        throw new RouteError(notFoundError('Session', req.params.sessionId));
      }
      res.json({ session });
    } catch (err) {
      next(err);
    }
  });

  router.get('/targets/:targetId/generations', requireTarget, async (req, res, next) => {
    try {
      const store = await deps.generations.forTarget(req.params.targetId);
      res.json({ current: store.current(), generations: store.list() });
    } catch (err) {
      next(err);
    }
  });

  router.get('/targets/:targetId/audit', requireTarget, async (req, res, next) => {
    try {
      const options = parseListOptions(req.query.limit, req.query.offset);
      const records = await deps.auditService.query({ targetId: req.params.targetId, ...options });
      res.json({ records });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

function parseListOptions(limit: unknown, offset: unknown): ListOptions {
  const options: ListOptions = {};
  if (limit !== undefined) {
    const value = parseNonNegative(limit, 'limit');
    options.limit = Math.min(value, MAX_PAGE_SIZE);
  }
  if (offset !== undefined) {
    options.offset = parseNonNegative(offset, 'offset');
  }
  return options;
}

function parseNonNegative(value: unknown, name: string): number {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new RouteError(validationError(`${name} must be a non-negative integer`, { [name]: value }));
  }
  return parseInt(value, 10);
}
