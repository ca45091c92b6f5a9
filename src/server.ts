/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { FileGenerationBackend } from './storage/file-generation-backend';
import { GenerationStoreRegistry } from './generations/generation-store';
import { TargetRegistry } from './adapters/target-registry';
import { NotificationChannel, TargetDefinition } from './adapters/interfaces';
import { UpdateOrchestrator } from './engine/orchestrator';
import { AuditService } from './audit/audit-service';
import { Reporter } from './reporting/reporter';
import { WebhookChannel, WebhookDeliveryFn } from './notifications/webhook';
import { LogChannel } from './notifications/log-channel';
import { errorHandler } from './api/middleware';
import { createTargetRoutes } from './api/targets';
import { AppConfig } from './config';
import { DEFAULT_POLICY } from './engine/policy';

const startTime = Date.now();
const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  targets: TargetRegistry;
  generations: GenerationStoreRegistry;
  auditService: AuditService;
  reporter: Reporter;
  orchestrator: UpdateOrchestrator;
}

export interface AppContextOptions {
  store?: Store;
  config?: Partial<AppConfig>;
  targets?: TargetDefinition[];
  /** Replaces HTTP delivery of the configured webhook. */
  webhookDelivery?: WebhookDeliveryFn;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? {};
  const appStore = options.store
    ?? createMemoryStore(config.stateDir ? new FileGenerationBackend(config.stateDir) : undefined);

  const targets = new TargetRegistry();
  for (const target of options.targets ?? []) {
    targets.register(target);
  }

  const fallbackChannel: NotificationChannel = config.webhook
    ? new WebhookChannel({
        url: config.webhook.url,
        signingSecret: config.webhook.secret,
        deliveryFn: options.webhookDelivery,
      })
    : new LogChannel();

  const generations = new GenerationStoreRegistry(appStore.generations);
  const auditService = new AuditService(appStore);
  const reporter = new Reporter((targetId) => targets.get(targetId)?.channel ?? fallbackChannel);
  const orchestrator = new UpdateOrchestrator({
    store: appStore,
    generations,
    targets,
    auditService,
    reporter,
    defaultPolicy: config.policy ?? DEFAULT_POLICY,
  });

  return {
    store: appStore,
    targets,
    generations,
    auditService,
    reporter,
    orchestrator,
  };
}

/** Problems with a context that would leave the API unable to run updates. */
export function startupWarnings(ctx: AppContext): string[] {
  if (ctx.targets.ids().length > 0) return [];
  return ['No targets are registered: update requests will answer 404 until an embedding application registers targets'];
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check with uptime and target count
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      targets: ctx.targets.ids().length,
    });
  });

  // Versioned API routes under /api/v1
  const v1 = express.Router();
  v1.use('/', createTargetRoutes(ctx));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
