/**
 * Runtime configuration from environment variables.
 *
 * Usage:
 *   const { config, errors } = loadConfig(process.env);
 *   if (errors.length > 0) throw new Error(errors.join('; '));
 */

import { LogLevel, parseLogLevel } from './logger';
import { UpdatePolicy } from './domain/session';
import { DEFAULT_POLICY, resolvePolicy, validatePolicy } from './engine/policy';

export interface WebhookConfig {
  url: string;
  /** HMAC signing secret; unsigned delivery when absent. */
  secret?: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  /** Default policy; targets and callers override it per session. */
  policy: UpdatePolicy;
  /** Directory for file-backed generation stores; in-memory when absent. */
  stateDir?: string;
  /** Report delivery; reports go to the log when absent. */
  webhook?: WebhookConfig;
}

export interface ConfigLoadResult {
  config: AppConfig;
  errors: string[];
  warnings: string[];
}

const DEFAULT_PORT = 5000;

/** Load and validate configuration. Invalid values fall back to defaults and are reported. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConfigLoadResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const port = parseInteger(env.PORT, 'PORT', errors) ?? DEFAULT_PORT;
  if (port < 0 || port > 65535) {
    errors.push(`PORT must be between 0 and 65535, got ${port}`);
  }

  let logLevel = LogLevel.Info;
  if (env.GENSWITCH_LOG_LEVEL !== undefined) {
    const parsed = parseLogLevel(env.GENSWITCH_LOG_LEVEL);
    if (parsed) logLevel = parsed;
    else errors.push(`GENSWITCH_LOG_LEVEL must be one of debug, info, warn, error, got "${env.GENSWITCH_LOG_LEVEL}"`);
  }

  const policy = resolvePolicy(DEFAULT_POLICY, {
    maxRemediationAttempts: parseInteger(env.GENSWITCH_MAX_REMEDIATION_ATTEMPTS, 'GENSWITCH_MAX_REMEDIATION_ATTEMPTS', errors),
    autoProceedOnCritical: parseBoolean(env.GENSWITCH_AUTO_PROCEED_ON_CRITICAL, 'GENSWITCH_AUTO_PROCEED_ON_CRITICAL', errors),
    timeoutMs: parseInteger(env.GENSWITCH_UPDATE_TIMEOUT_MS, 'GENSWITCH_UPDATE_TIMEOUT_MS', errors),
    rebuildOnNoMatch: parseBoolean(env.GENSWITCH_REBUILD_ON_NO_MATCH, 'GENSWITCH_REBUILD_ON_NO_MATCH', errors),
  });
  errors.push(...validatePolicy(policy));

  if (policy.autoProceedOnCritical) {
    warnings.push('GENSWITCH_AUTO_PROCEED_ON_CRITICAL is set: critical issues with an abort recommendation will not stop updates');
  }

  const stateDir = nonEmpty(env.GENSWITCH_STATE_DIR);
  if (!stateDir) {
    warnings.push('GENSWITCH_STATE_DIR is not set: generations are kept in memory and lost on restart');
  }

  let webhook: WebhookConfig | undefined;
  const webhookUrl = nonEmpty(env.GENSWITCH_WEBHOOK_URL);
  if (webhookUrl) {
    webhook = { url: webhookUrl, secret: nonEmpty(env.GENSWITCH_WEBHOOK_SECRET) };
    if (!webhook.secret) {
      warnings.push('GENSWITCH_WEBHOOK_SECRET is not set: report webhooks are unsigned');
    }
  }

  return {
    config: { port, logLevel, policy, stateDir, webhook },
    errors,
    warnings,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseInteger(value: string | undefined, name: string, errors: string[]): number | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) return undefined;
  if (!/^-?\d+$/.test(raw)) {
    errors.push(`${name} must be an integer, got "${raw}"`);
    return undefined;
  }
  return parseInt(raw, 10);
}

function parseBoolean(value: string | undefined, name: string, errors: string[]): boolean | undefined {
  const raw = nonEmpty(value)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  errors.push(`${name} must be true or false, got "${value}"`);
  return undefined;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/** Validate the environment without keeping the parsed configuration. */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): ConfigValidationResult {
  const { errors, warnings } = loadConfig(env);
  return { valid: errors.length === 0, errors, warnings };
}
