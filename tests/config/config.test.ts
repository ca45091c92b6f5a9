import { loadConfig, validateConfig } from '../../src/config';
import { LogLevel } from '../../src/logger';
import { DEFAULT_POLICY } from '../../src/engine/policy';

describe('loadConfig', () => {
  test('falls back to defaults', () => {
    const { config, errors, warnings } = loadConfig({});

    expect(errors).toEqual([]);
    expect(config).toEqual({
      port: 5000,
      logLevel: LogLevel.Info,
      policy: DEFAULT_POLICY,
      stateDir: undefined,
      webhook: undefined,
    });
    expect(warnings).toEqual(['GENSWITCH_STATE_DIR is not set: generations are kept in memory and lost on restart']);
  });

  test('reads every setting', () => {
    const { config, errors, warnings } = loadConfig({
      PORT: '8080',
      GENSWITCH_LOG_LEVEL: 'DEBUG',
      GENSWITCH_MAX_REMEDIATION_ATTEMPTS: '5',
      GENSWITCH_AUTO_PROCEED_ON_CRITICAL: 'yes',
      GENSWITCH_UPDATE_TIMEOUT_MS: '60000',
      GENSWITCH_REBUILD_ON_NO_MATCH: 'true',
      GENSWITCH_STATE_DIR: ' /var/lib/genswitch ',
      GENSWITCH_WEBHOOK_URL: 'https://hooks.example.com/report',
      GENSWITCH_WEBHOOK_SECRET: 'test-secret',
    });

    expect(errors).toEqual([]);
    expect(config).toEqual({
      port: 8080,
      logLevel: LogLevel.Debug,
      policy: { maxRemediationAttempts: 5, autoProceedOnCritical: true, timeoutMs: 60000, rebuildOnNoMatch: true },
      stateDir: '/var/lib/genswitch',
      webhook: { url: 'https://hooks.example.com/report', secret: 'test-secret' },
    });
    expect(warnings).toEqual([
      'GENSWITCH_AUTO_PROCEED_ON_CRITICAL is set: critical issues with an abort recommendation will not stop updates',
    ]);
  });

  test('reports every malformed value', () => {
    const { config, errors } = loadConfig({
      PORT: 'abc',
      GENSWITCH_LOG_LEVEL: 'loud',
      GENSWITCH_MAX_REMEDIATION_ATTEMPTS: '11',
      GENSWITCH_AUTO_PROCEED_ON_CRITICAL: 'maybe',
    });

    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe(LogLevel.Info);
    expect(errors).toEqual([
      'PORT must be an integer, got "abc"',
      'GENSWITCH_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
      'GENSWITCH_AUTO_PROCEED_ON_CRITICAL must be true or false, got "maybe"',
      'maxRemediationAttempts must be an integer between 0 and 10, got 11',
    ]);
  });

  test('rejects ports out of range', () => {
    expect(loadConfig({ PORT: '70000' }).errors).toEqual(['PORT must be between 0 and 65535, got 70000']);
  });

  test('rejects update timeouts beyond the timer limit', () => {
    expect(loadConfig({ GENSWITCH_STATE_DIR: '/tmp/state', GENSWITCH_UPDATE_TIMEOUT_MS: '2147483648' }).errors).toEqual([
      'timeoutMs must be at most 2147483647, got 2147483648',
    ]);
  });

  test('warns about unsigned webhooks', () => {
    const { config, warnings } = loadConfig({
      GENSWITCH_STATE_DIR: '/tmp/state',
      GENSWITCH_WEBHOOK_URL: 'https://hooks.example.com/report',
    });
    expect(config.webhook).toEqual({ url: 'https://hooks.example.com/report', secret: undefined });
    expect(warnings).toEqual(['GENSWITCH_WEBHOOK_SECRET is not set: report webhooks are unsigned']);
  });
});

describe('validateConfig', () => {
  test('is valid when nothing is malformed', () => {
    expect(validateConfig({ GENSWITCH_STATE_DIR: '/tmp/state' })).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test('is invalid with errors', () => {
    const result = validateConfig({ GENSWITCH_UPDATE_TIMEOUT_MS: '0' });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['timeoutMs must be a positive number, got 0']);
  });
});
