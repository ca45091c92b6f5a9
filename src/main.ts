/**
 * Reference entry point: load configuration and serve the API.
 *
 * Targets carry code (sources, builders, registries), so they cannot come
 * from environment configuration. This process starts with none and only
 * serves health, listings and history. Deployments that run updates embed
 * genswitch instead:
 *
 *   const context = createAppContext({ config, targets: [webTarget] });
 *   createApp(context).listen(config.port);
 */

import { loadConfig } from './config';
import { createApp, createAppContext, startupWarnings } from './server';
import { logger, setLogLevel } from './logger';

const { config, errors, warnings } = loadConfig(process.env);
if (errors.length > 0) {
  logger.error('Invalid configuration', { errors });
  process.exit(1);
}
setLogLevel(config.logLevel);
for (const warning of warnings) {
  logger.warn(warning);
}

const context = createAppContext({ config });
for (const warning of startupWarnings(context)) {
  logger.warn(warning);
}
const app = createApp(context);

app.listen(config.port, () => {
  logger.info('genswitch listening', { port: config.port, stateDir: config.stateDir ?? null });
});
