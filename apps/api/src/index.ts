import './loadEnv.js';
import { getEnv } from './env.js';
import { createApp } from './app.js';
import { createLogger } from './logger.js';
import { postcodesGeocoder } from './providers/postcodes.js';
import { ClientRegistry } from './search/clientRegistry.js';
import { createMeiliBackend, meiliConfigKey, type MeiliConfig } from './search/meiliBackend.js';
import type { SearchBackend } from './search/backend.js';

const env = getEnv();
const logger = createLogger('server');

const meiliConfig: MeiliConfig = {
  host: env.MEILI_HOST,
  apiKey: env.MEILI_API_KEY,
  indexName: env.MEILI_INDEX,
  timeoutMs: env.MEILI_TIMEOUT_MS,
  taskTimeoutMs: env.MEILI_TASK_TIMEOUT_MS,
  maxTotalHits: env.MEILI_MAX_TOTAL_HITS
};

const registry = new ClientRegistry<MeiliConfig, SearchBackend>(meiliConfigKey, createMeiliBackend);

const app = createApp({
  corsOrigin: env.CORS_ORIGIN,
  backend: () => registry.get(meiliConfig),
  geocoder: postcodesGeocoder,
  maxTotalHits: env.MEILI_MAX_TOTAL_HITS,
  adminKey: env.ADMIN_API_KEY
});

app.listen(env.PORT, () => {
  logger.info(
    { port: env.PORT, index: env.MEILI_INDEX, adminRoutes: env.ADMIN_API_KEY !== undefined },
    `API listening on http://localhost:${env.PORT}`
  );
});
