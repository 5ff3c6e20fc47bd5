import { serve } from '@hono/node-server';
import { bootstrap } from './bootstrap';
import { config } from './config';
import { Logger } from './utils/logger';

const app = await bootstrap(config);
const port = config.server.port;

serve({ fetch: app.fetch, port }, (info) => {
  Logger.info(`🚀 Server running on http://localhost:${info.port} (${config.server.environment})`);
});
