// Node entry point for the API gateway
import { serve } from '@hono/node-server';
import { Caiso } from '../../scraper/src/caiso';
import { createApp } from './index';
import { loadConfig } from './config';

const config = loadConfig();

const app = createApp({
  caiso: new Caiso({
    outlookBase: config.outlookBase,
    historyBase: config.historyBase,
    oasisUrl: config.oasisUrl
  }),
  corsOrigins: config.corsOrigins,
  politenessSeconds: config.politenessSeconds
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[API] Listening on http://localhost:${info.port}`);
});
