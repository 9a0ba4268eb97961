// API Gateway - Serves CAISO grid data over HTTP
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z, ZodError } from 'zod';
import { Caiso } from '../../scraper/src/caiso';
import { isUpstreamError, isUsageError } from '../../../shared/utils/errors';
import { TimeUtil, type DateInput } from '../../../shared/utils/time';

export interface AppOptions {
  caiso: Caiso;
  corsOrigins?: string[];
  /** Default pause after each OASIS request, overridable per call with ?sleep= */
  politenessSeconds?: number;
}

const LmpQuerySchema = z.object({
  market: z.string().min(1),
  nodes: z
    .string()
    .optional()
    .transform(value => value?.split(',').map(node => node.trim()).filter(Boolean)),
  sleep: z.coerce.number().min(0).optional()
});

const DateParamSchema = z.string().regex(/^\d{4}-?\d{2}-?\d{2}$/, 'Expected YYYYMMDD or YYYY-MM-DD');

interface Dataset {
  latest: () => Promise<unknown>;
  today: () => Promise<unknown[]>;
  yesterday: () => Promise<unknown[]>;
  history: (date: DateInput) => Promise<unknown[]>;
}

export function createApp(options: AppOptions): Hono {
  const { caiso } = options;
  const politenessSeconds = options.politenessSeconds ?? 5;

  const app = new Hono();

  app.use('*', cors({
    origin: options.corsOrigins ?? ['http://localhost:3000']
  }));

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      service: 'caiso-grid-api',
      timestamp: TimeUtil.nowUTC()
    });
  });

  app.get('/', (c) => {
    return c.json({
      name: 'CAISO Grid Data API',
      version: '1.0.0',
      endpoints: {
        status: '/api/status/latest',
        fuelMix: '/api/fuel-mix/{latest|today|yesterday|history/:date}',
        demand: '/api/demand/{latest|today|yesterday|history/:date}',
        supply: '/api/supply/{latest|today|yesterday|history/:date}',
        pnodes: '/api/pnodes',
        lmp: '/api/lmp/{latest|today|yesterday|history/:date}?market=&nodes='
      }
    });
  });

  app.get('/api/status/latest', async (c) => {
    return c.json({ data: await caiso.getLatestStatus() });
  });

  const datasets: Record<string, Dataset> = {
    'fuel-mix': {
      latest: () => caiso.getLatestFuelMix(),
      today: () => caiso.getFuelMixToday(),
      yesterday: () => caiso.getFuelMixYesterday(),
      history: (date) => caiso.getHistoricalFuelMix(date)
    },
    demand: {
      latest: () => caiso.getLatestDemand(),
      today: () => caiso.getDemandToday(),
      yesterday: () => caiso.getDemandYesterday(),
      history: (date) => caiso.getHistoricalDemand(date)
    },
    supply: {
      latest: () => caiso.getLatestSupply(),
      today: () => caiso.getSupplyToday(),
      yesterday: () => caiso.getSupplyYesterday(),
      history: (date) => caiso.getHistoricalSupply(date)
    }
  };

  for (const [name, dataset] of Object.entries(datasets)) {
    app.get(`/api/${name}/latest`, async (c) => c.json({ data: await dataset.latest() }));

    app.get(`/api/${name}/today`, async (c) => {
      const data = await dataset.today();
      return c.json({ count: data.length, data });
    });

    app.get(`/api/${name}/yesterday`, async (c) => {
      const data = await dataset.yesterday();
      return c.json({ count: data.length, data });
    });

    app.get(`/api/${name}/history/:date`, async (c) => {
      const date = DateParamSchema.parse(c.req.param('date'));
      const data = await dataset.history(date);
      return c.json({ date, count: data.length, data });
    });
  }

  app.get('/api/pnodes', async (c) => {
    const data = await caiso.getPnodes();
    return c.json({ count: data.length, data });
  });

  app.get('/api/lmp/latest', async (c) => {
    const query = LmpQuerySchema.parse(c.req.query());
    const data = await caiso.getLatestLmp(query.market, query.nodes);
    return c.json({ market: query.market, count: data.length, data });
  });

  app.get('/api/lmp/today', async (c) => {
    const query = LmpQuerySchema.parse(c.req.query());
    const data = await caiso.getLmpToday(query.market, query.nodes);
    return c.json({ market: query.market, count: data.length, data });
  });

  app.get('/api/lmp/yesterday', async (c) => {
    const query = LmpQuerySchema.parse(c.req.query());
    const data = await caiso.getLmpYesterday(query.market, query.nodes);
    return c.json({ market: query.market, count: data.length, data });
  });

  app.get('/api/lmp/history/:date', async (c) => {
    const date = DateParamSchema.parse(c.req.param('date'));
    const query = LmpQuerySchema.parse(c.req.query());
    const data = await caiso.getHistoricalLmp(date, query.market, query.nodes, query.sleep ?? politenessSeconds);
    return c.json({ date, market: query.market, count: data.length, data });
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Endpoint not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof ZodError) {
      return c.json({ error: 'Invalid request', issues: err.issues.map(issue => issue.message) }, 400);
    }
    if (isUsageError(err)) {
      return c.json({ error: err.message, type: err.name }, 400);
    }
    if (isUpstreamError(err)) {
      console.error('[API] Upstream error:', err);
      return c.json({ error: err.message, type: err.name }, 502);
    }
    console.error('[API] Error:', err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
