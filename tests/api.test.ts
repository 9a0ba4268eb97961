import { createApp } from '../workers/api/src/index';
import { Caiso } from '../workers/scraper/src/caiso';
import { fakeResponse, lmpCsv, makeZip, silenceConsole } from './helpers';

const OUTLOOK = 'https://outlook.test/SP';
const OASIS = 'http://oasis.test/oasisapi/SingleZip';

function setup(respond: (url: string) => Response, politenessSeconds = 0) {
  const fetch = jest.fn(async (url: string) => respond(url));
  const sleep = jest.fn(async () => undefined);
  const caiso = new Caiso({
    fetch,
    sleep,
    outlookBase: OUTLOOK,
    historyBase: `${OUTLOOK}/History`,
    oasisUrl: OASIS,
    now: () => Date.parse('2023-01-02T20:00:00Z')
  });
  const app = createApp({ caiso, corsOrigins: ['http://localhost:3000'], politenessSeconds });
  return { app, fetch, sleep };
}

const lmpArchive = () => fakeResponse(makeZip(lmpCsv([
  ['2023-01-01T08:00:00-00:00', 'NODE_A', 'LMP', 25],
  ['2023-01-01T08:00:00-00:00', 'NODE_A', 'MCE', 20]
])));

describe('API gateway', () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('GET /health', async () => {
    const { app } = setup(() => fakeResponse('unused'));
    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'healthy', service: 'caiso-grid-api' });
  });

  test('GET /api/lmp/history/:date returns normalized rows', async () => {
    const { app, fetch } = setup(lmpArchive);
    const res = await app.request('/api/lmp/history/2023-01-01?market=DAY_AHEAD_HOURLY&nodes=NODE_A');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      date: '2023-01-01',
      market: 'DAY_AHEAD_HOURLY',
      count: 1,
      data: [{
        Time: '2023-01-01T00:00:00-08:00',
        Market: 'DAY_AHEAD_HOURLY',
        Node: 'NODE_A',
        LMP: 25,
        Energy: 20,
        Congestion: null,
        Loss: null
      }]
    });
    expect(fetch.mock.calls[0][0]).toContain('&node=NODE_A');
  });

  test('the politeness delay defaults to the configured value and can be overridden', async () => {
    const { app, sleep } = setup(lmpArchive, 2);

    await app.request('/api/lmp/history/20230101?market=DAY_AHEAD_HOURLY&nodes=NODE_A');
    await app.request('/api/lmp/history/20230101?market=DAY_AHEAD_HOURLY&nodes=NODE_A&sleep=0');

    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  test('an unsupported market is a 400', async () => {
    const { app, fetch } = setup(lmpArchive);
    const res = await app.request('/api/lmp/history/2023-01-01?market=WEEKLY');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'LMP market is not supported: WEEKLY',
      type: 'UnsupportedMarketError'
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  test('a missing market is a 400', async () => {
    const { app } = setup(lmpArchive);
    const res = await app.request('/api/lmp/today');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Invalid request' });
  });

  test('a malformed date is a 400', async () => {
    const { app, fetch } = setup(lmpArchive);
    const res = await app.request('/api/demand/history/jan-1');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request',
      issues: ['Expected YYYYMMDD or YYYY-MM-DD']
    });
    expect(fetch).not.toHaveBeenCalled();
  });

  test('an impossible date is a 400', async () => {
    const { app } = setup(lmpArchive);
    const res = await app.request('/api/fuel-mix/history/20231332');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid calendar date: 2023-13-32',
      type: 'InvalidTimeError'
    });
  });

  test('an upstream HTTP failure is a 502', async () => {
    const { app } = setup(() => fakeResponse('down', 503));
    const res = await app.request('/api/status/latest');

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: `HTTP 503 from ${OUTLOOK}/stats.txt after 1 attempt`,
      type: 'HttpStatusError'
    });
  });

  test('GET /api/demand/today wraps rows with a count', async () => {
    const { app, fetch } = setup(() => fakeResponse('Time,Current demand\n00:00,21000\n'));
    const res = await app.request('/api/demand/today');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      count: 1,
      data: [{ Time: '2023-01-02T00:00:00-08:00', Demand: 21000 }]
    });
    expect(fetch.mock.calls[0][0]).toBe(`${OUTLOOK}/History/20230102/demand.csv`);
  });

  test('unknown routes are a JSON 404', async () => {
    const { app } = setup(lmpArchive);
    const res = await app.request('/api/weather');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Endpoint not found' });
  });

  test('allows configured CORS origins', async () => {
    const { app } = setup(lmpArchive);
    const res = await app.request('/health', { headers: { Origin: 'http://localhost:3000' } });

    expect(res.headers.get('Access-Control-Allow-Origin')).toBe('http://localhost:3000');
  });
});
