import { strFromU8, strToU8, zipSync } from 'fflate';

/** Build an in-memory ZIP the way OASIS delivers it: one CSV member. */
export function makeZip(csv: string, filename = '20230101_20230102_PRC_LMP_DAM_v12.csv'): Uint8Array {
  return zipSync({ [filename]: strToU8(csv) });
}

/** Minimal fetch Response: only what the client reads. */
export function fakeResponse(body: string | Uint8Array, status = 200): Response {
  const bytes = typeof body === 'string' ? strToU8(body) : body;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    text: async () => strFromU8(bytes),
    arrayBuffer: async () => bytes.slice().buffer
  } as unknown as Response;
}

export const LMP_HEADER = 'INTERVALSTARTTIME_GMT,INTERVALENDTIME_GMT,NODE,MARKET_RUN_ID,LMP_TYPE,MW,GROUP';

export function lmpCsv(rows: Array<[string, string, string, number | '']>): string {
  const lines = rows.map(([start, node, type, value]) => {
    const end = new Date(Date.parse(start) + 60 * 60 * 1000).toISOString().replace('.000Z', '-00:00');
    return `${start},${end},${node},DAM,${type},${value},1`;
  });
  return [LMP_HEADER, ...lines].join('\n') + '\n';
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
