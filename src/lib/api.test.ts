import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, explainDataPoint, fetchGuidance, trackReport } from './api';

const respond = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

describe('api client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a data point for explanation', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(respond({ status: 'ok', text: 'Unhealthy for sensitive groups.' }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(explainDataPoint('Air Quality Index', '157', 'Poor')).resolves.toEqual({
      status: 'ok',
      text: 'Unhealthy for sensitive groups.',
    });
    expect(fetchMock).toHaveBeenCalledWith('/api/insights/explain', {
      method: 'POST',
      body: JSON.stringify({ dataType: 'Air Quality Index', value: '157', context: 'Poor' }),
      headers: { 'Content-Type': 'application/json' },
    });
  });

  it('asks for module guidance by stakeholder', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(respond({ focus: 'Focus', actions: [] }));
    vi.stubGlobal('fetch', fetchMock);

    await fetchGuidance('reports', 'city-planning');
    expect(fetchMock.mock.calls[0]?.[0]).toBe('/api/guidance/reports?stakeholder=city-planning');
  });

  it('carries the status and message of failed requests', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>().mockResolvedValue(respond({ error: 'Report CR-2026-9999 not found' }, 404)));

    const error = await trackReport('CR-2026-9999').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 404, message: 'Report CR-2026-9999 not found' });
  });
});
