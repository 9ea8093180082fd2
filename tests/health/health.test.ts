import { beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import { createHealthApp, metrics } from '../../src/health';

describe('health server', () => {
  beforeEach(() => {
    metrics.computationsCompleted = 0;
    metrics.computationsFailed = 0;
    metrics.duplicateTriggers = 0;
  });

  it('reports healthy while Slack is connected', async () => {
    const app = createHealthApp({ isSlackConnected: () => true, getInflightCount: () => 0 });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.checks).toEqual({ slack: 'connected' });
  });

  it('reports degraded with 503 when Slack is down', async () => {
    const app = createHealthApp({ isSlackConnected: () => false, getInflightCount: () => 0 });

    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('degraded');
    expect(response.body.checks).toEqual({ slack: 'disconnected' });
  });

  it('exposes computation counters and in-flight work', async () => {
    metrics.computationsCompleted = 3;
    metrics.computationsFailed = 1;
    const app = createHealthApp({ isSlackConnected: () => true, getInflightCount: () => 2 });

    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      computationsCompleted: 3,
      computationsFailed: 1,
      duplicateTriggers: 0,
      inflight: 2,
    });
  });
});
