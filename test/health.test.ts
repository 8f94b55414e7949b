import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import request from 'supertest';
import { createAdminApp } from '../src/server.js';
import type { SessionSummary } from '../src/session/types.js';
import { ErrorHandler, HoneypotErrorType } from '../src/utils/ErrorHandler.js';
import { MetricsCollector } from '../src/utils/logger/metricsCollector.js';

const session: SessionSummary = {
  sessionId: 'sess-1',
  sourceIp: '203.0.113.7',
  sourcePort: 50022,
  phase: 'shell_active',
  startedAt: '2025-11-09T10:30:00.000Z',
  username: 'root',
  authAttempts: 1,
  commands: 4,
  downloads: 1,
};

describe('Admin API', () => {
  let metrics: MetricsCollector;
  let errors: ErrorHandler;

  beforeEach(() => {
    metrics = new MetricsCollector();
    errors = new ErrorHandler();
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  const app = (sessions: SessionSummary[] = []) =>
    createAdminApp({ metrics, errors, listSessions: () => sessions });

  it('should return 200 OK and status ok', async () => {
    const res = await request(app()).get('/api/health');
    expect(res.statusCode).toEqual(200);
    expect(res.body).toEqual({ status: 'ok', timestamp: expect.any(String) });
  });

  it('should list active sessions', async () => {
    const res = await request(app([session])).get('/api/sessions');
    expect(res.statusCode).toEqual(200);
    expect(res.body).toEqual({ count: 1, sessions: [session] });
  });

  it('should report metrics and recovered errors', async () => {
    metrics.recordConnection('203.0.113.7');
    metrics.recordCommand('uname -a');
    errors.handle(HoneypotErrorType.ALERT_ERROR, new Error('webhook down'));

    const res = await request(app()).get('/metrics');
    expect(res.statusCode).toEqual(200);
    expect(res.body.connections.admitted).toEqual(1);
    expect(res.body.commands.topCommands).toEqual([{ command: 'uname', count: 1 }]);
    expect(res.body.errors.errorCounts).toEqual({ ALERT_ERROR: 1 });
  });

  it('should set security headers', async () => {
    const res = await request(app()).get('/api/health');
    expect(res.headers['x-content-type-options']).toEqual('nosniff');
  });

  it('should return 404 for unknown routes', async () => {
    const res = await request(app()).get('/admin');
    expect(res.statusCode).toEqual(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });
});
