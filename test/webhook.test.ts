import { describe, test, expect, beforeAll, afterAll, beforeEach, afterEach, jest } from '@jest/globals';
import express from 'express';
import type { Server } from 'http';
import { SessionCapture } from '../src/capture/SessionCapture.js';
import { AlertPayload, WebhookNotifier, sendWebhookAlert } from '../src/utils/webhook.js';

describe('webhook alerts', () => {
  let server: Server;
  let url: string;
  let received: AlertPayload[];
  let respondWith: number;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post('/hook', (req, res) => {
      received.push(req.body);
      res.sendStatus(respondWith);
    });

    await new Promise<void>((resolve) => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('receiver is not listening');
    }
    url = `http://127.0.0.1:${address.port}/hook`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  });

  beforeEach(() => {
    received = [];
    respondWith = 204;
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('sendWebhookAlert posts the payload as JSON', async () => {
    const payload: AlertPayload = {
      type: 'FILE_DOWNLOAD',
      sessionId: 'sess-1',
      ip: '203.0.113.7',
      timestamp: '2025-11-09T10:30:00.000Z',
      data: { size: 3 },
    };

    await expect(sendWebhookAlert(url, payload)).resolves.toBe(true);
    expect(received).toEqual([payload]);
  });

  test('sendWebhookAlert reports rejected deliveries without throwing', async () => {
    respondWith = 500;

    await expect(
      sendWebhookAlert(url, { type: 'SESSION_CLOSED', sessionId: 's', ip: '203.0.113.7', timestamp: 'now' }),
    ).resolves.toBe(false);
    expect(console.error).toHaveBeenCalledWith('Webhook failed: 500 Internal Server Error');
  });

  test('sendWebhookAlert survives an unreachable receiver', async () => {
    await expect(
      sendWebhookAlert('http://127.0.0.1:1/hook', {
        type: 'SESSION_CLOSED',
        sessionId: 's',
        ip: '203.0.113.7',
        timestamp: 'now',
      }),
    ).resolves.toBe(false);
  });

  test('WebhookNotifier sends download and session alerts', async () => {
    const notifier = new WebhookNotifier(url);
    const capture = new SessionCapture({ sourceIp: '203.0.113.7', sourcePort: 40000, sessionId: 'sess-2' });
    capture.recordAuth('root', 'test-secret', true);
    capture.recordCommand('id', 'uid=0(root) gid=0(root) groups=0(root)\n');
    const log = capture.finalize();

    await notifier.downloadCaptured(
      { sessionId: 'sess-2', ip: '203.0.113.7' },
      { url: 'http://files.example.test/x', digest: 'a'.repeat(64), size: 9, path: '/data/x' },
    );
    await notifier.sessionClosed(log);

    expect(received).toEqual([
      {
        type: 'FILE_DOWNLOAD',
        sessionId: 'sess-2',
        ip: '203.0.113.7',
        timestamp: expect.any(String),
        data: { url: 'http://files.example.test/x', sha256: 'a'.repeat(64), size: 9 },
      },
      {
        type: 'SESSION_CLOSED',
        sessionId: 'sess-2',
        ip: '203.0.113.7',
        timestamp: log.endedAt,
        data: { username: 'root', commands: 1, downloads: 0 },
      },
    ]);
  });

  test('WebhookNotifier without a URL sends nothing', async () => {
    const notifier = new WebhookNotifier();
    const log = new SessionCapture({ sourceIp: '203.0.113.7', sourcePort: 1 }).finalize();

    await notifier.sessionClosed(log);

    expect(notifier.enabled).toBe(false);
    expect(received).toEqual([]);
  });
});
