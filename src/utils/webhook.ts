import type { SessionLog } from '../capture/types.js';
import type { CapturedDownload } from '../shell/types.js';

export type AlertType = 'FILE_DOWNLOAD' | 'SESSION_CLOSED';

export interface AlertPayload {
  type: AlertType;
  sessionId: string;
  ip: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Posts one alert. Failures are logged and never thrown.
 */
export async function sendWebhookAlert(url: string, payload: AlertPayload): Promise<boolean> {
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    if (!res.ok) {
      console.error(`Webhook failed: ${res.status} ${res.statusText}`);
      return false;
    }
    console.log(`Webhook alert ${payload.type} sent for ${payload.ip}`);
    return true;
  } catch (err: unknown) {
    console.error('Webhook fetch failed:', err instanceof Error ? err.message : String(err));
    return false;
  }
}

export interface AlertSink {
  downloadCaptured(session: { sessionId: string; ip: string }, download: CapturedDownload): Promise<void>;
  sessionClosed(log: Readonly<SessionLog>): Promise<void>;
}

/**
 * Alerts for captured files and closed sessions. Without a URL every call
 * is a no-op.
 */
export class WebhookNotifier implements AlertSink {
  constructor(private readonly url?: string) {}

  get enabled(): boolean {
    return Boolean(this.url);
  }

  async downloadCaptured(session: { sessionId: string; ip: string }, download: CapturedDownload): Promise<void> {
    if (!this.url) {
      return;
    }
    await sendWebhookAlert(this.url, {
      type: 'FILE_DOWNLOAD',
      sessionId: session.sessionId,
      ip: session.ip,
      timestamp: new Date().toISOString(),
      data: { url: download.url, sha256: download.digest, size: download.size },
    });
  }

  async sessionClosed(log: Readonly<SessionLog>): Promise<void> {
    if (!this.url) {
      return;
    }
    await sendWebhookAlert(this.url, {
      type: 'SESSION_CLOSED',
      sessionId: log.sessionId,
      ip: log.sourceIp,
      timestamp: log.endedAt ?? new Date().toISOString(),
      data: {
        username: log.username,
        commands: log.commands.length,
        downloads: log.downloads.length,
      },
    });
  }
}
