import type { Server as HttpServer } from 'http';
import { ContentStore } from './capture/ContentStore.js';
import { FileSessionStore, NullSessionStore, SessionLogSink } from './capture/SessionStore.js';
import type { HoneypotConfig } from './config/types.js';
import { AdmissionControl } from './security/AdmissionControl.js';
import { createAdminApp } from './server.js';
import { HttpFetcher } from './shell/HttpFetcher.js';
import { ShellEngine } from './shell/ShellEngine.js';
import { loadOrCreateHostKey } from './ssh/hostKey.js';
import { SshHoneypot } from './ssh/SshHoneypot.js';
import { errorHandler } from './utils/ErrorHandler.js';
import { getMetricsCollector } from './utils/logger/metricsCollector.js';
import { WebhookNotifier } from './utils/webhook.js';

export interface RunningHoneypot {
  ssh: SshHoneypot;
  admin?: HttpServer;
  stop(): Promise<void>;
}

function listenAdmin(config: HoneypotConfig, ssh: SshHoneypot): Promise<HttpServer> {
  const app = createAdminApp({
    metrics: getMetricsCollector(),
    errors: errorHandler,
    listSessions: () => ssh.activeSessions(),
  });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.admin.port, config.admin.listenAddress, () => {
      server.off('error', reject);
      console.info(`Admin API listening on ${config.admin.listenAddress}:${config.admin.port}`);
      resolve(server);
    });
    server.once('error', reject);
  });
}

/**
 * Wires the shared services and starts both listeners
 */
export async function startHoneypot(config: HoneypotConfig): Promise<RunningHoneypot> {
  const contentStore = new ContentStore(config.storage.filesDir);
  if (config.capture.captureDownloads) {
    await contentStore.init();
  }

  const shell = new ShellEngine({
    hostname: config.shell.hostname,
    historyEnabled: config.shell.historyEnabled,
    maxHistory: config.shell.maxHistory,
    banner: config.shell.banner,
    fetcher: config.capture.captureDownloads
      ? new HttpFetcher({
          maxBytes: config.capture.maxFileSizeBytes,
          timeoutMs: config.capture.fetchTimeoutMs,
        })
      : undefined,
    contentStore: config.capture.captureDownloads ? contentStore : undefined,
  });

  const sink: SessionLogSink = config.storage.enabled
    ? new FileSessionStore(config.storage.sessionsDir)
    : new NullSessionStore();
  if (!config.storage.enabled) {
    console.warn('Session storage is disabled, logs will not be persisted');
  }

  const alerts = new WebhookNotifier(config.alerts.webhookUrl);
  if (alerts.enabled) {
    console.info('Webhook alerts enabled');
  }

  const ssh = new SshHoneypot({
    config,
    hostKey: loadOrCreateHostKey(config.server.hostKeyPath),
    admission: AdmissionControl.fromConfig(config),
    shell,
    sink,
    alerts,
    metrics: getMetricsCollector(),
    errors: errorHandler,
  });
  await ssh.listen();

  const admin = config.admin.enabled ? await listenAdmin(config, ssh) : undefined;

  return {
    ssh,
    admin,
    async stop() {
      await ssh.close();
      if (admin) {
        await new Promise<void>((resolve) => {
          admin.close(() => resolve());
        });
      }
      console.info('Honeypot stopped');
    },
  };
}
