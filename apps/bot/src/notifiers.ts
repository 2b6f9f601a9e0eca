import { errorMessage, type Alert, type AlertSeverity, type Logger, type NotificationSink } from "@tradeguard/core";

const SEVERITY_COLORS: Record<AlertSeverity, number> = {
  critical: 0xff0000,
  warning: 0xffc107,
  info: 0x2ecc71,
};

interface DiscordEmbed {
  title: string;
  color: number;
  fields: Array<{ name: string; value: string; inline: boolean }>;
  timestamp: string;
}

interface DiscordWebhookPayload {
  username: string;
  embeds: DiscordEmbed[];
}

/** Writes every alert to the process log. */
export class LogNotifier implements NotificationSink {
  private readonly logger: Logger;

  public constructor(logger: Logger) {
    this.logger = logger;
  }

  public notify(alert: Alert): void {
    const code = `ALERT_${alert.kind.toUpperCase()}`;
    const message = alert.title.toUpperCase();
    const data = { ...alert.fields, severity: alert.severity };
    if (alert.severity === "critical") {
      this.logger.error(code, message, data);
    } else if (alert.severity === "warning") {
      this.logger.warn(code, message, data);
    } else {
      this.logger.info(code, message, data);
    }
  }
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  logger: Logger;
  username?: string;
  /** Minimum spacing between webhook posts. */
  minIntervalMs?: number;
  /** Per-post request timeout. */
  timeoutMs?: number;
  /** Alerts waiting to be posted before new ones are dropped. */
  maxQueued?: number;
}

export function formatDiscordPayload(alert: Alert, username: string): DiscordWebhookPayload {
  const fields = Object.entries(alert.fields)
    .filter(([, value]) => value !== null)
    .slice(0, 25)
    .map(([name, value]) => ({ name, value: String(value), inline: true }));
  return {
    username,
    embeds: [
      {
        title: alert.title,
        color: SEVERITY_COLORS[alert.severity],
        fields,
        timestamp: alert.ts,
      },
    ],
  };
}

/** Posts alerts as Discord embeds, one at a time and spaced out to stay under the webhook rate limit. */
export class DiscordWebhookNotifier implements NotificationSink {
  private readonly options: DiscordNotifierOptions;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly maxQueued: number;
  private queue: Promise<void> = Promise.resolve();
  private pending = 0;
  private lastSendTime = 0;

  public constructor(options: DiscordNotifierOptions) {
    this.options = options;
    this.minIntervalMs = options.minIntervalMs ?? 500;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxQueued = options.maxQueued ?? 100;
  }

  public notify(alert: Alert): void {
    if (this.pending >= this.maxQueued) {
      this.options.logger.warn("DISCORD_QUEUE_FULL", "DISCORD QUEUE FULL, ALERT DROPPED", {
        kind: alert.kind,
        pending: this.pending,
      });
      return;
    }
    this.pending += 1;
    this.queue = this.queue.then(() =>
      this.send(alert)
        .catch((error: unknown) => {
          this.options.logger.warn("DISCORD_SEND_FAIL", "DISCORD WEBHOOK POST FAILED", {
            kind: alert.kind,
            error: errorMessage(error),
          });
        })
        .finally(() => {
          this.pending -= 1;
        }),
    );
  }

  /** Resolves once every queued alert has been attempted. */
  public flush(): Promise<void> {
    return this.queue;
  }

  private async send(alert: Alert): Promise<void> {
    const waitMs = this.lastSendTime + this.minIntervalMs - Date.now();
    if (waitMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, waitMs));
    }
    const response = await fetch(this.options.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(formatDiscordPayload(alert, this.options.username ?? "tradeguard")),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    this.lastSendTime = Date.now();
    if (!response.ok) {
      throw new Error(`Discord webhook returned ${response.status}`);
    }
  }
}

export class FanoutNotifier implements NotificationSink {
  private readonly sinks: NotificationSink[];

  public constructor(sinks: NotificationSink[]) {
    this.sinks = sinks;
  }

  public notify(alert: Alert): void {
    for (const sink of this.sinks) {
      sink.notify(alert);
    }
  }
}
