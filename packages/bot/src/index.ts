import {
  loadConfig,
  loadSourceCredentials,
  createLogger,
  errorMessage,
  ConfigError,
  EventStore,
  CommunityStore,
  SourceAdapter,
  IcsFeedProvider,
  CalDavProvider,
  Reconciler,
  Notifier,
  ReminderScheduler,
  AlertService,
  Mutex,
  type AlertEvent,
  type EventProvider,
  type HeraldConfig,
} from "@herald/core";
import { createDiscordPlugin } from "@herald/channel-discord";
import { ChannelManager } from "./channels/manager.js";
import { MockChannelPlugin } from "./channels/mock-plugin.js";
import { handleCommand } from "./commands.js";
import { createServer } from "./server.js";

const log = createLogger("Herald");

function createProvider(config: HeraldConfig): EventProvider {
  const credentials = loadSourceCredentials(config.agentDir);

  if (config.source.provider === "caldav") {
    if (!config.source.calendar) {
      throw new ConfigError("source.calendar is required for the caldav provider");
    }
    if (!credentials) {
      throw new ConfigError(
        "CalDAV source needs credentials: set HERALD_SOURCE_USERNAME/HERALD_SOURCE_PASSWORD or source/credentials.json",
      );
    }
    return new CalDavProvider({
      serverUrl: config.source.url,
      calendarId: config.source.calendar,
      credentials,
      timezone: config.reminders.timezone,
    });
  }

  return new IcsFeedProvider({ url: config.source.url, credentials, timezone: config.reminders.timezone });
}

async function main() {
  const config = loadConfig();
  const { reminders } = config;
  log.info(`[Herald] Using ${config.agentDir}`);

  // Fails here, before anything connects, when the database is unusable
  const store = new EventStore(config.databasePath);
  log.info(`[Herald] Event store at ${config.databasePath} (${store.count()} events)`);
  const community = new CommunityStore(config.databasePath);

  // ── Channels ────────────────────────────────────────────────────
  const channelManager = new ChannelManager();
  channelManager.registerPlugin("discord", (cfg) => createDiscordPlugin(cfg));
  channelManager.registerPlugin("mock", () => new MockChannelPlugin());
  await channelManager.initAll(config.channels);

  channelManager.onCommunity((channelId, event) => {
    try {
      community.apply(event);
    } catch (err) {
      log.error({ err }, `[Herald] Could not record ${event.type} from ${channelId}`);
    }
  });

  channelManager.onMessage((channelId, msg) => {
    if (msg.guildId) {
      try {
        community.recordMessage(msg.guildId, msg.from, msg.senderName ?? msg.from, msg.timestamp);
      } catch (err) {
        log.error({ err }, `[Herald] Could not count message ${msg.id}`);
      }
    }

    const reply = handleCommand(msg, {
      store,
      community,
      timezone: reminders.timezone,
      locale: reminders.locale,
    });
    if (!reply) return;

    channelManager
      .send(channelId, msg.conversationId, { content: reply, replyTo: msg.id })
      .catch((err) => log.warn(`[Herald] Could not answer command in ${msg.conversationId}: ${errorMessage(err)}`));
  });

  // ── Reminder engine ─────────────────────────────────────────────
  const mutex = new Mutex();
  const adapter = new SourceAdapter(createProvider(config), {
    minIntervalMs: config.source.minIntervalMs,
    lookAheadDays: config.source.lookAheadDays,
    lookBehindDays: config.source.lookBehindDays,
  });

  const reconciler = new Reconciler({
    store,
    source: adapter,
    mutex,
    missingStreakThreshold: reminders.missingStreakThreshold,
    renotifyOnReschedule: reminders.renotifyOnReschedule,
  });

  const notifier = new Notifier({
    store,
    mutex,
    deliver: (to, message) => channelManager.send(reminders.destination.channel, to, message),
    destination: reminders.destination.to,
    leadWindowMs: reminders.leadWindowMinutes * 60_000,
    timezone: reminders.timezone,
    locale: reminders.locale,
  });

  const alertService = new AlertService();
  const alertDestination = reminders.alerts;
  if (alertDestination) {
    const post = (content: string) =>
      channelManager
        .send(alertDestination.channel, alertDestination.to, { content })
        .catch((err) => log.error({ err }, "[Herald] Could not post alert"));

    alertService.on("alert:raised", (event: AlertEvent) => {
      void post(`⚠️ ${event.alert.message}`);
    });
    alertService.on("alert:resolved", (event: AlertEvent) => {
      void post(`✅ Resolved: ${event.alert.message}`);
    });
  }

  const scheduler = new ReminderScheduler({
    reconciler,
    notifier,
    reconcileIntervalMs: reminders.reconcileIntervalMinutes * 60_000,
    scanIntervalMs: reminders.scanIntervalSeconds * 1000,
    backoff: reminders.backoff,
    onAlert: (alert) => {
      if (alert.state === "raised") {
        alertService.raise({ kind: alert.kind, message: alert.message });
      } else {
        alertService.resolve(alert.kind);
      }
    },
  });

  // ── Status API ──────────────────────────────────────────────────
  const server = await createServer({
    store,
    community,
    scheduler,
    alertService,
    channelManager,
    missingStreakThreshold: reminders.missingStreakThreshold,
  });

  await server.listen({ port: config.server.port, host: config.server.host });
  log.info(`[Herald] Status API on http://localhost:${config.server.port}`);

  await scheduler.start();

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`[Herald] ${signal} received, shutting down gracefully...`);

    try {
      // Waits for an in-flight pass to commit or roll back
      await scheduler.stop();
      await channelManager.disconnectAll();
      await server.close();
      store.close();
      community.close();
      log.info("[Herald] Stopped.");
      process.exit(0);
    } catch (err) {
      log.error({ err }, "[Herald] Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

process.on("unhandledRejection", (reason) => {
  log.error({ err: reason }, "[Herald] Unhandled promise rejection");
});

main().catch((err) => {
  log.fatal({ err }, "[Herald] Fatal error");
  process.exit(1);
});
