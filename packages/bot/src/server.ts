import Fastify, { type FastifyInstance } from "fastify";
import { loggerOptions } from "@herald/core";
import type { AlertService, CommunityStore, EventStore, ReminderScheduler } from "@herald/core";
import type { ChannelManager } from "./channels/manager.js";
import { registerReminderRoutes } from "./routes/reminders.js";
import { registerAlertRoutes } from "./routes/alerts.js";
import { registerCommunityRoutes } from "./routes/community.js";

export interface ServerOptions {
  store: EventStore;
  community: CommunityStore;
  scheduler: ReminderScheduler;
  alertService: AlertService;
  channelManager: ChannelManager;
  missingStreakThreshold: number;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    store: EventStore;
    community: CommunityStore;
    scheduler: ReminderScheduler;
    alertService: AlertService;
    channelManager: ChannelManager;
    missingStreakThreshold: number;
  }
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: loggerOptions() });

  fastify.decorate("store", options.store);
  fastify.decorate("community", options.community);
  fastify.decorate("scheduler", options.scheduler);
  fastify.decorate("alertService", options.alertService);
  fastify.decorate("channelManager", options.channelManager);
  fastify.decorate("missingStreakThreshold", options.missingStreakThreshold);

  // GET /health - liveness plus a summary of what needs attention
  fastify.get("/health", async () => {
    const scheduler = fastify.scheduler.getStatus();
    const channels = fastify.channelManager.getChannelInfos().map((info) => ({
      id: info.id,
      status: info.status,
    }));
    const openAlerts = fastify.alertService.list().length;
    const healthy =
      scheduler.running && openAlerts === 0 && channels.every((c) => c.status === "connected");

    return {
      status: healthy ? "ok" : "degraded",
      scheduler: scheduler.running ? "running" : "stopped",
      channels,
      openAlerts,
    };
  });

  // Reminder routes
  await registerReminderRoutes(fastify);

  // Alert routes
  await registerAlertRoutes(fastify);

  // Community routes
  await registerCommunityRoutes(fastify);

  return fastify;
}
