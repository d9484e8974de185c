/**
 * Reminder API Routes
 *
 * Read-only views of the event store and scheduler, plus a manual
 * reconciliation trigger.
 */

import type { FastifyInstance } from "fastify";
import type { StoredEvent } from "@herald/core";

interface UpcomingQuery {
  limit?: number;
}

/**
 * Convert a stored event to API response format
 */
function toResponse(event: StoredEvent) {
  return {
    externalId: event.externalId,
    title: event.title,
    description: event.description,
    location: event.location,
    startsAt: event.startsAt.toISOString(),
    endsAt: event.endsAt.toISOString(),
    allDay: event.allDay,
    notified: event.notified,
    notifiedAt: event.notifiedAt?.toISOString() ?? null,
    revision: event.revision,
    missingStreak: event.missingStreak,
    deliveryAttempts: event.deliveryAttempts,
    lastDeliveryError: event.lastDeliveryError,
  };
}

export async function registerReminderRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/reminders/status - scheduler state and store size
  fastify.get("/api/reminders/status", async () => {
    return {
      ...fastify.scheduler.getStatus(),
      storedEvents: fastify.store.count(),
    };
  });

  // GET /api/reminders/upcoming?limit= - events that have not ended yet
  fastify.get<{ Querystring: UpcomingQuery }>(
    "/api/reminders/upcoming",
    {
      schema: {
        querystring: {
          type: "object",
          properties: {
            limit: { type: "integer", minimum: 1, maximum: 100 },
          },
        },
      },
    },
    async (request) => {
      const limit = request.query.limit ?? 10;
      const events = fastify.store.listUpcoming(new Date(), limit);
      return { events: events.map(toResponse) };
    },
  );

  // GET /api/reminders/missing - events absent from the source long enough to be flagged
  fastify.get("/api/reminders/missing", async () => {
    const threshold = fastify.missingStreakThreshold;
    return {
      threshold,
      events: fastify.store.listFlaggedMissing(threshold).map(toResponse),
    };
  });

  // POST /api/reminders/reconcile - run a reconciliation pass now
  fastify.post("/api/reminders/reconcile", async (_request, reply) => {
    const result = await fastify.scheduler.runReconciliation();
    if (result) {
      return {
        ok: true,
        result: {
          ...result,
          startedAt: result.startedAt.toISOString(),
          finishedAt: result.finishedAt.toISOString(),
        },
      };
    }

    const task = fastify.scheduler.getStatus().tasks.reconcile;
    if (task.state === "running") {
      return reply.code(409).send({ ok: false, error: "Reconciliation already running" });
    }
    return reply.code(502).send({ ok: false, error: task.lastError ?? "Reconciliation failed" });
  });
}
