import type { FastifyInstance } from "fastify";
import type { Alert } from "@herald/core";

function toResponse(alert: Alert) {
  return {
    id: alert.id,
    kind: alert.kind,
    message: alert.message,
    severity: alert.severity,
    status: alert.status,
    raisedAt: alert.raisedAt.toISOString(),
    acknowledgedAt: alert.acknowledgedAt?.toISOString(),
    resolvedAt: alert.resolvedAt?.toISOString(),
  };
}

export async function registerAlertRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/alerts?all=true - open alerts, or every kept alert
  fastify.get<{ Querystring: { all?: boolean } }>(
    "/api/alerts",
    {
      schema: {
        querystring: {
          type: "object",
          properties: { all: { type: "boolean" } },
        },
      },
    },
    async (request) => {
      const alerts = fastify.alertService.list(request.query.all ?? false);
      return { alerts: alerts.map(toResponse) };
    },
  );

  // POST /api/alerts/:id/acknowledge
  fastify.post<{ Params: { id: string } }>("/api/alerts/:id/acknowledge", async (request, reply) => {
    const acknowledged = fastify.alertService.acknowledge(request.params.id);
    if (!acknowledged) {
      return reply.code(404).send({ ok: false, error: "Alert not found or not active" });
    }
    return { ok: true };
  });
}
