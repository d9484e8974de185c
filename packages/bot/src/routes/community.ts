/**
 * Community API Routes
 */

import type { FastifyInstance } from "fastify";

interface LeaderboardParams {
  guildId: string;
}

interface LeaderboardQuery {
  limit?: number;
}

export async function registerCommunityRoutes(fastify: FastifyInstance): Promise<void> {
  // GET /api/community/guilds/:guildId/leaderboard?limit= - members by message count
  fastify.get<{ Params: LeaderboardParams; Querystring: LeaderboardQuery }>(
    "/api/community/guilds/:guildId/leaderboard",
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
      const { guildId } = request.params;
      const limit = request.query.limit ?? 10;
      return {
        guildId,
        members: fastify.community.memberCount(guildId),
        leaderboard: fastify.community.leaderboard(guildId, limit),
      };
    },
  );
}
