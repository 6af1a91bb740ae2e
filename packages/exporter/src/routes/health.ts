import type { FastifyPluginAsync } from "fastify";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const cycle = app.collector.lastCycle;
    const failedTargets = cycle?.failed ?? [];

    const payload = {
      status: failedTargets.length === 0 ? "ok" : "degraded",
      targets: app.collector.targetCount,
      lastCycleAt: cycle?.finishedAt ?? null,
      failedTargets,
    };

    return reply.status(200).send(payload);
  });
};
