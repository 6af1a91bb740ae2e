import type { FastifyPluginAsync } from "fastify";

/** Prometheus scrape endpoint */
export const metricsRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const body = await app.statusMetrics.expose();
    return reply.type(app.statusMetrics.contentType).send(body);
  });
};
