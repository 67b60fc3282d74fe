import type { FastifyInstance, FastifyPluginCallback } from "fastify";

const configRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.get("/config", (_request, reply) => {
    return reply.send(app.calcConfig);
  });

  done();
};

export default configRoutes;
