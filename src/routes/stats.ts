import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { resolveStats } from "../calc/stats.js";
import { fillStats, validateRequest } from "../request-schemas.js";

const statsRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.post("/stats", (request) => {
    const body = validateRequest("stats_request", request.body);
    const level = body.level ?? app.calcConfig.level;
    const ivs = fillStats(body.ivs, app.calcConfig.defaultIv);
    const evs = fillStats(body.evs, 0);

    return {
      level,
      nature: body.nature,
      ivs,
      evs,
      stats: resolveStats(body.baseStats, ivs, evs, body.nature, level),
    };
  });

  done();
};

export default statsRoutes;
