import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { optimizeNature } from "../calc/nature-optimizer.js";
import { fillStats, validateRequest } from "../request-schemas.js";

const natureRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.post("/nature/optimize", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("nature_request", request.body);

    const result = optimizeNature({
      baseStats: body.baseStats,
      ivs: fillStats(body.ivs, config.defaultIv),
      level: body.level ?? config.level,
      primary: body.primary,
      secondary: body.secondary,
      avoidLowering: body.avoidLowering,
    });
    request.log.info(
      { best: result.best?.nature ?? null, savingsVersusNeutral: result.savingsVersusNeutral },
      "nature optimized",
    );
    return result;
  });

  done();
};

export default natureRoutes;
