import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { calculateDamage, findKoThreshold } from "../calc/damage.js";
import { toBuild, toContext, validateRequest } from "../request-schemas.js";

const damageRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.post("/damage", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("damage_request", request.body);

    return calculateDamage(
      toBuild(body.attacker, config),
      toBuild(body.defender, config),
      body.move,
      toContext(body.context, config),
      { maxKoHits: body.maxKoHits ?? config.maxKoHits },
    );
  });

  // Minimal offensive investment for the attacker to reach a KO chance.
  app.post("/damage/ko-threshold", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("ko_threshold_request", request.body);

    const threshold = findKoThreshold(
      toBuild(body.attacker, config),
      toBuild(body.defender, config),
      body.move,
      toContext(body.context, config),
      { uses: body.uses, chance: body.chance },
    );
    return { reachable: threshold !== null, threshold };
  });

  done();
};

export default damageRoutes;
