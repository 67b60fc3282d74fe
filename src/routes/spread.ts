import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { optimizeSpread, requireFeasible } from "../calc/spread-optimizer.js";
import { toSubject, toThreat, validateRequest } from "../request-schemas.js";

const spreadRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.post("/spread/optimize", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("spread_request", request.body);

    const result = optimizeSpread({
      subject: toSubject(body.subject, config),
      threats: body.threats.map((threat) => toThreat(threat, config)),
      speed: body.speed,
      survivalRate: body.survivalRate ?? config.survivalRate,
      role: body.role,
      tuneHp: body.tuneHp,
    });

    if (result.feasible) {
      request.log.info(
        { feasible: true, totalEvs: result.totalEvs, threats: result.threats.length },
        "spread optimized",
      );
    } else {
      request.log.info(
        { feasible: false, reasons: result.reasons.length },
        "spread infeasible",
      );
    }

    return body.requireFeasible === true ? requireFeasible(result) : result;
  });

  done();
};

export default spreadRoutes;
