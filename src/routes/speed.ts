import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import type { CalcConfig } from "../config-loader.js";
import { ValidationError } from "../errors.js";
import {
  estimateOutspeed,
  speedDistributionFromSpreads,
  type SpeedFrequency,
} from "../calc/outspeed.js";
import {
  buildSpeed,
  compareSpeed,
  maxSpeedEvsToMoveFirst,
  minSpeedEvsToMoveFirst,
  turnOrder,
} from "../calc/speed.js";
import type { Weather } from "../calc/types.js";
import {
  toBuild,
  validateRequest,
  type OutspeedRequest,
  type SpeedSubject,
} from "../request-schemas.js";

function subjectSpeed(
  subject: SpeedSubject,
  config: CalcConfig,
  weather: Weather | undefined,
): number {
  if ("speed" in subject) return subject.speed;
  return buildSpeed(toBuild(subject.build, config), weather);
}

function opponentDistribution(body: OutspeedRequest, config: CalcConfig): SpeedFrequency[] {
  if (body.distribution) return body.distribution;
  if (body.opponent) {
    const { baseSpeed, level, spreads } = body.opponent;
    return speedDistributionFromSpreads(baseSpeed, spreads, level ?? config.level);
  }
  throw new ValidationError("Give either a speed distribution or opponent spreads.");
}

const speedRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  app.post("/speed/compare", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("speed_compare_request", request.body);
    const weather = body.context?.weather;

    return compareSpeed(
      subjectSpeed(body.first, config, weather),
      subjectSpeed(body.second, config, weather),
      body.context,
    );
  });

  app.post("/speed/turn-order", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("turn_order_request", request.body);
    const weather = body.context?.weather;

    return turnOrder(
      body.firstMove,
      body.secondMove,
      subjectSpeed(body.first, config, weather),
      subjectSpeed(body.second, config, weather),
      body.context,
    );
  });

  app.post("/speed/thresholds", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("speed_threshold_request", request.body);
    const subject = toBuild(body.subject, config);

    return {
      opponentSpeed: body.opponentSpeed,
      minEvs: minSpeedEvsToMoveFirst(subject, body.opponentSpeed, body.context),
      maxEvs: maxSpeedEvsToMoveFirst(subject, body.opponentSpeed, body.context),
    };
  });

  app.post("/speed/outspeed", (request) => {
    const config = app.calcConfig;
    const body = validateRequest("outspeed_request", request.body);
    const mySpeed = subjectSpeed(body.subject, config, body.context?.weather);
    const distribution = opponentDistribution(body, config);

    return {
      mySpeed,
      distribution,
      ...estimateOutspeed(mySpeed, distribution, body.context),
    };
  });

  done();
};

export default speedRoutes;
