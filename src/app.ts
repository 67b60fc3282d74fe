import Fastify from "fastify";
import healthRoutes from "./routes/health.js";
import configRoutes from "./routes/config.js";
import catalogRoutes from "./routes/catalog.js";
import statsRoutes from "./routes/stats.js";
import damageRoutes from "./routes/damage.js";
import speedRoutes from "./routes/speed.js";
import spreadRoutes from "./routes/spread.js";
import natureRoutes from "./routes/nature.js";
import { loadCalcConfig } from "./config-loader.js";
import { CalcError } from "./errors.js";

/** Status code Fastify attached to a request-level failure, if any. */
function errorStatusCode(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("statusCode" in error)) {
    return undefined;
  }
  return typeof error.statusCode === "number" ? error.statusCode : undefined;
}

export interface AppOptions {
  configPath?: string;
  logLevel?: string;
}

export function createApp(options?: string | AppOptions) {
  const opts: AppOptions =
    typeof options === "string" ? { configPath: options } : (options ?? {});

  const app = Fastify({
    logger: {
      level: opts.logLevel ?? process.env.LOG_LEVEL ?? "info",
    },
  });

  const config = loadCalcConfig(opts.configPath);
  app.decorate("calcConfig", config);
  app.log.info(
    { calcConfigId: config.calcConfigId, level: config.level, format: config.format },
    "calc config loaded",
  );

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof CalcError) {
      return reply.code(error.statusCode).send({
        errorCode: error.errorCode,
        errorMessage: error.message,
        ...error.details(),
      });
    }
    // Malformed JSON, unsupported content type, oversized body.
    const statusCode = errorStatusCode(error);
    if (statusCode !== undefined && statusCode < 500) {
      return reply.code(statusCode).send({
        errorCode: "BAD_REQUEST",
        errorMessage: error instanceof Error ? error.message : String(error),
      });
    }
    request.log.error({ err: error }, "unhandled error");
    return reply.code(500).send({
      errorCode: "INTERNAL_ERROR",
      errorMessage: "Internal server error.",
    });
  });

  app.register(healthRoutes);
  app.register(configRoutes);
  app.register(catalogRoutes);
  app.register(statsRoutes);
  app.register(damageRoutes);
  app.register(speedRoutes);
  app.register(spreadRoutes);
  app.register(natureRoutes);

  return app;
}
