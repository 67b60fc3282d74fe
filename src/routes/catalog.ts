import type { FastifyInstance, FastifyPluginCallback } from "fastify";
import { getFullCatalog } from "../calc/index.js";

/** Every recognized type, nature, item, ability, weather and terrain. */
const catalogRoutes: FastifyPluginCallback = (
  app: FastifyInstance,
  _opts,
  done,
) => {
  const catalog = getFullCatalog();

  app.get("/catalog", () => catalog);

  done();
};

export default catalogRoutes;
