/**
 * Server configuration loaded from environment variables.
 *
 * Simulation parameters live in `simulationConfig.ts`; this object only
 * covers the observation server around the engine.
 *
 * @module config
 */

/**
 * Application configuration object.
 *
 * @property {number} PORT - HTTP server port (default: 8080)
 * @property {string[] | "*"} ALLOWED_ORIGINS - CORS origins for the observation API
 * @property {boolean} AUTO_START - Start the run as soon as the server is listening
 */
export const CONFIG = {
  PORT: process.env.PORT ? parseInt(process.env.PORT, 10) : 8080,
  ALLOWED_ORIGINS: process.env.ALLOWED_ORIGINS?.split(",") ?? "*",
  AUTO_START: process.env.SIM_AUTO_START !== "false",
};
