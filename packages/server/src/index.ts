export { CrowdSimServer } from './CrowdSimServer.js';
export type { ServerConfig } from './CrowdSimServer.js';
export { loadConfig } from './config.js';
export type { ServerEnvConfig } from './config.js';
export { parseStartRequest, toWireState, toWireResults, sanitizeJson } from './validation.js';

/**
 * Quick-start helper: creates and starts a CrowdSim server.
 *
 * @example
 * ```ts
 * import { startServer } from '@crowdsim/server';
 * const server = await startServer({ port: 8000 });
 * // POST /api/simulation/start, GET /api/simulation/state, ...
 * ```
 */
export async function startServer(
  config?: import('./CrowdSimServer.js').ServerConfig,
): Promise<import('./CrowdSimServer.js').CrowdSimServer> {
  const { CrowdSimServer } = await import('./CrowdSimServer.js');
  const server = new CrowdSimServer(config);
  await server.start();
  return server;
}
