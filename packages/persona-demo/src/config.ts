/**
 * CLI defaults, overridable from the environment
 */

export const config = {
  port: parseInt(process.env.PERSONA_PORT || '8080', 10),
  host: process.env.PERSONA_HOST || '127.0.0.1',
  idleTimeoutMs: parseInt(process.env.PERSONA_IDLE_TIMEOUT_MS || '1000', 10),
};
