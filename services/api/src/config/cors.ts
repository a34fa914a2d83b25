const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

/**
 * Origins allowed to reach the HTTP API and the chat socket.
 * Production takes them from CORS_ORIGINS (comma-separated) and refuses to
 * start without them.
 */
export function resolveCorsOrigins(isProduction: boolean, corsOriginsEnv: string): string[] {
  if (!isProduction) {
    return [...DEV_ORIGINS];
  }
  const origins = corsOriginsEnv.split(',').map(o => o.trim()).filter(Boolean);
  if (origins.length === 0) {
    throw new Error('CORS_ORIGINS must be set in production');
  }
  return origins;
}
