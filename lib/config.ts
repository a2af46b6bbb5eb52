// Centralized runtime configuration for DNS timeouts, resolvers and logging.
// Values are read from env with sane defaults; CLI flags override them.

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

function envList(name: string): string[] {
  const v = process.env[name];
  if (!v) return [];
  return v.split(',').map((s) => s.trim()).filter(Boolean);
}

export const CONFIG = {
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 5000),

  // Empty list means "use the system resolver configuration"
  DNS_SERVERS: envList('DNS_SERVERS'),

  LOG_LEVEL: process.env.LOG_LEVEL || 'warn',

  METRICS_PREFIX: process.env.METRICS_PREFIX || 'ns_delegation_check_',
};

export default CONFIG;
