type SessionPoolConfig = {
  /** Number of shared execution contexts; pages are multiplexed inside each. */
  contexts: number;
  /** Minimum time between two credential refreshes. */
  refreshCooldownMs: number;
};

type SessionInfo = {
  id: string;
  inFlight: number;
  usageCount: number;
  createdAt: number;
  lastUsedAt: number;
};

type SessionPoolStats = {
  total: number;
  inFlight: number;
  refreshCount: number;
  lastRefreshAt: number | undefined;
};

const DEFAULT_SESSION_POOL_CONFIG: SessionPoolConfig = {
  contexts: 1,
  refreshCooldownMs: 30_000,
};

export type { SessionPoolConfig, SessionInfo, SessionPoolStats };
export { DEFAULT_SESSION_POOL_CONFIG };
