// Login throttling. Both windows are fixed 15-minute buckets; the email bucket
// key is hashed so raw addresses never reach the cache.
export const LOGIN_RATE_LIMITS = {
  perEmail: { limit: 5, windowSeconds: 15 * 60 },
  perIp: { limit: 20, windowSeconds: 15 * 60 },
} as const;
