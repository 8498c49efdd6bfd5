/**
 * Data models for the credential pool.
 */

export type CredentialHealth = "available" | "cooling" | "disabled";

/** Durable per-credential state, as held by a CredentialStore. */
export interface CredentialRecord {
  token: string;
  /** Short non-secret id (sha256 prefix); used in logs, keys and admin URLs. */
  id: string;
  dailyUsed: number;
  quotaEpoch: string;
  verified: boolean;
  nsfwEnabled: boolean;
  health: CredentialHealth;
  /** Unix ms; set while cooling. */
  coolingUntil: number | null;
  /** Unix ms of the last acquisition; null = never used. */
  lastUsedAt: number | null;
  /** Consecutive transient failures since the last success. */
  failureStreak: number;
  disabledReason: string | null;
}

/**
 * Store mutations. Each one is applied atomically to a single credential.
 */
export type CredentialMutation =
  | { type: "rollover"; epoch: string }
  | { type: "touch"; at: number }
  | { type: "charge"; epoch: string; limit: number; at: number }
  | { type: "cool"; until: number }
  | { type: "disable"; reason: string }
  | { type: "verify" }
  | { type: "enable_nsfw" }
  | { type: "reset" }
  | { type: "reset_usage"; epoch: string };

export interface ApplyResult {
  record: CredentialRecord;
  /** False when the mutation was a no-op (flag already set, quota already full). */
  changed: boolean;
}

/** Read-only view for inspection. The token is reduced to a preview. */
export interface CredentialSummary {
  id: string;
  tokenPreview: string;
  dailyUsed: number;
  dailyLimit: number;
  remaining: number;
  quotaEpoch: string;
  health: CredentialHealth;
  coolingUntil: string | null;
  verified: boolean;
  nsfwEnabled: boolean;
  lastUsedAt: string | null;
  failureStreak: number;
  disabledReason: string | null;
}

/** Returned by acquire() */
export interface AcquiredCredential {
  id: string;
  token: string;
  verified: boolean;
  nsfwEnabled: boolean;
}

export interface PoolSummary {
  total: number;
  available: number;
  cooling: number;
  disabled: number;
  exhausted: number;
  strategy: string;
  dailyLimit: number;
  quotaEpoch: string;
}
