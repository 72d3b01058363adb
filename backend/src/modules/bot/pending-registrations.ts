import type { PendingRegistration } from './navigation/navigation.service';

const DEFAULT_TTL_MS = 30 * 60 * 1000;

/**
 * Referrals captured by `/start ref<id>` for identities that have not picked a language yet.
 * In-memory only; a lost entry means the trial falls back to the regular length.
 */
export class PendingRegistrations {
  private readonly entries = new Map<string, { pending: PendingRegistration; expiresAt: number }>();

  constructor(private readonly ttlMs = DEFAULT_TTL_MS) {}

  set(userId: string, pending: PendingRegistration, now = Date.now()): void {
    this.purge(now);
    this.entries.set(userId, { pending, expiresAt: now + this.ttlMs });
  }

  get(userId: string, now = Date.now()): PendingRegistration | null {
    const entry = this.entries.get(userId);
    if (!entry) return null;
    if (entry.expiresAt <= now) {
      this.entries.delete(userId);
      return null;
    }
    return entry.pending;
  }

  delete(userId: string): void {
    this.entries.delete(userId);
  }

  get size(): number {
    return this.entries.size;
  }

  private purge(now: number): void {
    for (const [userId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(userId);
    }
  }
}
