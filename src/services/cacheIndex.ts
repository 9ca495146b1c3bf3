import { createHash } from "node:crypto";
import { JobStore } from "../repositories/jobStore";
import { AnalysisJob } from "../types/job";
import { recordCacheLookup } from "../metrics";

export function normalizeQuestion(question: string) {
  return question.trim().replace(/\s+/g, " ").toLowerCase();
}

export function fingerprintQuestion(question: string) {
  return createHash("sha256").update(normalizeQuestion(question)).digest("hex");
}

/**
 * Lookup discipline over the job store: a completed, computed job with the
 * same fingerprint that finished no longer than `ttlMs` ago. A TTL of zero
 * disables reuse.
 */
export class CacheIndex {
  constructor(
    private readonly store: JobStore,
    private readonly ttlMs: number,
  ) {}

  async lookup(fingerprint: string): Promise<AnalysisJob | null> {
    if (this.ttlMs <= 0) {
      recordCacheLookup("miss");
      return null;
    }
    const hit = await this.store.findFreshByFingerprint(fingerprint, this.ttlMs);
    recordCacheLookup(hit?.result_payload ? "hit" : "miss");
    return hit?.result_payload ? hit : null;
  }
}
