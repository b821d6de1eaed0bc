import type { ProjectClassification } from '../model.js';

export interface LedgerEntry {
  projectId: string;
  projectName: string;
  classification: ProjectClassification;
}

export type ReserveOutcome =
  | { kind: 'accept' }
  | { kind: 'superseded'; previous: LedgerEntry }
  | { kind: 'duplicate'; winner: LedgerEntry };

export interface DedupStats {
  /** Tasks owned by client / team-member projects. */
  owned: Record<ProjectClassification, number>;
  /** Losing candidates, tagged with the loser's classification. */
  dropped: Record<ProjectClassification, number>;
  /** Winners displaced by a client project. */
  superseded: number;
  byProject: Record<string, { name: string; owned: number }>;
}

export class LedgerSealedError extends Error {
  constructor(taskId: string) {
    super(`dedup ledger is sealed; cannot reserve task ${taskId}`);
    this.name = 'LedgerSealedError';
  }
}

/**
 * Run-scoped record of which project owns each source task.
 *
 * A client project outranks a team-member project; within the same
 * classification the first reservation wins (operator-supplied project
 * order, then task order). Reservations all happen before import; `seal()`
 * freezes the result.
 */
export class DedupLedger {
  private entries = new Map<string, LedgerEntry>();
  private dropped: Record<ProjectClassification, number> = { client: 0, 'team-member': 0 };
  private supersededCount = 0;
  private replacedBy = new Map<string, number>();
  private sealed = false;

  reserve(taskId: string, candidate: LedgerEntry): ReserveOutcome {
    if (this.sealed) throw new LedgerSealedError(taskId);

    const current = this.entries.get(taskId);
    if (!current) {
      this.entries.set(taskId, { ...candidate });
      return { kind: 'accept' };
    }
    if (current.projectId === candidate.projectId) return { kind: 'accept' };

    if (current.classification === 'team-member' && candidate.classification === 'client') {
      this.entries.set(taskId, { ...candidate });
      this.dropped['team-member']++;
      this.supersededCount++;
      this.replacedBy.set(candidate.projectId, (this.replacedBy.get(candidate.projectId) ?? 0) + 1);
      return { kind: 'superseded', previous: current };
    }

    this.dropped[candidate.classification]++;
    return { kind: 'duplicate', winner: current };
  }

  ownerOf(taskId: string): LedgerEntry | undefined {
    return this.entries.get(taskId);
  }

  /** Tasks `projectId` took over from a team-member project. */
  replacedCount(projectId: string): number {
    return this.replacedBy.get(projectId) ?? 0;
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  size(): number {
    return this.entries.size;
  }

  stats(): DedupStats {
    const owned: Record<ProjectClassification, number> = { client: 0, 'team-member': 0 };
    const byProject: DedupStats['byProject'] = {};
    for (const e of this.entries.values()) {
      owned[e.classification]++;
      const p = (byProject[e.projectId] ??= { name: e.projectName, owned: 0 });
      p.owned++;
    }
    return { owned, dropped: { ...this.dropped }, superseded: this.supersededCount, byProject };
  }
}
