/**
 * LedgerStore: the one explicitly owned state container.
 *
 * Holds the bounty counter, bounty records, per-identity histories, the
 * ordered index of Active bounty ids, tip/bounty stats and agent
 * identities. Stats records are created lazily on first write; reads of
 * unknown identities return zeros.
 *
 * begin()/commit()/rollback() back the transaction boundary in ledger.ts.
 * While a transaction is open every write records how to undo itself, so
 * a rollback costs what the transaction touched, not what the store holds.
 * Records handed out by the mutable* accessors are journaled on first
 * access and may be changed in place.
 */

import type { Identity } from "@agentledger/protocol";
import type { AgentIdentity, Bounty, BountyStats, TipStats } from "./types.js";

export interface LedgerState {
  nextBountyId: number;
  bounties: Map<number, Bounty>;
  posterBounties: Map<Identity, number[]>;
  claimerBounties: Map<Identity, number[]>;
  /** Ids of Active bounties, ascending. */
  activeIds: number[];
  tipStats: Map<Identity, TipStats>;
  bountyStats: Map<Identity, BountyStats>;
  agents: Map<Identity, AgentIdentity>;
}

type Undo = () => void;

function emptyState(): LedgerState {
  return {
    nextBountyId: 1,
    bounties: new Map(),
    posterBounties: new Map(),
    claimerBounties: new Map(),
    activeIds: [],
    tipStats: new Map(),
    bountyStats: new Map(),
    agents: new Map(),
  };
}

/** Index of `id` in an ascending array, or -1. */
function search(ids: readonly number[], id: number): number {
  let lo = 0;
  let hi = ids.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const v = ids[mid];
    if (v === undefined) return -1;
    if (v === id) return mid;
    if (v < id) lo = mid + 1;
    else hi = mid - 1;
  }
  return -1;
}

export class LedgerStore {
  private readonly state: LedgerState = emptyState();
  private journal: Undo[] | null = null;
  /** Records already journaled in the open transaction. */
  private readonly touched = new Set<string>();

  // ── Transaction journal ──────────────────────────────────────────

  begin(): void {
    if (this.journal) throw new Error("LedgerStore: a transaction is already open");
    this.journal = [];
  }

  commit(): void {
    this.journal = null;
    this.touched.clear();
  }

  /** Undo every write since begin(), newest first. */
  rollback(): void {
    const journal = this.journal;
    this.commit();
    if (!journal) return;
    for (let i = journal.length - 1; i >= 0; i--) journal[i]?.();
  }

  /** Number of undo entries in the open transaction. */
  journalSize(): number {
    return this.journal?.length ?? 0;
  }

  private record(undo: Undo): void {
    this.journal?.push(undo);
  }

  /** Save `map[key]` as it was before the transaction first touched it. */
  private recordOnce<K, V>(tag: string, map: Map<K, V>, key: K, copy: (v: V) => V): void {
    if (!this.journal) return;
    const mark = `${tag}:${String(key)}`;
    if (this.touched.has(mark)) return;
    this.touched.add(mark);
    const prev = map.get(key);
    const saved = prev === undefined ? undefined : copy(prev);
    this.journal.push(() => {
      if (saved === undefined) map.delete(key);
      else map.set(key, saved);
    });
  }

  private append<K>(map: Map<K, number[]>, key: K, value: number): void {
    const list = map.get(key);
    if (list) {
      list.push(value);
      this.record(() => {
        list.pop();
      });
    } else {
      map.set(key, [value]);
      this.record(() => {
        map.delete(key);
      });
    }
  }

  // ── Bounties ─────────────────────────────────────────────────────

  /** Reserve the next id. Ids start at 1 and are never reused. */
  allocateBountyId(): number {
    const id = this.state.nextBountyId++;
    this.record(() => {
      this.state.nextBountyId = id;
    });
    return id;
  }

  /** Highest id handed out so far (0 before the first bounty). */
  lastBountyId(): number {
    return this.state.nextBountyId - 1;
  }

  /** Store a new Active bounty and index it. */
  insertBounty(bounty: Bounty): void {
    this.recordOnce("bounty", this.state.bounties, bounty.id, (b) => ({ ...b }));
    this.state.bounties.set(bounty.id, bounty);
    this.append(this.state.posterBounties, bounty.poster, bounty.id);
    // ids are allocated in ascending order, so a push keeps the index sorted
    this.state.activeIds.push(bounty.id);
    this.record(() => {
      this.state.activeIds.pop();
    });
  }

  /** Read-only view of the stored record. */
  bounty(id: number): Readonly<Bounty> | undefined {
    return this.state.bounties.get(id);
  }

  /** Live record, journaled so a rollback restores it. */
  mutableBounty(id: number): Bounty | undefined {
    if (!this.state.bounties.has(id)) return undefined;
    this.recordOnce("bounty", this.state.bounties, id, (b) => ({ ...b }));
    return this.state.bounties.get(id);
  }

  /** Drop an id from the Active index once its bounty reaches a terminal state. */
  deactivate(id: number): void {
    const ids = this.state.activeIds;
    const idx = search(ids, id);
    if (idx < 0) return;
    ids.splice(idx, 1);
    this.record(() => {
      ids.splice(idx, 0, id);
    });
  }

  activeIds(): readonly number[] {
    return this.state.activeIds;
  }

  recordClaim(claimer: Identity, bountyId: number): void {
    this.append(this.state.claimerBounties, claimer, bountyId);
  }

  posterBounties(identity: Identity): number[] {
    return [...(this.state.posterBounties.get(identity) ?? [])];
  }

  claimerBounties(identity: Identity): number[] {
    return [...(this.state.claimerBounties.get(identity) ?? [])];
  }

  // ── Stats ────────────────────────────────────────────────────────

  tipStats(identity: Identity): TipStats {
    const s = this.state.tipStats.get(identity);
    return s ? { ...s } : { totalReceived: 0, totalSent: 0, receivedCount: 0 };
  }

  /** Live, lazily created record. */
  mutableTipStats(identity: Identity): TipStats {
    this.recordOnce("tips", this.state.tipStats, identity, (v) => ({ ...v }));
    let s = this.state.tipStats.get(identity);
    if (!s) {
      s = { totalReceived: 0, totalSent: 0, receivedCount: 0 };
      this.state.tipStats.set(identity, s);
    }
    return s;
  }

  bountyStats(identity: Identity): BountyStats {
    const s = this.state.bountyStats.get(identity);
    return s
      ? { ...s }
      : { postedCount: 0, claimedCount: 0, amountPosted: 0, amountEarned: 0 };
  }

  /** Live, lazily created record. */
  mutableBountyStats(identity: Identity): BountyStats {
    this.recordOnce("bounties", this.state.bountyStats, identity, (v) => ({ ...v }));
    let s = this.state.bountyStats.get(identity);
    if (!s) {
      s = { postedCount: 0, claimedCount: 0, amountPosted: 0, amountEarned: 0 };
      this.state.bountyStats.set(identity, s);
    }
    return s;
  }

  // ── Agents ───────────────────────────────────────────────────────

  agent(identity: Identity): AgentIdentity | undefined {
    const a = this.state.agents.get(identity);
    return a ? { ...a } : undefined;
  }

  putAgent(identity: Identity, agent: AgentIdentity): void {
    this.recordOnce("agent", this.state.agents, identity, (v) => ({ ...v }));
    this.state.agents.set(identity, { ...agent });
  }

  agentCount(): number {
    return this.state.agents.size;
  }
}
