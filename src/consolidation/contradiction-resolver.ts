import type { ConsolidationConfig } from '../config/index.js';
import { createLogger } from '../core/logger.js';
import { jaccard } from '../memory/scoring.js';
import type { Belief, BeliefStatus } from '../memory/types.js';
import { isLiveBelief } from './replay-miner.js';

const log = createLogger('resolver');

export type ResolverOptions = Pick<
  ConsolidationConfig,
  'contradictionThreshold' | 'disputePenalty' | 'disputeDecay' | 'supersedeFloor' | 'confirmThreshold'
>;

export interface ResolutionOutcome {
  changed: Set<string>;
  linked: Array<[string, string]>;   // Conflict pairs created this run
  retracted: Set<string>;
  archived: Set<string>;
}

export function topicalSimilarity(a: Belief, b: Belief): number {
  return jaccard(a.subject, b.subject);
}

/**
 * Same topic, incompatible assertion: opposite polarity, or the same polarity
 * with two different asserted values.
 */
export function contradicts(a: Belief, b: Belief, threshold: number): boolean {
  if (a.id === b.id) return false;
  if (topicalSimilarity(a, b) < threshold) return false;
  if (a.polarity !== b.polarity) return true;
  return a.value !== undefined && b.value !== undefined && a.value !== b.value;
}

/**
 * Links, penalises and re-evaluates conflicts in the working set. Mutates the
 * map in place (replacing entries with updated copies) and reports which
 * beliefs need to be written back.
 */
export class ContradictionResolver {
  constructor(private options: ResolverOptions) {}

  resolve(beliefs: Map<string, Belief>, touched: Set<string>, now: Date): ResolutionOutcome {
    const outcome: ResolutionOutcome = {
      changed: new Set(),
      linked: [],
      retracted: new Set(),
      archived: new Set(),
    };

    const update = (id: string, patch: Partial<Belief>): Belief | undefined => {
      const current = beliefs.get(id);
      if (!current) return undefined;
      const next: Belief = { ...current, ...patch, updatedAt: now };
      beliefs.set(id, next);
      outcome.changed.add(id);
      return next;
    };

    const penalised = new Set<string>();

    for (const id of [...touched].sort()) {
      for (const other of [...beliefs.values()]) {
        const self = beliefs.get(id);
        if (!self || !isLiveBelief(self)) break;
        if (other.id === id) continue;

        const current = beliefs.get(other.id) ?? other;
        if (!isLiveBelief(current)) continue;
        if (!contradicts(self, current, this.options.contradictionThreshold)) continue;
        if (self.conflictsWithIds.includes(current.id)) continue;  // Already linked

        update(self.id, { conflictsWithIds: [...self.conflictsWithIds, current.id] });
        update(current.id, { conflictsWithIds: [...current.conflictsWithIds, self.id] });
        outcome.linked.push([self.id, current.id]);

        // Ground truth wins outright over an unverified claim
        if (self.verified !== current.verified) {
          const loser = self.verified ? current : self;
          update(loser.id, { status: 'retracted' });
          outcome.retracted.add(loser.id);
          log.debug(`retracted ${loser.id}: contradicted by verified belief`);
          continue;
        }

        for (const side of [self.id, current.id]) {
          const belief = beliefs.get(side);
          if (!belief) continue;
          update(side, {
            confidence: Math.max(0, belief.confidence - this.options.disputePenalty),
            status: 'disputed',
          });
          penalised.add(side);
        }
      }
    }

    this.reevaluate(beliefs, touched, penalised, update, outcome);
    return outcome;
  }

  // Stale disputes fade: untouched disputed beliefs decay, and a belief that
  // sinks under the floor is superseded, which releases its counterparts.
  private reevaluate(
    beliefs: Map<string, Belief>,
    touched: Set<string>,
    penalised: Set<string>,
    update: (id: string, patch: Partial<Belief>) => Belief | undefined,
    outcome: ResolutionOutcome
  ): void {
    for (const belief of [...beliefs.values()]) {
      if (belief.status !== 'disputed' || touched.has(belief.id) || penalised.has(belief.id)) continue;
      update(belief.id, { confidence: belief.confidence * this.options.disputeDecay });
    }

    // Weakest first: archiving one side can release the other from the dispute
    const sinking = [...beliefs.values()]
      .filter((b) => b.status === 'disputed' && b.confidence < this.options.supersedeFloor)
      .sort((a, b) => a.confidence - b.confidence || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    for (const { id } of sinking) {
      const belief = beliefs.get(id);
      if (!belief || !hasLiveConflict(belief, beliefs)) continue;
      update(id, { status: 'archived' });
      outcome.archived.add(id);
    }

    for (const belief of [...beliefs.values()]) {
      if (!isLiveBelief(belief)) continue;
      if (!touched.has(belief.id) && !outcome.changed.has(belief.id) && belief.conflictsWithIds.length === 0) continue;

      const next = this.statusFor(belief, beliefs);
      if (next !== belief.status) {
        update(belief.id, { status: next });
      }
    }
  }

  private statusFor(belief: Belief, beliefs: Map<string, Belief>): BeliefStatus {
    if (hasLiveConflict(belief, beliefs)) return 'disputed';
    if (belief.confidence > this.options.confirmThreshold) return 'confirmed';
    if (belief.status === 'disputed') return 'proposed';
    return belief.status;
  }
}

function hasLiveConflict(belief: Belief, beliefs: Map<string, Belief>): boolean {
  return belief.conflictsWithIds.some((otherId) => {
    const other = beliefs.get(otherId);
    return other !== undefined && isLiveBelief(other);
  });
}
