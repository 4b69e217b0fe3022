import { settings } from '../lib/config.js';
import { DataIntegrityError } from '../lib/errors.js';
import { logger, type EventSink, type Logger } from '../lib/logger.js';
import type { EnrichedCandidate, ScoredCandidate, SeedContribution } from '../lib/types.js';

export interface ScoringOptions {
    minRating: number;
    frequencyWeight: number;
    ratingWeight: number;
    rowSize: number;
    // Canonical ids the user already watched.
    exclude?: ReadonlySet<string>;
}

export const defaultScoringOptions: Omit<ScoringOptions, 'minRating'> = {
    frequencyWeight: settings.SCORE_FREQUENCY_WEIGHT,
    ratingWeight: settings.SCORE_RATING_WEIGHT,
    rowSize: settings.ITEMS_PER_ROW,
};

type CanonicalCandidate = EnrichedCandidate & { canonicalId: string };

interface CandidateGroup {
    candidate: CanonicalCandidate;
    seedWeights: Map<string, number>;
}

function hasCanonicalId(candidate: EnrichedCandidate): candidate is CanonicalCandidate {
    return typeof candidate.canonicalId === 'string' && candidate.canonicalId.length > 0;
}

// ============================================================================
// CANONICAL-IDENTIFIER GATE
// ============================================================================

/**
 * Drop candidates that still have no canonical id after enrichment. Each
 * drop is logged as a DataIntegrityError and never retried.
 */
export function applyCanonicalGate(
    contribution: SeedContribution,
    events: EventSink,
    log: Logger = logger.child('scorer')
): SeedContribution {
    const kept: CanonicalCandidate[] = [];
    let dropped = 0;
    for (const candidate of contribution.candidates) {
        if (hasCanonicalId(candidate)) {
            kept.push(candidate);
            continue;
        }
        dropped += 1;
        const error = new DataIntegrityError(
            candidate.externalId,
            `Candidate ${candidate.externalId} for seed ${contribution.seed.externalId} has no canonical id`
        );
        log.debug(error.message, error);
    }
    if (dropped > 0) {
        events.emit({
            type: 'candidate.dropped',
            seedId: contribution.seed.externalId,
            count: dropped,
            reason: 'missing_canonical_id',
        });
    }
    return { seed: contribution.seed, candidates: kept };
}

// ============================================================================
// DEDUPLICATION & SCORING
// ============================================================================

export function clampRating(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(10, value));
}

function groupByCanonicalId(contributions: SeedContribution[]): Map<string, CandidateGroup> {
    const groups = new Map<string, CandidateGroup>();
    for (const { seed, candidates } of contributions) {
        for (const candidate of candidates) {
            if (!hasCanonicalId(candidate)) continue;
            const group = groups.get(candidate.canonicalId);
            if (!group) {
                groups.set(candidate.canonicalId, {
                    candidate,
                    seedWeights: new Map([[seed.externalId, seed.weight]]),
                });
                continue;
            }
            // Each seed counts once however many times it returned the item.
            group.seedWeights.set(seed.externalId, seed.weight);
            if (group.candidate.secondaryRating === null && candidate.secondaryRating !== null) {
                group.candidate = candidate;
            }
        }
    }
    return groups;
}

function sumWeights(weights: Map<string, number>): number {
    let total = 0;
    for (const weight of weights.values()) total += weight;
    return total;
}

function toScored(candidate: CanonicalCandidate, frequency: number, options: ScoringOptions): ScoredCandidate {
    const normalizedRating = clampRating(candidate.secondaryRating ?? candidate.rawRating);
    return {
        ...candidate,
        frequency,
        normalizedRating,
        compositeScore: frequency * options.frequencyWeight + normalizedRating * options.ratingWeight,
    };
}

function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
    if (b.compositeScore !== a.compositeScore) return b.compositeScore - a.compositeScore;
    if (b.voteCount !== a.voteCount) return b.voteCount - a.voteCount;
    if (a.title !== b.title) return a.title < b.title ? -1 : 1;
    if (a.canonicalId === b.canonicalId) return 0;
    return a.canonicalId < b.canonicalId ? -1 : 1;
}

function rank(scored: ScoredCandidate[], options: ScoringOptions): ScoredCandidate[] {
    return scored
        .filter(item => item.normalizedRating >= options.minRating)
        .filter(item => !options.exclude?.has(item.canonicalId))
        .sort(compareScored)
        .slice(0, options.rowSize);
}

/**
 * Merge every seed's candidates into one ranked list, one entry per
 * canonical id. Same input, same output.
 */
export function scoreCandidates(contributions: SeedContribution[], options: ScoringOptions): ScoredCandidate[] {
    const groups = groupByCanonicalId(contributions);
    const scored = [...groups.values()].map(group => toScored(group.candidate, sumWeights(group.seedWeights), options));
    return rank(scored, options);
}

/**
 * One seed's row: the merged ranking over every seed of the media type,
 * cut down to the items this seed found. Items several seeds agree on
 * rise in each of their rows.
 */
export function scoreRow(
    contribution: SeedContribution,
    allContributions: SeedContribution[],
    options: ScoringOptions
): ScoredCandidate[] {
    const own = new Set(contribution.candidates.filter(hasCanonicalId).map(candidate => candidate.canonicalId));
    // Seeds count once per item even when passed twice.
    const merged = scoreCandidates([...allContributions, contribution], { ...options, rowSize: Number.POSITIVE_INFINITY });
    return merged.filter(item => own.has(item.canonicalId)).slice(0, options.rowSize);
}
