import { Asset } from './Asset';

/**
 * Named scoring factors, in the order their contributions are reported.
 */
export const SCORE_FACTORS = ['typeMatch', 'tagOverlap', 'keywordMatch', 'ratingBonus', 'usageBonus'] as const;

export type ScoreFactor = typeof SCORE_FACTORS[number];

export type ScoreBreakdown = Readonly<Record<ScoreFactor, number>>;

/**
 * An asset evaluated against one section. Created per scoring call, never mutated.
 */
export interface ScoredCandidate {
    readonly asset: Asset;
    /** Sum of the breakdown, within [0, 100] */
    readonly totalScore: number;
    readonly breakdown: ScoreBreakdown;
}

export function sumBreakdown(breakdown: ScoreBreakdown): number {
    return SCORE_FACTORS.reduce((total, factor) => total + breakdown[factor], 0);
}

/**
 * Highest score first; equal scores ordered by asset id so rankings are stable.
 */
export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
    if (b.totalScore !== a.totalScore) {
        return b.totalScore - a.totalScore;
    }
    if (a.asset.id < b.asset.id) return -1;
    if (a.asset.id > b.asset.id) return 1;
    return 0;
}
