import { Asset, AssetKind, dedupeAssets, isAssetKind, isValidRating } from '../entities/Asset';
import {
    SCORE_FACTORS,
    ScoreBreakdown,
    ScoreFactor,
    ScoredCandidate,
    compareCandidates,
    sumBreakdown,
} from '../entities/ScoredCandidate';
import { ScriptSection } from '../entities/ScriptSection';
import { Pace, SemanticProfile } from '../entities/SemanticProfile';
import { extractKeywords } from './TextKeywords';

/**
 * Per-factor caps and increments. Each factor is capped on its own before summing.
 */
export interface ScoringWeights {
    readonly typeMatch: number;
    readonly tagOverlap: number;
    readonly tagOverlapPerMatch: number;
    readonly keywordMatch: number;
    readonly keywordMatchPerHit: number;
    readonly ratingBonus: number;
    readonly ratingMultiplier: number;
    readonly usageBonus: number;
    readonly usagePerUse: number;
    readonly totalCap: number;
}

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = Object.freeze({
    typeMatch: 30,
    tagOverlap: 30,
    tagOverlapPerMatch: 10,
    keywordMatch: 30,
    keywordMatchPerHit: 10,
    ratingBonus: 10,
    ratingMultiplier: 2,
    usageBonus: 10,
    usagePerUse: 1,
    totalCap: 100,
});

/**
 * Selections made earlier in the same run, keyed by asset id.
 * They count as additional validated uses, never as a penalty.
 */
export interface UsageContext {
    readonly runUsage: ReadonlyMap<string, number>;
}

export const EMPTY_USAGE: UsageContext = Object.freeze({ runUsage: new Map<string, number>() });

/** Factors trimmed first when the raw sum exceeds the total cap */
const TRIM_ORDER: readonly ScoreFactor[] = ['usageBonus', 'ratingBonus', 'keywordMatch', 'tagOverlap', 'typeMatch'];

/**
 * Kind a section asks for: fast and medium sections want motion (video),
 * slow sections accept either kind (null).
 */
export function preferredKindFor(pace: Pace): AssetKind | null {
    return pace === 'slow' ? null : 'video';
}

/**
 * Query terms derived from a section's narration and visual hint.
 */
export function deriveSectionKeywords(section: ScriptSection): string[] {
    return extractKeywords(section.visualHint, section.narration);
}

/**
 * Scores candidate assets against a profiled section.
 *
 * Factors (default caps): typeMatch 30, tagOverlap 30, keywordMatch 30,
 * ratingBonus 10, usageBonus 10. Malformed asset metadata contributes zero.
 */
export class AssetScorer {
    constructor(private readonly weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS) { }

    score(
        profile: SemanticProfile,
        section: ScriptSection,
        asset: Asset,
        usage: UsageContext = EMPTY_USAGE
    ): ScoredCandidate {
        const tags = this.usableTags(asset);
        const raw: Record<ScoreFactor, number> = {
            typeMatch: this.typeMatch(profile, asset),
            tagOverlap: this.tagOverlap(tags, deriveSectionKeywords(section)),
            keywordMatch: this.keywordMatch(tags, section.narration),
            ratingBonus: this.ratingBonus(asset),
            usageBonus: this.usageBonus(asset, usage),
        };

        const breakdown = this.trimToCap(raw);
        const totalScore = sumBreakdown(breakdown);

        return Object.freeze({ asset, totalScore, breakdown });
    }

    /**
     * Scores a pool and orders it by score (desc), then asset id (asc).
     * Duplicate ids in the pool are scored once.
     */
    rank(
        profile: SemanticProfile,
        section: ScriptSection,
        assets: readonly Asset[],
        usage: UsageContext = EMPTY_USAGE
    ): ScoredCandidate[] {
        return dedupeAssets(assets)
            .map((asset) => this.score(profile, section, asset, usage))
            .sort(compareCandidates);
    }

    private typeMatch(profile: SemanticProfile, asset: Asset): number {
        if (!isAssetKind(asset.kind)) {
            return 0;
        }
        const preferred = preferredKindFor(profile.pace);
        return preferred === null || asset.kind === preferred ? this.weights.typeMatch : 0;
    }

    private tagOverlap(tags: string[], keywords: string[]): number {
        const overlapping = tags.filter((tag) =>
            keywords.some((keyword) => keyword === tag || keyword.includes(tag) || tag.includes(keyword))
        );
        return Math.min(overlapping.length * this.weights.tagOverlapPerMatch, this.weights.tagOverlap);
    }

    private keywordMatch(tags: string[], narration: string): number {
        const text = narration.toLowerCase();
        const hits = tags.filter((tag) => text.includes(tag));
        return Math.min(hits.length * this.weights.keywordMatchPerHit, this.weights.keywordMatch);
    }

    private ratingBonus(asset: Asset): number {
        if (!isValidRating(asset.rating)) {
            return 0;
        }
        return Math.min(asset.rating * this.weights.ratingMultiplier, this.weights.ratingBonus);
    }

    private usageBonus(asset: Asset, usage: UsageContext): number {
        const stored = Number.isFinite(asset.usageCount) && asset.usageCount > 0 ? asset.usageCount : 0;
        const inRun = usage.runUsage.get(asset.id) ?? 0;
        return Math.min((stored + inRun) * this.weights.usagePerUse, this.weights.usageBonus);
    }

    private usableTags(asset: Asset): string[] {
        if (!Array.isArray(asset.tags)) {
            return [];
        }
        const tags = asset.tags
            .filter((tag): tag is string => typeof tag === 'string')
            .map((tag) => tag.trim().toLowerCase())
            .filter((tag) => tag.length > 0);
        return [...new Set(tags)];
    }

    /**
     * Brings the raw sum under the total cap by trimming the bonus factors first,
     * so the reported total always equals the sum of the breakdown.
     */
    private trimToCap(raw: Record<ScoreFactor, number>): ScoreBreakdown {
        const breakdown = { ...raw };
        let excess = SCORE_FACTORS.reduce((total, factor) => total + breakdown[factor], 0) - this.weights.totalCap;

        for (const factor of TRIM_ORDER) {
            if (excess <= 0) break;
            const cut = Math.min(breakdown[factor], excess);
            breakdown[factor] -= cut;
            excess -= cut;
        }
        return Object.freeze(breakdown);
    }
}
