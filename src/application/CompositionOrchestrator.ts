import { Asset, AssetKind } from '../domain/entities/Asset';
import { MotionPlan } from '../domain/entities/MotionPlan';
import { ScoredCandidate } from '../domain/entities/ScoredCandidate';
import { ScriptSection, SectionLabel } from '../domain/entities/ScriptSection';
import { SemanticProfile } from '../domain/entities/SemanticProfile';
import {
    SectionDeficiency,
    SectionResolution,
    TimelineEntry,
    TimelinePlan,
    createTimelinePlan,
} from '../domain/entities/TimelinePlan';
import { TransitionDecision } from '../domain/entities/TransitionDecision';
import { CompositionCancelledError, CompositionConfigError } from '../domain/errors/CompositionErrors';
import { IAssetPoolProvider } from '../domain/ports/IAssetPoolProvider';
import { AssetScorer, deriveSectionKeywords, preferredKindFor } from '../domain/services/AssetScorer';
import { MotionGenerator } from '../domain/services/MotionGenerator';
import { SectionProfiler } from '../domain/services/SectionProfiler';
import { TransitionResolver } from '../domain/services/TransitionResolver';

/**
 * Per-section states of a composition run.
 */
export type CompositionStage =
    | 'Idle'
    | 'Profiling'
    | 'Scoring'
    | 'AssetFound'
    | 'AssetMissing'
    | 'MotionPlanning'
    | 'TransitionResolving'
    | 'Appended';

export interface StageEvent {
    /** null for run-level stages (Idle) */
    sectionIndex: number | null;
    stage: CompositionStage;
}

export interface ComposeOptions {
    /** sectionIndex → assetId; listed sections skip scoring */
    overrides?: Readonly<Record<number, string>>;
    /** Substituted when no candidate clears the minimum score */
    placeholderAsset?: Asset | null;
    minimumScore?: number;
    /** Ranked candidates kept per section in dry-run output */
    candidateLimit?: number;
    signal?: AbortSignal;
    onStage?: (event: StageEvent) => void;
}

export interface DryRunOptions extends ComposeOptions {
    dryRun: true;
}

/**
 * Dry-run output for one section.
 */
export interface SectionCandidates {
    sectionIndex: number;
    label: SectionLabel;
    profile: SemanticProfile;
    candidates: ScoredCandidate[];
    /** Kind the section needs; null when either kind will do */
    requiredKind: AssetKind | null;
    /** Candidates of the required kind at or above the minimum score */
    qualifyingCount: number;
    /** Whether at least one candidate qualifies for selection */
    meetsThreshold: boolean;
    searchError?: string;
}

export interface OrchestratorDependencies {
    profiler: SectionProfiler;
    scorer: AssetScorer;
    transitionResolver: TransitionResolver;
    motionGenerator: MotionGenerator;
    assetProvider: IAssetPoolProvider;
    defaults?: {
        minimumScore?: number;
        candidateLimit?: number;
        placeholderAsset?: Asset | null;
    };
}

interface CandidatePool {
    assets: Asset[];
    error?: string;
}

interface ProfiledSection {
    section: ScriptSection;
    profile: SemanticProfile;
}

const DEFAULT_MINIMUM_SCORE = 30;
const DEFAULT_CANDIDATE_LIMIT = 5;

/**
 * Walks the script in index order and assembles a TimelinePlan:
 * profile → score → (found | missing) → motion → inbound transition → append.
 *
 * Candidate pools are fetched concurrently, but scoring and appending always
 * follow section order. Per-section problems are collected as deficiencies;
 * only structural input errors and cancellation are thrown.
 */
export class CompositionOrchestrator {
    private readonly profiler: SectionProfiler;
    private readonly scorer: AssetScorer;
    private readonly transitionResolver: TransitionResolver;
    private readonly motionGenerator: MotionGenerator;
    private readonly assetProvider: IAssetPoolProvider;
    private readonly minimumScore: number;
    private readonly candidateLimit: number;
    private readonly placeholderAsset: Asset | null;

    constructor(deps: OrchestratorDependencies) {
        this.profiler = deps.profiler;
        this.scorer = deps.scorer;
        this.transitionResolver = deps.transitionResolver;
        this.motionGenerator = deps.motionGenerator;
        this.assetProvider = deps.assetProvider;
        this.minimumScore = deps.defaults?.minimumScore ?? DEFAULT_MINIMUM_SCORE;
        this.candidateLimit = deps.defaults?.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT;
        this.placeholderAsset = deps.defaults?.placeholderAsset ?? null;
    }

    compose(sections: readonly ScriptSection[], options: DryRunOptions): Promise<SectionCandidates[]>;
    compose(sections: readonly ScriptSection[], options?: ComposeOptions & { dryRun?: false }): Promise<TimelinePlan>;
    async compose(
        sections: readonly ScriptSection[],
        options: ComposeOptions & { dryRun?: boolean } = {}
    ): Promise<TimelinePlan | SectionCandidates[]> {
        if (options.dryRun) {
            return this.rankCandidates(sections, options);
        }
        return this.buildTimeline(sections, options);
    }

    /**
     * Profiling + Scoring only; returns ranked candidates per section.
     */
    async rankCandidates(sections: readonly ScriptSection[], options: ComposeOptions = {}): Promise<SectionCandidates[]> {
        const ordered = validateSections(sections);
        const minimumScore = options.minimumScore ?? this.minimumScore;
        const limit = options.candidateLimit ?? this.candidateLimit;

        const profiled = await this.profileAll(ordered, options);
        const pools = await this.prefetchPools(profiled, options.signal);

        return profiled.map(({ section, profile }, position) => {
            throwIfAborted(options.signal);
            emit(options, section.index, 'Scoring');
            const pool = pools[position];
            const ranked = this.scorer.rank(profile, section, pool.assets);
            const requiredKind = preferredKindFor(profile.pace);
            const qualifyingCount = ranked.filter((candidate) => qualifies(candidate, requiredKind, minimumScore)).length;
            return {
                sectionIndex: section.index,
                label: section.label,
                profile,
                candidates: ranked.slice(0, limit),
                requiredKind,
                qualifyingCount,
                meetsThreshold: qualifyingCount > 0,
                ...(pool.error ? { searchError: pool.error } : {}),
            };
        });
    }

    /**
     * Transition decisions only, without asset resolution.
     */
    async previewTransitions(sections: readonly ScriptSection[]): Promise<TransitionDecision[]> {
        const ordered = validateSections(sections);
        const profiled = await this.profileAll(ordered, {});
        return profiled.slice(1).map((current, position) => this.resolveTransition(profiled[position], current));
    }

    private async buildTimeline(sections: readonly ScriptSection[], options: ComposeOptions): Promise<TimelinePlan> {
        const ordered = validateSections(sections);
        const minimumScore = options.minimumScore ?? this.minimumScore;
        const placeholder = options.placeholderAsset !== undefined ? options.placeholderAsset : this.placeholderAsset;
        const overrides = options.overrides ?? {};

        console.log(`[Compose] Composing ${ordered.length} sections (minimum score ${minimumScore})`);

        const profiled = await this.profileAll(ordered, options);
        const overrideAssets = await this.resolveOverrides(profiled, overrides, options.signal);
        const pools = await this.prefetchPools(
            profiled.filter(({ section }) => !overrideAssets.has(section.index)),
            options.signal
        );

        const runUsage = new Map<string, number>();
        const entries: TimelineEntry[] = [];
        let previous: ProfiledSection | null = null;
        let poolCursor = 0;

        for (const current of profiled) {
            throwIfAborted(options.signal);
            const { section, profile } = current;
            const deficiencies: SectionDeficiency[] = [];

            let chosenAsset: Asset | null = null;
            let candidate: ScoredCandidate | null = null;
            let resolution: SectionResolution;

            const overrideAsset = overrideAssets.get(section.index);
            if (overrideAsset) {
                chosenAsset = overrideAsset;
                resolution = 'override';
                emit(options, section.index, 'AssetFound');
                console.log(`[Compose] Section ${section.index}: override asset ${overrideAsset.id}`);
            } else {
                if (overrides[section.index] !== undefined) {
                    deficiencies.push({
                        sectionIndex: section.index,
                        code: 'override_not_found',
                        message: `Override asset "${overrides[section.index]}" was not found; falling back to scoring`,
                    });
                }

                emit(options, section.index, 'Scoring');
                const pool = pools[poolCursor++];
                if (pool.error) {
                    deficiencies.push({
                        sectionIndex: section.index,
                        code: 'search_failed',
                        message: `Asset search failed: ${pool.error}`,
                    });
                }

                const requiredKind = preferredKindFor(profile.pace);
                const ranked = this.scorer.rank(profile, section, pool.assets, { runUsage });
                const best = ranked.find((scored) => qualifies(scored, requiredKind, minimumScore)) ?? null;

                if (best) {
                    chosenAsset = best.asset;
                    candidate = best;
                    resolution = 'scored';
                    emit(options, section.index, 'AssetFound');
                    console.log(`[Compose] Section ${section.index}: selected ${best.asset.id} (score ${best.totalScore})`);
                } else {
                    emit(options, section.index, 'AssetMissing');
                    deficiencies.push(missingDeficiency(section.index, ranked, requiredKind, minimumScore));
                    chosenAsset = placeholder;
                    resolution = placeholder ? 'placeholder' : 'missing';
                    console.warn(`[Compose] Section ${section.index}: no suitable material${placeholder ? `, using placeholder ${placeholder.id}` : ''}`);
                }
            }

            if (chosenAsset && resolution !== 'placeholder') {
                runUsage.set(chosenAsset.id, (runUsage.get(chosenAsset.id) ?? 0) + 1);
            }

            let motionPlan: MotionPlan | null = null;
            if (chosenAsset) {
                emit(options, section.index, 'MotionPlanning');
                motionPlan = this.motionGenerator.generate(chosenAsset, profile, section);
            }

            let inboundTransition: TransitionDecision | null = null;
            if (previous) {
                emit(options, section.index, 'TransitionResolving');
                inboundTransition = this.resolveTransition(previous, current);
            }

            entries.push({
                section,
                profile,
                chosenAsset,
                candidate,
                motionPlan,
                inboundTransition,
                resolution,
                deficiencies,
            });
            emit(options, section.index, 'Appended');
            console.log(
                `[Compose] Section ${section.index} (${section.label}): energy ${profile.energy}, ` +
                `motion ${motionPlan ? this.motionGenerator.describe(motionPlan.movement) : 'none'}, ` +
                `transition ${inboundTransition ? inboundTransition.effect : 'none'}`
            );
            previous = current;
        }

        throwIfAborted(options.signal);
        emit(options, null, 'Idle');

        const plan = createTimelinePlan(entries);
        console.log(`[Compose] Timeline ready: ${plan.entries.length} entries, ${plan.deficiencies.length} deficiencies`);
        return plan;
    }

    private async profileAll(sections: ScriptSection[], options: ComposeOptions): Promise<ProfiledSection[]> {
        throwIfAborted(options.signal);
        const profiled = await Promise.all(
            sections.map(async (section) => {
                emit(options, section.index, 'Profiling');
                return { section, profile: await this.profiler.profileSection(section) };
            })
        );
        throwIfAborted(options.signal);
        return profiled;
    }

    /**
     * Fetches every section's candidate pool concurrently. Results keep input order.
     */
    private async prefetchPools(profiled: ProfiledSection[], signal?: AbortSignal): Promise<CandidatePool[]> {
        const pools = await Promise.all(profiled.map(({ section, profile }) => this.fetchPool(section, profile)));
        throwIfAborted(signal);
        return pools;
    }

    private async fetchPool(section: ScriptSection, profile: SemanticProfile): Promise<CandidatePool> {
        const terms = deriveSectionKeywords(section);
        const preferredKind = preferredKindFor(profile.pace) ?? undefined;
        try {
            return { assets: await this.assetProvider.search(terms, preferredKind) };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Compose] Section ${section.index}: asset search failed (${message})`);
            return { assets: [], error: message };
        }
    }

    private async resolveOverrides(
        profiled: ProfiledSection[],
        overrides: Readonly<Record<number, string>>,
        signal?: AbortSignal
    ): Promise<Map<number, Asset>> {
        const found = new Map<number, Asset>();
        const lookups = profiled
            .filter(({ section }) => overrides[section.index] !== undefined)
            .map(async ({ section }) => {
                const assetId = overrides[section.index];
                try {
                    const asset = await this.assetProvider.getAsset(assetId);
                    if (asset) {
                        found.set(section.index, asset);
                    }
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    console.warn(`[Compose] Section ${section.index}: override lookup for ${assetId} failed (${message})`);
                }
            });
        await Promise.all(lookups);
        throwIfAborted(signal);
        return found;
    }

    private resolveTransition(from: ProfiledSection, to: ProfiledSection): TransitionDecision {
        return this.transitionResolver.resolve(
            from.profile,
            from.section.label,
            to.profile,
            to.section.label,
            { fromIndex: from.section.index, toIndex: to.section.index }
        );
    }
}

/**
 * Rejects structurally invalid scripts before any processing starts and
 * returns the sections sorted by index.
 */
export function validateSections(sections: readonly ScriptSection[]): ScriptSection[] {
    if (!Array.isArray(sections) || sections.length === 0) {
        throw new CompositionConfigError('Script contains no sections');
    }

    const problems: string[] = [];
    const seen = new Set<number>();
    for (const [position, section] of sections.entries()) {
        if (!Number.isInteger(section.index) || section.index < 0) {
            problems.push(`section at position ${position} has invalid index ${section.index}`);
        } else if (seen.has(section.index)) {
            problems.push(`index ${section.index} is used more than once`);
        } else {
            seen.add(section.index);
        }
        if (typeof section.targetDuration !== 'number' || !(section.targetDuration > 0)) {
            problems.push(`section ${section.index} has non-positive target duration`);
        }
    }

    if (problems.length > 0) {
        throw new CompositionConfigError(`Invalid script: ${problems.join('; ')}`, problems);
    }
    return [...sections].sort((a, b) => a.index - b.index);
}

/**
 * A candidate can fill a section when it has the kind the section needs
 * and clears the minimum score.
 */
export function qualifies(candidate: ScoredCandidate, requiredKind: AssetKind | null, minimumScore: number): boolean {
    return (requiredKind === null || candidate.asset.kind === requiredKind) && candidate.totalScore >= minimumScore;
}

function missingDeficiency(
    sectionIndex: number,
    ranked: ScoredCandidate[],
    requiredKind: AssetKind | null,
    minimumScore: number
): SectionDeficiency {
    if (ranked.length === 0) {
        return { sectionIndex, code: 'asset_missing', message: 'No candidate assets were found', bestScore: null };
    }

    const bestOfKind = requiredKind === null
        ? ranked[0]
        : ranked.find((scored) => scored.asset.kind === requiredKind);
    if (!bestOfKind) {
        const top = ranked[0];
        return {
            sectionIndex,
            code: 'asset_missing',
            message: `No ${requiredKind} candidates were found; best candidate ${top.asset.id} (${top.asset.kind}) scored ${top.totalScore}`,
            bestScore: top.totalScore,
        };
    }
    return {
        sectionIndex,
        code: 'asset_missing',
        message: `Best candidate ${bestOfKind.asset.id} scored ${bestOfKind.totalScore}, below the minimum of ${minimumScore}`,
        bestScore: bestOfKind.totalScore,
    };
}

function emit(options: ComposeOptions, sectionIndex: number | null, stage: CompositionStage): void {
    options.onStage?.({ sectionIndex, stage });
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new CompositionCancelledError();
    }
}
