import { Asset } from './Asset';
import { MotionPlan } from './MotionPlan';
import { ScoredCandidate } from './ScoredCandidate';
import { ScriptSection } from './ScriptSection';
import { SemanticProfile } from './SemanticProfile';
import { TransitionDecision } from './TransitionDecision';

/**
 * How the asset of a timeline slot was obtained.
 * - scored: best candidate cleared the minimum score
 * - override: manual override map supplied the asset
 * - placeholder: nothing cleared the threshold, configured placeholder used
 * - missing: nothing cleared the threshold and no placeholder was configured
 */
export type SectionResolution = 'scored' | 'override' | 'placeholder' | 'missing';

export type DeficiencyCode = 'asset_missing' | 'override_not_found' | 'search_failed';

/**
 * Structured warning attached to a timeline slot. Accumulated, never thrown.
 */
export interface SectionDeficiency {
    readonly sectionIndex: number;
    readonly code: DeficiencyCode;
    readonly message: string;
    /** Best score seen for the section, null when there were no candidates */
    readonly bestScore?: number | null;
}

export interface TimelineEntry {
    readonly section: ScriptSection;
    readonly profile: SemanticProfile;
    readonly chosenAsset: Asset | null;
    /** Scoring result for the chosen asset; null for overrides, placeholders and gaps */
    readonly candidate: ScoredCandidate | null;
    readonly motionPlan: MotionPlan | null;
    /** Transition from the previous entry; null for the first entry */
    readonly inboundTransition: TransitionDecision | null;
    readonly resolution: SectionResolution;
    readonly deficiencies: readonly SectionDeficiency[];
}

/**
 * The ordered, fully decided sequence handed to the renderer.
 */
export interface TimelinePlan {
    readonly entries: readonly TimelineEntry[];
    readonly transitions: readonly TransitionDecision[];
    readonly deficiencies: readonly SectionDeficiency[];
    readonly totalDurationSeconds: number;
    /** True when every entry was resolved by scoring or override */
    readonly fullyResolved: boolean;
}

export function isFallbackResolution(resolution: SectionResolution): boolean {
    return resolution === 'placeholder' || resolution === 'missing';
}

export function createTimelinePlan(entries: TimelineEntry[]): TimelinePlan {
    const transitions = entries
        .map((entry) => entry.inboundTransition)
        .filter((transition): transition is TransitionDecision => transition !== null);
    const totalDuration = entries.reduce((total, entry) => total + entry.section.targetDuration, 0);

    return deepFreeze({
        entries,
        transitions,
        deficiencies: entries.flatMap((entry) => entry.deficiencies),
        totalDurationSeconds: Math.round(totalDuration * 1000) / 1000,
        fullyResolved: entries.every((entry) => !isFallbackResolution(entry.resolution)),
    });
}

/**
 * Recursively freezes a value graph. Already-frozen nodes are still walked,
 * since a shallow freeze says nothing about their children.
 */
export function deepFreeze<T>(value: T, visited: WeakSet<object> = new WeakSet()): T {
    if (value === null || typeof value !== 'object' || visited.has(value)) {
        return value;
    }
    visited.add(value);
    Object.freeze(value);
    for (const nested of Object.values(value)) {
        deepFreeze(nested, visited);
    }
    return value;
}
