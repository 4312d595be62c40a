/**
 * Rule tables for the transition resolver.
 */

import { SectionLabel } from '../entities/ScriptSection';
import { TransitionEffect } from '../entities/TransitionDecision';

export type LabelPair = `${SectionLabel}->${SectionLabel}`;

export interface PairRule {
    readonly effect: TransitionEffect;
    readonly reason: string;
}

export type PairRuleTable = Readonly<Partial<Record<LabelPair, PairRule>>>;

export interface TransitionRules {
    /** Narrative-arc conventions; always win over computed rules */
    readonly pairRules: PairRuleTable;
    /** Fixed duration per effect, in seconds */
    readonly durations: Readonly<Record<TransitionEffect, number>>;
    /** Energy rise/fall beyond which the transition becomes a zoom or a fade */
    readonly energyDeltaThreshold: number;
    /** Duration used by the default rule */
    readonly defaultDurationSeconds: number;
}

export function pairKey(from: SectionLabel, to: SectionLabel): LabelPair {
    return `${from}->${to}`;
}

export const DEFAULT_PAIR_RULES: PairRuleTable = Object.freeze({
    'hook->introduction': { effect: 'zoomOut', reason: 'Opening hook settles into the introduction' },
    'hook->background': { effect: 'fade', reason: 'High-energy opening eases into background material' },
    'introduction->background': { effect: 'fade', reason: 'Introduction flows smoothly into background' },
    'introduction->main_content': { effect: 'slideLeft', reason: 'Introduction advances into the core content' },
    'background->main_content': { effect: 'zoomIn', reason: 'Background narrows to the key point' },
    'background->application': { effect: 'slideLeft', reason: 'Background moves forward to practice' },
    'main_content->application': { effect: 'slideLeft', reason: 'Theory advances into application' },
    'main_content->summary': { effect: 'zoomOut', reason: 'Core content pulls back for the summary' },
    'main_content->main_content': { effect: 'crossfade', reason: 'Core content continues' },
    'application->summary': { effect: 'fade', reason: 'Application winds down into the summary' },
    'application->call_to_action': { effect: 'zoomIn', reason: 'Application re-energizes for the call to action' },
    'summary->call_to_action': { effect: 'zoomIn', reason: 'Summary lifts into the call to action' },
    'summary->main_content': { effect: 'slideRight', reason: 'Summary steps back to revisit core content' },
} satisfies PairRuleTable);

export const DEFAULT_EFFECT_DURATIONS = Object.freeze({
    fade: 1.0,
    crossfade: 1.5,
    zoomIn: 0.8,
    zoomOut: 1.2,
    slideLeft: 0.6,
    slideRight: 0.6,
    none: 0,
} satisfies Record<TransitionEffect, number>);

export const DEFAULT_TRANSITION_RULES: TransitionRules = Object.freeze({
    pairRules: DEFAULT_PAIR_RULES,
    durations: DEFAULT_EFFECT_DURATIONS,
    energyDeltaThreshold: 3,
    defaultDurationSeconds: 1.0,
});
