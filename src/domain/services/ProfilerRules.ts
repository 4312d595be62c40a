/**
 * Rule tables for the section profiler.
 *
 * Injected into SectionProfiler so tests and alternate presets can swap them;
 * the defaults below are frozen.
 */

import { Emotion, Pace } from '../entities/SemanticProfile';
import { SectionLabel } from '../entities/ScriptSection';
import lexicon from './lexicon.json';

export interface BaseProfile {
    readonly baseEnergy: number;
    readonly emotion: Emotion;
    readonly pace: Pace;
}

export type LabelProfileTable = Readonly<Partial<Record<SectionLabel, BaseProfile>>>;

export interface ProfilerRules {
    readonly labelProfiles: LabelProfileTable;
    /** Terms conveying surprise or breakthrough */
    readonly highEnergyTerms: readonly string[];
    /** Terms conveying steadiness or simplicity */
    readonly calmingTerms: readonly string[];
    /** Energy added (high) or removed (calming) per distinct matched term */
    readonly energyStep: number;
    /** Cap on the total adjustment in each direction */
    readonly maxAdjustment: number;
}

/** Profile for labels missing from the table */
export const NEUTRAL_PROFILE: BaseProfile = Object.freeze({ baseEnergy: 5.0, emotion: 'neutral', pace: 'medium' });

export const DEFAULT_LABEL_PROFILES = Object.freeze({
    hook: { baseEnergy: 9.0, emotion: 'excitement', pace: 'fast' },
    introduction: { baseEnergy: 6.0, emotion: 'curiosity', pace: 'medium' },
    background: { baseEnergy: 4.0, emotion: 'calm', pace: 'slow' },
    main_content: { baseEnergy: 7.0, emotion: 'focus', pace: 'medium' },
    application: { baseEnergy: 6.5, emotion: 'inspired', pace: 'medium' },
    summary: { baseEnergy: 5.0, emotion: 'satisfied', pace: 'slow' },
    call_to_action: { baseEnergy: 8.5, emotion: 'motivated', pace: 'fast' },
    custom: NEUTRAL_PROFILE,
} satisfies Record<SectionLabel, BaseProfile>);

export const DEFAULT_PROFILER_RULES: ProfilerRules = Object.freeze({
    labelProfiles: DEFAULT_LABEL_PROFILES,
    highEnergyTerms: Object.freeze([...lexicon.highEnergy]),
    calmingTerms: Object.freeze([...lexicon.calming]),
    energyStep: 0.5,
    maxAdjustment: 2.0,
});

export function lookupBaseProfile(table: LabelProfileTable, label: SectionLabel): BaseProfile {
    return table[label] ?? NEUTRAL_PROFILE;
}
