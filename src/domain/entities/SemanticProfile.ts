/**
 * Derived energy/emotion/pace descriptor of a script section.
 * Recomputed on every run; never persisted on its own.
 */

export const EMOTIONS = [
    'excitement',
    'curiosity',
    'calm',
    'focus',
    'inspired',
    'satisfied',
    'motivated',
    'neutral',
] as const;

export type Emotion = typeof EMOTIONS[number];

export const PACES = ['slow', 'medium', 'fast'] as const;

export type Pace = typeof PACES[number];

export type VisualIntensity = 'low' | 'medium' | 'high';

/** Where the profile came from: the rule tables or the external analyzer */
export type ProfileSource = 'rules' | 'analysis';

export const MIN_ENERGY = 0;
export const MAX_ENERGY = 10;

export interface SemanticProfile {
    /** Energy level in [0, 10] */
    readonly energy: number;
    readonly emotion: Emotion;
    readonly pace: Pace;
    /** Lexical signals that moved the energy, in match order */
    readonly keywordHits: readonly string[];
    readonly visualIntensity: VisualIntensity;
    readonly source: ProfileSource;
}

export function isEmotion(value: unknown): value is Emotion {
    return typeof value === 'string' && (EMOTIONS as readonly string[]).includes(value);
}

export function isPace(value: unknown): value is Pace {
    return typeof value === 'string' && (PACES as readonly string[]).includes(value);
}

export function isEnergyInRange(value: number): boolean {
    return Number.isFinite(value) && value >= MIN_ENERGY && value <= MAX_ENERGY;
}

/**
 * Rounds to one decimal and clamps into [0, 10]. Non-finite input becomes 0.
 */
export function clampEnergy(value: number): number {
    if (!Number.isFinite(value)) {
        return MIN_ENERGY;
    }
    const rounded = Math.round(value * 10) / 10;
    return Math.min(MAX_ENERGY, Math.max(MIN_ENERGY, rounded));
}

export function mapEnergyToIntensity(energy: number): VisualIntensity {
    if (energy >= 7.5) {
        return 'high';
    }
    if (energy >= 5.0) {
        return 'medium';
    }
    return 'low';
}

export function createSemanticProfile(params: {
    energy: number;
    emotion: Emotion;
    pace: Pace;
    keywordHits?: readonly string[];
    source?: ProfileSource;
}): SemanticProfile {
    const energy = clampEnergy(params.energy);
    return Object.freeze({
        energy,
        emotion: params.emotion,
        pace: params.pace,
        keywordHits: Object.freeze([...new Set(params.keywordHits ?? [])]),
        visualIntensity: mapEnergyToIntensity(energy),
        source: params.source ?? 'rules',
    });
}
