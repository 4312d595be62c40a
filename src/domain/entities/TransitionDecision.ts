/**
 * The visual effect bridging two adjacent sections.
 * A script of N sections always yields N-1 decisions.
 */

export const TRANSITION_EFFECTS = ['fade', 'crossfade', 'zoomIn', 'zoomOut', 'slideLeft', 'slideRight', 'none'] as const;

export type TransitionEffect = typeof TRANSITION_EFFECTS[number];

/** Which resolution rule produced the decision */
export type TransitionRule = 'pair' | 'energyDelta' | 'default';

/**
 * Renderer hints tuned to the incoming section.
 */
export interface TransitionParams {
    /** Peak scale for zoom effects */
    readonly zoomRatio?: number;
    readonly easing?: 'easeIn' | 'easeOut';
    /** Slide speed */
    readonly speed?: 'fast' | 'normal';
    readonly fadeCurve?: 'linear';
}

export interface TransitionDecision {
    readonly fromIndex: number;
    readonly toIndex: number;
    readonly effect: TransitionEffect;
    readonly durationSeconds: number;
    /** Human-readable explanation of the choice */
    readonly reason: string;
    readonly rule: TransitionRule;
    readonly params: TransitionParams;
}
