import { SectionLabel, isSectionLabel } from '../entities/ScriptSection';
import { SemanticProfile } from '../entities/SemanticProfile';
import {
    TransitionDecision,
    TransitionEffect,
    TransitionParams,
    TransitionRule,
} from '../entities/TransitionDecision';
import { DEFAULT_TRANSITION_RULES, TransitionRules, pairKey } from './TransitionRules';

export interface TransitionIndices {
    fromIndex: number;
    toIndex: number;
}

/**
 * Picks the transition between two adjacent sections.
 *
 * First match wins:
 * 1. Explicit (fromLabel, toLabel) pair rule
 * 2. Energy delta: above +threshold zoomIn, below -threshold fade, otherwise crossfade
 * 3. Default crossfade, reached only for labels outside the vocabulary
 *
 * Pure: the same inputs always give the same decision.
 */
export class TransitionResolver {
    constructor(private readonly rules: TransitionRules = DEFAULT_TRANSITION_RULES) { }

    resolve(
        fromProfile: SemanticProfile,
        fromLabel: SectionLabel,
        toProfile: SemanticProfile,
        toLabel: SectionLabel,
        indices: TransitionIndices = { fromIndex: 0, toIndex: 1 }
    ): TransitionDecision {
        const pairRule = this.rules.pairRules[pairKey(fromLabel, toLabel)];
        if (pairRule) {
            return this.decide(indices, pairRule.effect, 'pair', pairRule.reason, toProfile);
        }

        const delta = toProfile.energy - fromProfile.energy;
        if (!isSectionLabel(fromLabel) || !isSectionLabel(toLabel) || !Number.isFinite(delta)) {
            return this.decide(
                indices,
                'crossfade',
                'default',
                'No rule applies, using the default crossfade',
                toProfile,
                this.rules.defaultDurationSeconds
            );
        }

        const threshold = this.rules.energyDeltaThreshold;
        const shift = Math.abs(delta).toFixed(1);
        if (delta > threshold) {
            return this.decide(indices, 'zoomIn', 'energyDelta', `Energy rises by ${shift}, zoom in to emphasize rising intensity`, toProfile);
        }
        if (delta < -threshold) {
            return this.decide(indices, 'fade', 'energyDelta', `Energy drops by ${shift}, fade to settle down`, toProfile);
        }
        return this.decide(indices, 'crossfade', 'energyDelta', `Energy shifts by ${shift}, crossfade for continuity`, toProfile);
    }

    private decide(
        indices: TransitionIndices,
        effect: TransitionEffect,
        rule: TransitionRule,
        reason: string,
        toProfile: SemanticProfile,
        durationSeconds: number = this.rules.durations[effect]
    ): TransitionDecision {
        return Object.freeze({
            fromIndex: indices.fromIndex,
            toIndex: indices.toIndex,
            effect,
            durationSeconds,
            reason,
            rule,
            params: Object.freeze(this.paramsFor(effect, toProfile)),
        });
    }

    /**
     * Renderer hints: zoom depth grows with the incoming energy (1.0-1.5).
     */
    private paramsFor(effect: TransitionEffect, toProfile: SemanticProfile): TransitionParams {
        switch (effect) {
            case 'zoomIn':
            case 'zoomOut':
                return {
                    zoomRatio: Math.round((1 + toProfile.energy / 20) * 100) / 100,
                    easing: effect === 'zoomIn' ? 'easeIn' : 'easeOut',
                };
            case 'slideLeft':
            case 'slideRight':
                return { speed: toProfile.pace === 'fast' ? 'fast' : 'normal' };
            case 'fade':
            case 'crossfade':
                return { fadeCurve: 'linear' };
            case 'none':
                return {};
        }
    }
}
