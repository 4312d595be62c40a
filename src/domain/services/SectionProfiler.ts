import { ScriptSection } from '../entities/ScriptSection';
import {
    SemanticProfile,
    createSemanticProfile,
    isEmotion,
    isEnergyInRange,
    isPace,
} from '../entities/SemanticProfile';
import { ISemanticAnalysisClient, SemanticAnalysisResult } from '../ports/ISemanticAnalysisClient';
import { withTimeout } from './AsyncGuards';
import { DEFAULT_PROFILER_RULES, ProfilerRules, lookupBaseProfile } from './ProfilerRules';
import { findTerms } from './TextKeywords';

export interface SectionProfilerOptions {
    rules?: ProfilerRules;
    /** Optional external analyzer; its answer replaces the rule-based profile */
    analysisClient?: ISemanticAnalysisClient | null;
    analysisTimeoutMs?: number;
}

/**
 * Derives the semantic profile (energy, emotion, pace) of a script section.
 *
 * The rule path is a pure function of label and narration:
 * 1. Base profile from the label table (neutral for unknown labels)
 * 2. Distinct high-energy terms raise energy, calming terms lower it, each capped
 * 3. Result rounded to one decimal and clamped into [0, 10]
 *
 * When an analysis client is configured, `profileSection` asks it first and
 * falls back to the rule path on any failure.
 */
export class SectionProfiler {
    private readonly rules: ProfilerRules;
    private readonly analysisClient: ISemanticAnalysisClient | null;
    private readonly analysisTimeoutMs: number;

    constructor(options: SectionProfilerOptions = {}) {
        this.rules = options.rules ?? DEFAULT_PROFILER_RULES;
        this.analysisClient = options.analysisClient ?? null;
        this.analysisTimeoutMs = options.analysisTimeoutMs ?? 5000;
    }

    /**
     * Rule-based profile. Never fails.
     */
    profile(section: ScriptSection): SemanticProfile {
        const base = lookupBaseProfile(this.rules.labelProfiles, section.label);
        const highHits = findTerms(section.narration, this.rules.highEnergyTerms);
        const calmHits = findTerms(section.narration, this.rules.calmingTerms);

        const boost = Math.min(highHits.length * this.rules.energyStep, this.rules.maxAdjustment);
        const damping = Math.min(calmHits.length * this.rules.energyStep, this.rules.maxAdjustment);

        return createSemanticProfile({
            energy: base.baseEnergy + boost - damping,
            emotion: base.emotion,
            pace: base.pace,
            keywordHits: [...highHits, ...calmHits],
            source: 'rules',
        });
    }

    /**
     * Profile with the optional analyzer override. Never rejects.
     */
    async profileSection(section: ScriptSection): Promise<SemanticProfile> {
        const fromAnalysis = await this.tryAnalysis(section);
        return fromAnalysis ?? this.profile(section);
    }

    private async tryAnalysis(section: ScriptSection): Promise<SemanticProfile | null> {
        if (!this.analysisClient || !section.narration.trim()) {
            return null;
        }

        try {
            const result = await withTimeout(
                this.analysisClient.analyze(section.narration),
                this.analysisTimeoutMs,
                'Semantic analysis'
            );
            const profile = this.fromAnalysis(result);
            if (!profile) {
                console.warn(`[Profiler] Section ${section.index}: analysis returned an unusable result, using rules`);
            }
            return profile;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[Profiler] Section ${section.index}: analysis failed (${message}), using rules`);
            return null;
        }
    }

    private fromAnalysis(result: SemanticAnalysisResult | null | undefined): SemanticProfile | null {
        if (!result || typeof result.energy !== 'number' || !isEnergyInRange(result.energy)) {
            return null;
        }
        if (!isEmotion(result.emotion) || !isPace(result.pace)) {
            return null;
        }
        const keywords = Array.isArray(result.keywords)
            ? result.keywords.filter((keyword): keyword is string => typeof keyword === 'string')
            : [];

        return createSemanticProfile({
            energy: result.energy,
            emotion: result.emotion,
            pace: result.pace,
            keywordHits: keywords,
            source: 'analysis',
        });
    }
}
