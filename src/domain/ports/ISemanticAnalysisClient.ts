import { Emotion, Pace } from '../entities/SemanticProfile';

/**
 * Result of an external semantic analysis of narration text.
 */
export interface SemanticAnalysisResult {
    /** Energy on the 0-10 scale */
    energy: number;
    emotion: Emotion;
    pace: Pace;
    /** Signal words the analyzer based its answer on */
    keywords?: string[];
}

/**
 * ISemanticAnalysisClient - Optional port overriding the rule-based profile.
 * Implementations: OpenAISemanticAnalysisClient
 */
export interface ISemanticAnalysisClient {
    analyze(text: string): Promise<SemanticAnalysisResult>;
}
