import axios from 'axios';
import { Pace, isEmotion, isEnergyInRange, isPace } from '../../domain/entities/SemanticProfile';
import { ISemanticAnalysisClient, SemanticAnalysisResult } from '../../domain/ports/ISemanticAnalysisClient';

const SYSTEM_PROMPT = `You rate the delivery of short narrated video sections.
Respond with a JSON object only:
{
  "energy": number from 0 (sleepy) to 10 (explosive),
  "emotion": one of "excitement", "curiosity", "calm", "focus", "inspired", "satisfied", "motivated", "neutral",
  "pace": one of "slow", "medium", "fast",
  "keywords": up to 5 words from the text that drove the rating
}`;

/** Pace names the model tends to answer with instead of the closed vocabulary */
const PACE_ALIASES: Readonly<Record<string, Pace>> = {
    moderate: 'medium',
    varied: 'medium',
    normal: 'medium',
    quick: 'fast',
    calm: 'slow',
};

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

/**
 * Semantic analysis through an OpenAI-compatible chat completions endpoint
 * in JSON mode. Throws on any transport or format problem; callers fall back
 * to rule-based profiling.
 */
export class OpenAISemanticAnalysisClient implements ISemanticAnalysisClient {
    private readonly apiKey: string;
    private readonly model: string;
    private readonly baseUrl: string;
    private readonly timeoutMs: number;

    constructor(
        apiKey: string,
        model: string = 'gpt-4o-mini',
        baseUrl: string = 'https://api.openai.com',
        timeoutMs: number = 10000
    ) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.timeoutMs = timeoutMs;
    }

    async analyze(text: string): Promise<SemanticAnalysisResult> {
        let content: string | null | undefined;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: SYSTEM_PROMPT },
                        { role: 'user', content: text.slice(0, 1000) },
                    ],
                    temperature: 0,
                    response_format: { type: 'json_object' },
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: this.timeoutMs,
                }
            );
            content = response.data.choices?.[0]?.message?.content;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new Error(`Semantic analysis request failed: ${error.message}`);
            }
            throw error;
        }

        if (!content) {
            throw new Error('Semantic analysis returned no content');
        }
        return parseAnalysis(content);
    }
}

/**
 * Validates the model's JSON answer against the profile vocabulary.
 */
export function parseAnalysis(content: string): SemanticAnalysisResult {
    let parsed: unknown;
    try {
        parsed = JSON.parse(content);
    } catch {
        throw new Error('Semantic analysis returned invalid JSON');
    }
    if (typeof parsed !== 'object' || parsed === null) {
        throw new Error('Semantic analysis returned a non-object answer');
    }

    const energy = 'energy' in parsed ? Number(parsed.energy) : NaN;
    if (!Number.isFinite(energy)) {
        throw new Error('Semantic analysis answer has no numeric energy');
    }
    if (!isEnergyInRange(energy)) {
        throw new Error(`Semantic analysis answer has energy ${energy} outside 0-10`);
    }

    const emotion = 'emotion' in parsed && typeof parsed.emotion === 'string' ? parsed.emotion.toLowerCase() : '';
    if (!isEmotion(emotion)) {
        throw new Error(`Semantic analysis answer has unknown emotion "${emotion}"`);
    }

    const rawPace = 'pace' in parsed && typeof parsed.pace === 'string' ? parsed.pace.toLowerCase() : '';
    const pace = PACE_ALIASES[rawPace] ?? rawPace;
    if (!isPace(pace)) {
        throw new Error(`Semantic analysis answer has unknown pace "${rawPace}"`);
    }

    const keywords = 'keywords' in parsed && Array.isArray(parsed.keywords)
        ? parsed.keywords.filter((keyword): keyword is string => typeof keyword === 'string')
        : [];

    return { energy, emotion, pace, keywords };
}
