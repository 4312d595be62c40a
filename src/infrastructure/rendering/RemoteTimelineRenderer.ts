import axios from 'axios';
import { TimelinePlan } from '../../domain/entities/TimelinePlan';
import { ITimelineRenderer, RenderResult } from '../../domain/ports/ITimelineRenderer';

interface RenderResponse {
    video_url?: string;
    url?: string;
    render_id?: string;
    output?: { video_url?: string };
    error?: string;
    message?: string;
}

/**
 * Wire format of a timeline for the render endpoint (snake_case).
 */
export function toRenderPayload(plan: TimelinePlan): Record<string, unknown> {
    return {
        total_duration_seconds: plan.totalDurationSeconds,
        clips: plan.entries.map((entry) => ({
            section_index: entry.section.index,
            label: entry.section.label,
            duration_seconds: entry.section.targetDuration,
            asset: entry.chosenAsset
                ? { id: entry.chosenAsset.id, kind: entry.chosenAsset.kind, url: entry.chosenAsset.url ?? null }
                : null,
            motion: entry.motionPlan
                ? {
                    movement: entry.motionPlan.movement,
                    start_scale: entry.motionPlan.startScale,
                    end_scale: entry.motionPlan.endScale,
                    start_offset: entry.motionPlan.startOffset,
                    end_offset: entry.motionPlan.endOffset,
                }
                : null,
        })),
        transitions: plan.transitions.map((transition) => ({
            from_index: transition.fromIndex,
            to_index: transition.toIndex,
            effect: transition.effect,
            duration_seconds: transition.durationSeconds,
            params: transition.params,
        })),
    };
}

/**
 * Sends the finished timeline to a remote rendering service.
 */
export class RemoteTimelineRenderer implements ITimelineRenderer {
    private readonly apiKey: string;
    private readonly endpointUrl: string;
    private readonly timeout: number;

    constructor(
        endpointUrl: string,
        apiKey: string = '',
        timeout: number = 600000 // rendering is slow; 10 minutes
    ) {
        if (!endpointUrl) {
            throw new Error('Render endpoint URL is required');
        }
        this.endpointUrl = endpointUrl;
        this.apiKey = apiKey;
        this.timeout = timeout;
    }

    async render(plan: TimelinePlan): Promise<RenderResult> {
        try {
            console.log(`[Renderer] Submitting timeline (${plan.entries.length} clips, ${plan.totalDurationSeconds}s)`);
            const startTime = Date.now();

            const response = await axios.post<RenderResponse>(this.endpointUrl, toRenderPayload(plan), {
                headers: {
                    ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
                    'Content-Type': 'application/json',
                },
                timeout: this.timeout,
            });

            const videoUrl = response.data.video_url || response.data.url || response.data.output?.video_url;
            if (!videoUrl) {
                throw new Error('Remote render returned no video URL');
            }

            const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
            console.log(`[Renderer] Render completed in ${elapsed}s`);

            return {
                videoUrl,
                ...(response.data.render_id ? { renderId: response.data.render_id } : {}),
            };
        } catch (error) {
            if (axios.isAxiosError<RenderResponse>(error)) {
                const message = error.response?.data?.error || error.response?.data?.message || error.message;
                console.error('[Renderer] Render failed:', error.response?.data || error.message);
                throw new Error(`Remote render failed: ${message}`);
            }
            throw error;
        }
    }
}
