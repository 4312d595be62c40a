import { TimelinePlan } from '../entities/TimelinePlan';

/**
 * RenderResult from the rendering service.
 */
export interface RenderResult {
    /** URL to the final rendered video */
    videoUrl: string;
    /** Render job ID for reference */
    renderId?: string;
}

/**
 * ITimelineRenderer - Port for the external rendering engine.
 * Implementations: RemoteTimelineRenderer
 */
export interface ITimelineRenderer {
    render(plan: TimelinePlan): Promise<RenderResult>;
}
