/**
 * Composition Use Case
 *
 * Application entry point used by the HTTP layer: resolves the configured
 * placeholder, runs the orchestrator and, when asked, hands the finished
 * plan to the renderer.
 */

import { v4 as uuidv4 } from 'uuid';
import { Asset } from '../domain/entities/Asset';
import { ScriptSection } from '../domain/entities/ScriptSection';
import { TimelinePlan } from '../domain/entities/TimelinePlan';
import { RendererUnavailableError } from '../domain/errors/CompositionErrors';
import { IAssetPoolProvider } from '../domain/ports/IAssetPoolProvider';
import { ITimelineRenderer, RenderResult } from '../domain/ports/ITimelineRenderer';
import { CompositionOrchestrator } from './CompositionOrchestrator';

export interface CompositionRequest {
    sections: readonly ScriptSection[];
    overrides?: Readonly<Record<number, string>>;
    /** Send the finished plan to the renderer */
    render?: boolean;
    signal?: AbortSignal;
}

export interface CompositionResult {
    compositionId: string;
    plan: TimelinePlan;
    render?: RenderResult;
}

export interface CompositionUseCaseDeps {
    orchestrator: CompositionOrchestrator;
    assetProvider: IAssetPoolProvider;
    renderer?: ITimelineRenderer | null;
    placeholderAssetId?: string;
}

export class CompositionUseCase {
    private readonly orchestrator: CompositionOrchestrator;
    private readonly assetProvider: IAssetPoolProvider;
    private readonly renderer: ITimelineRenderer | null;
    private readonly placeholderAssetId: string;

    constructor(deps: CompositionUseCaseDeps) {
        this.orchestrator = deps.orchestrator;
        this.assetProvider = deps.assetProvider;
        this.renderer = deps.renderer ?? null;
        this.placeholderAssetId = deps.placeholderAssetId ?? '';
    }

    get canRender(): boolean {
        return this.renderer !== null;
    }

    async execute(request: CompositionRequest): Promise<CompositionResult> {
        if (request.render && !this.renderer) {
            throw new RendererUnavailableError();
        }

        const compositionId = `comp_${uuidv4().substring(0, 8)}`;
        console.log(`[Composition ${compositionId}] Starting (${request.sections.length} sections)`);

        const placeholderAsset = await this.resolvePlaceholder();
        const plan = await this.orchestrator.compose(request.sections, {
            overrides: request.overrides,
            placeholderAsset,
            signal: request.signal,
        });

        if (!plan.fullyResolved) {
            console.warn(`[Composition ${compositionId}] ${plan.deficiencies.length} deficiencies recorded`);
        }

        if (!request.render || !this.renderer) {
            return { compositionId, plan };
        }

        const render = await this.renderer.render(plan);
        console.log(`[Composition ${compositionId}] Rendered: ${render.videoUrl}`);
        return { compositionId, plan, render };
    }

    private async resolvePlaceholder(): Promise<Asset | null> {
        if (!this.placeholderAssetId) {
            return null;
        }
        const asset = await this.assetProvider.getAsset(this.placeholderAssetId);
        if (!asset) {
            console.warn(`[Composition] Placeholder asset ${this.placeholderAssetId} not found; gaps stay empty`);
        }
        return asset;
    }
}
