import { Router, Request, Response } from 'express';
import { ScoredCandidate } from '../../domain/entities/ScoredCandidate';
import { ScriptSection } from '../../domain/entities/ScriptSection';
import { CompositionOrchestrator } from '../../application/CompositionOrchestrator';
import { CompositionUseCase } from '../../application/CompositionUseCase';
import { MaterialCoverageService } from '../../application/MaterialCoverageService';
import { parseScript } from '../../infrastructure/script/ScriptParser';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

export interface CompositionRouteDeps {
    orchestrator: CompositionOrchestrator;
    useCase: CompositionUseCase;
    coverageService: MaterialCoverageService;
}

/**
 * Reads the script from `script` (object or array) or `sections` in the body.
 */
function readSections(body: unknown): ScriptSection[] {
    if (typeof body !== 'object' || body === null) {
        throw new BadRequestError('Request body must be a JSON object');
    }
    if ('script' in body && body.script !== undefined) {
        return parseScript(body.script);
    }
    if ('sections' in body && body.sections !== undefined) {
        return parseScript(body.sections);
    }
    throw new BadRequestError('script or sections is required');
}

function readOverrides(body: unknown): Record<number, string> | undefined {
    if (typeof body !== 'object' || body === null || !('overrides' in body) || body.overrides === undefined) {
        return undefined;
    }
    const raw = body.overrides;
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new BadRequestError('overrides must map section indices to asset ids');
    }

    const overrides: Record<number, string> = {};
    for (const [key, value] of Object.entries(raw)) {
        const index = Number(key);
        if (!Number.isInteger(index) || index < 0 || typeof value !== 'string' || !value.trim()) {
            throw new BadRequestError(`Invalid override for section "${key}"`);
        }
        overrides[index] = value.trim();
    }
    return overrides;
}

function readFlag(body: unknown, key: string): boolean {
    if (typeof body !== 'object' || body === null) {
        return false;
    }
    return Object.entries(body).some(([name, value]) => name === key && value === true);
}

function readMinimumScore(body: unknown): number | undefined {
    if (typeof body !== 'object' || body === null || !('minimumScore' in body) || body.minimumScore === undefined) {
        return undefined;
    }
    const value = body.minimumScore;
    if (typeof value !== 'number' || value < 0 || value > 100) {
        throw new BadRequestError('minimumScore must be a number between 0 and 100');
    }
    return value;
}

/**
 * Aborts the run when the client goes away before the response is written.
 */
function abortOnDisconnect(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}

function summarizeCandidate(candidate: ScoredCandidate) {
    return {
        assetId: candidate.asset.id,
        kind: candidate.asset.kind,
        totalScore: candidate.totalScore,
        breakdown: candidate.breakdown,
    };
}

/**
 * Creates composition routes with dependency injection.
 */
export function createCompositionRoutes(deps: CompositionRouteDeps): Router {
    const router = Router();

    /**
     * POST /compositions
     *
     * Composes a timeline for the script; renders it when `render` is true.
     */
    router.post(
        '/compositions',
        asyncHandler(async (req: Request, res: Response) => {
            const sections = readSections(req.body);
            const result = await deps.useCase.execute({
                sections,
                overrides: readOverrides(req.body),
                render: readFlag(req.body, 'render'),
                signal: abortOnDisconnect(res),
            });

            res.json({
                compositionId: result.compositionId,
                fullyResolved: result.plan.fullyResolved,
                totalDurationSeconds: result.plan.totalDurationSeconds,
                deficiencies: result.plan.deficiencies,
                plan: result.plan,
                ...(result.render ? { render: result.render } : {}),
            });
        })
    );

    /**
     * POST /compositions/preview
     *
     * Dry run: ranked candidates per section, nothing is selected.
     */
    router.post(
        '/compositions/preview',
        asyncHandler(async (req: Request, res: Response) => {
            const sections = readSections(req.body);
            const ranked = await deps.orchestrator.compose(sections, {
                dryRun: true,
                minimumScore: readMinimumScore(req.body),
                signal: abortOnDisconnect(res),
            });

            res.json({
                sections: ranked.map((entry) => ({
                    sectionIndex: entry.sectionIndex,
                    label: entry.label,
                    profile: entry.profile,
                    requiredKind: entry.requiredKind,
                    meetsThreshold: entry.meetsThreshold,
                    candidates: entry.candidates.map(summarizeCandidate),
                    ...(entry.searchError ? { searchError: entry.searchError } : {}),
                })),
            });
        })
    );

    /**
     * POST /compositions/coverage
     *
     * How well the asset pool covers the script.
     */
    router.post(
        '/compositions/coverage',
        asyncHandler(async (req: Request, res: Response) => {
            const sections = readSections(req.body);
            const report = await deps.coverageService.analyzeCoverage(sections, {
                minimumScore: readMinimumScore(req.body),
                signal: abortOnDisconnect(res),
            });
            res.json(report);
        })
    );

    /**
     * POST /transitions/preview
     *
     * Transition decisions between consecutive sections.
     */
    router.post(
        '/transitions/preview',
        asyncHandler(async (req: Request, res: Response) => {
            const sections = readSections(req.body);
            const transitions = await deps.orchestrator.previewTransitions(sections);
            res.json({ transitions });
        })
    );

    return router;
}
