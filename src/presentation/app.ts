import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { CompositionOrchestrator } from '../application/CompositionOrchestrator';
import { CompositionUseCase } from '../application/CompositionUseCase';
import { MaterialCoverageService } from '../application/MaterialCoverageService';
import { IAssetPoolProvider } from '../domain/ports/IAssetPoolProvider';
import { ISemanticAnalysisClient } from '../domain/ports/ISemanticAnalysisClient';
import { ITimelineRenderer } from '../domain/ports/ITimelineRenderer';
import { AssetScorer } from '../domain/services/AssetScorer';
import { MotionGenerator } from '../domain/services/MotionGenerator';
import { SectionProfiler } from '../domain/services/SectionProfiler';
import { TransitionResolver } from '../domain/services/TransitionResolver';

// Infrastructure imports
import { LocalAssetCatalog } from '../infrastructure/assets/LocalAssetCatalog';
import { PixabayAssetClient } from '../infrastructure/assets/PixabayAssetClient';
import { CompositeAssetPoolProvider } from '../infrastructure/assets/CompositeAssetPoolProvider';
import { OpenAISemanticAnalysisClient } from '../infrastructure/analysis/OpenAISemanticAnalysisClient';
import { RemoteTimelineRenderer } from '../infrastructure/rendering/RemoteTimelineRenderer';

// Route imports
import { createCompositionRoutes } from './routes/compositionRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

export interface AppDependencies {
    orchestrator: CompositionOrchestrator;
    useCase: CompositionUseCase;
    coverageService: MaterialCoverageService;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '2mb' }));

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
            renderer: deps.useCase.canRender ? 'remote' : 'none',
        });
    });

    // Routes
    app.use('/api', createCompositionRoutes(deps));

    app.use((req: Request, _res: Response, next: NextFunction) => {
        next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): AppDependencies {
    const assetProvider = createAssetProvider(config);
    const orchestrator = new CompositionOrchestrator({
        profiler: new SectionProfiler({
            analysisClient: createAnalysisClient(config),
            analysisTimeoutMs: config.semanticAnalysisTimeoutMs,
        }),
        scorer: new AssetScorer(),
        transitionResolver: new TransitionResolver(),
        motionGenerator: new MotionGenerator(),
        assetProvider,
        defaults: {
            minimumScore: config.minAssetScore,
            candidateLimit: config.candidateLimit,
        },
    });

    const useCase = new CompositionUseCase({
        orchestrator,
        assetProvider,
        renderer: createRenderer(config),
        placeholderAssetId: config.placeholderAssetId,
    });

    return {
        orchestrator,
        useCase,
        coverageService: new MaterialCoverageService(orchestrator),
    };
}

function createAssetProvider(config: Config): IAssetPoolProvider {
    const providers: IAssetPoolProvider[] = [];
    if (config.assetCatalogPath) {
        console.log(`📚 Using local asset catalog: ${config.assetCatalogPath}`);
        providers.push(new LocalAssetCatalog(config.assetCatalogPath));
    }
    if (config.pixabayApiKey) {
        console.log('🖼️ Using Pixabay stock media');
        providers.push(new PixabayAssetClient(config.pixabayApiKey));
    }
    if (providers.length === 0) {
        throw new Error('No asset provider configured');
    }
    return providers.length === 1 ? providers[0] : new CompositeAssetPoolProvider(providers);
}

function createAnalysisClient(config: Config): ISemanticAnalysisClient | null {
    if (!config.semanticAnalysisEnabled || !config.openaiApiKey) {
        return null;
    }
    console.log(`🧠 Semantic analysis enabled (${config.openaiModel})`);
    return new OpenAISemanticAnalysisClient(config.openaiApiKey, config.openaiModel, config.openaiBaseUrl);
}

function createRenderer(config: Config): ITimelineRenderer | null {
    if (!config.renderEndpointUrl) {
        return null;
    }
    return new RemoteTimelineRenderer(config.renderEndpointUrl, config.renderApiKey);
}
