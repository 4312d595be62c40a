/**
 * Errors raised by the composition core.
 * Per-section problems are never thrown; they travel as SectionDeficiency values.
 */

export type CompositionErrorCode = 'INVALID_SCRIPT' | 'CANCELLED' | 'RENDERER_UNAVAILABLE';

export class CompositionError extends Error {
    constructor(
        public readonly code: CompositionErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'CompositionError';
    }
}

/**
 * Structural input problem detected before any section is processed.
 */
export class CompositionConfigError extends CompositionError {
    constructor(
        message: string,
        public readonly details: string[] = []
    ) {
        super('INVALID_SCRIPT', message);
        this.name = 'CompositionConfigError';
    }
}

/**
 * The run was aborted; no partial timeline is returned.
 */
export class CompositionCancelledError extends CompositionError {
    constructor(message: string = 'Composition was cancelled') {
        super('CANCELLED', message);
        this.name = 'CompositionCancelledError';
    }
}

/**
 * Rendering was requested but no renderer is configured.
 */
export class RendererUnavailableError extends CompositionError {
    constructor(message: string = 'No timeline renderer is configured') {
        super('RENDERER_UNAVAILABLE', message);
        this.name = 'RendererUnavailableError';
    }
}

/**
 * Raw script data failed validation.
 */
export class ScriptValidationError extends Error {
    constructor(
        message: string,
        public readonly details: string[] = []
    ) {
        super(message);
        this.name = 'ScriptValidationError';
    }
}
