export class ScanInitiationError extends Error {
    constructor(public readonly root: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'ScanInitiationError';
    }
}

/**
 * Metadata for a single path could not be read. Never aborts a scan.
 */
export class PathMetadataError extends Error {
    public readonly code: string | null;

    constructor(public readonly path: string, cause: unknown) {
        super(`Cannot read metadata: ${path} (${describeCause(cause)})`, { cause });
        this.name = 'PathMetadataError';
        this.code = errorCode(cause);
    }
}

export class InvalidWindowError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidWindowError';
    }
}

export class InspectorStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InspectorStateError';
    }
}

export function errorCode(error: unknown): string | null {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

function describeCause(cause: unknown): string {
    const code = errorCode(cause);
    if (code) {
        return code;
    }
    return cause instanceof Error ? cause.message : String(cause);
}
