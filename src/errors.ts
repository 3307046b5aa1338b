/** User-input problem: an empty required field or a key collision. Nothing was written. */
export class ValidationError extends Error {
    constructor(message: string, readonly field?: string) {
        super(message);
        this.name = "ValidationError";
    }
}

/** The requested key is not present in its document. */
export class NotFoundError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "NotFoundError";
    }
}

/** A document could not be read, parsed or written. */
export class StoreError extends Error {
    constructor(message: string, readonly path: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "StoreError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
