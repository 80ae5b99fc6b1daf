/**
 * @parley/daemon — Error Taxonomy
 *
 * Recoverable kinds are folded into the scratchpad as observations;
 * terminal kinds end the reasoning loop (see AgentFailureReason in
 * @parley/shared).
 */

export type ToolErrorKind =
    | 'tool-not-found'
    | 'schema-validation-error'
    | 'transport-error'
    | 'remote-application-error'
    | 'tool-execution-error';

export type RecoverableErrorKind = 'format-error' | ToolErrorKind;

export interface ToolError {
    readonly kind: ToolErrorKind;
    readonly message: string;
}

export type RemoteErrorKind = 'transport-error' | 'remote-application-error';

/** Raised by the remote tool protocol client; mapped to a ToolError by the registry. */
export class RemoteToolError extends Error {
    readonly kind: RemoteErrorKind;
    readonly status?: number;
    readonly timedOut: boolean;

    constructor(
        kind: RemoteErrorKind,
        message: string,
        options: { status?: number; timedOut?: boolean; cause?: unknown } = {},
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'RemoteToolError';
        this.kind = kind;
        this.status = options.status;
        this.timedOut = options.timedOut ?? false;
    }

    toToolError(): ToolError {
        return { kind: this.kind, message: this.message };
    }
}

export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}

export function isAbortError(err: unknown): boolean {
    return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}
