/**
 * Orchestration Error Taxonomy
 * Centralized codes for local rejections, invocation failures and terminal pipeline failures.
 */

export enum ErrorCode {
    // I. Dispatch Rejections (local, never end the pipeline)
    UNKNOWN_CAPABILITY = 'UnknownCapability',
    INVALID_ARGUMENTS = 'InvalidArguments',
    GATE_NOT_OPEN = 'GateNotOpen',
    ALREADY_IN_FLIGHT = 'AlreadyInFlight',

    // II. Registration
    DUPLICATE_CAPABILITY = 'DuplicateCapability',
    EXECUTOR_NOT_BOUND = 'ExecutorNotBound',
    INVALID_CATALOGUE = 'InvalidCatalogue',

    // III. Execution
    EXECUTOR_FAULT = 'ExecutorFault',

    // IV. External Jobs
    SUBMISSION_ERROR = 'SubmissionError',
    JOB_FAILED = 'JobFailed',
    JOB_TIMEOUT = 'JobTimeout',
    JOB_NOT_COMPLETE = 'JobNotComplete',
    UNKNOWN_JOB = 'UnknownJob',

    // V. Pipeline Lifecycle
    MAX_INVOCATIONS_EXCEEDED = 'MaxInvocationsExceeded',
    CANCELLED = 'Cancelled',
    INVALID_CONFIG = 'InvalidConfig',
    INTEGRITY_BREACH = 'IntegrityBreach',
}

/**
 * Codes a Dispatcher returns as a rejection rather than a failure.
 */
export type RejectionCode =
    | ErrorCode.UNKNOWN_CAPABILITY
    | ErrorCode.INVALID_ARGUMENTS
    | ErrorCode.GATE_NOT_OPEN
    | ErrorCode.ALREADY_IN_FLIGHT
    | ErrorCode.MAX_INVOCATIONS_EXCEEDED
    | ErrorCode.CANCELLED;

export type FailureCode =
    | ErrorCode.EXECUTOR_FAULT
    | ErrorCode.SUBMISSION_ERROR
    | ErrorCode.JOB_FAILED
    | ErrorCode.JOB_TIMEOUT
    | ErrorCode.CANCELLED;

export class OrchestrationError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Orchestrator:${code}] ${message}`);
        this.name = 'OrchestrationError';
    }
}

/**
 * Thrown by external adapters (scheduler transport, status reads) for faults worth retrying.
 * Anything else is treated as terminal.
 */
export class TransientError extends Error {
    constructor(message: string, public readonly underlying?: unknown) {
        super(message);
        this.name = 'TransientError';
    }
}

export function describeError(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}
