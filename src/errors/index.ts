/**
 * Custom Error Classes — Loop-specific errors for deterministic error handling.
 *
 * Only GenerationUnavailable (after retries), PersistenceFailure, CorruptState
 * and ObjectiveMismatch may terminate the orchestrator. Failures inside one
 * experiment are verdicts, never exceptions.
 */

/**
 * Thrown when the reasoning backend is unreachable, times out, or returns
 * output that cannot be turned into at least one usable hypothesis.
 * The orchestrator retries with backoff before treating it as fatal.
 */
export class GenerationUnavailableError extends Error {
    public readonly reason: string;

    constructor(reason: string, options?: { cause?: unknown }) {
        super(`Hypothesis generation unavailable: ${reason}`, options);
        this.name = "GenerationUnavailableError";
        this.reason = reason;
    }
}

/**
 * Raised inside the sandbox harness when it cannot set up, spawn or observe
 * a run. `ProcessSandbox.run()` converts it into a `crashed` verdict.
 */
export class SandboxFaultError extends Error {
    public readonly hypothesisId: string;

    constructor(hypothesisId: string, reason: string, options?: { cause?: unknown }) {
        super(`Sandbox fault while running "${hypothesisId}": ${reason}`, options);
        this.name = "SandboxFaultError";
        this.hypothesisId = hypothesisId;
    }
}

/**
 * Thrown when the checkpoint or the knowledge store cannot be read or written.
 * Always fatal: stopping beats silently losing research state.
 */
export class PersistenceFailureError extends Error {
    public readonly operation: string;
    public readonly target: string;

    constructor(operation: string, target: string, options?: { cause?: unknown }) {
        const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
        super(`Persistence failure during ${operation} on "${target}"${detail}`, options);
        this.name = "PersistenceFailureError";
        this.operation = operation;
        this.target = target;
    }
}

/**
 * Thrown when a persisted checkpoint fails integrity validation.
 * Resumption is refused until the workspace is explicitly reset.
 */
export class CorruptStateError extends Error {
    public readonly path: string;
    public readonly reason: string;

    constructor(path: string, reason: string) {
        super(`Corrupt research state in "${path}": ${reason}. Run \`research-loop reset\` to start over.`);
        this.name = "CorruptStateError";
        this.path = path;
        this.reason = reason;
    }
}

/**
 * Thrown when the workspace holds a checkpoint for a different objective.
 */
export class ObjectiveMismatchError extends Error {
    public readonly expected: string;
    public readonly received: string;

    constructor(expected: string, received: string) {
        super(`Workspace is checkpointed for objective "${expected}", not "${received}". Reset the workspace or pick another one.`);
        this.name = "ObjectiveMismatchError";
        this.expected = expected;
        this.received = received;
    }
}

/**
 * Thrown when the merged configuration does not satisfy `ResearchConfig`.
 */
export class InvalidConfigError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
        this.name = "InvalidConfigError";
        this.issues = issues;
    }
}
