/**
 * Execution Verdict — The raw, immutable outcome of one sandboxed run.
 */
import { z } from "zod/v4";

export const TerminatedReason = z.enum([
    "completed",
    "timeout",
    "memory_exceeded",
    "crashed",
    "blocked_network_access",
]);
export type TerminatedReason = z.infer<typeof TerminatedReason>;

export const ExecutionVerdict = z.object({
    hypothesis_id: z.string().min(1),
    exit_code: z.number().int().nullable(),
    signal: z.string().nullable(),
    stdout: z.string(),
    stderr: z.string(),
    stdout_truncated: z.boolean(),
    stderr_truncated: z.boolean(),
    /** Peak resident memory of the process tree; null where it cannot be observed. */
    peak_memory_mb: z.number().nonnegative().nullable(),
    wall_time_ms: z.number().nonnegative(),
    terminated_reason: TerminatedReason,
    /** True when the harness itself malfunctioned rather than the experiment. */
    sandbox_fault: z.boolean(),
    diagnostic: z.string().nullable(),
    started_at: z.string(),
});
export type ExecutionVerdict = z.infer<typeof ExecutionVerdict>;
