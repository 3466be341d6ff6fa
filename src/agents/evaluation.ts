/**
 * Evaluation Procedures — Read a completed run's result record and judge it
 * against the procedure the hypothesis declared.
 *
 * Result record protocol: the last stdout line that parses as a JSON object.
 */
import { isDeepStrictEqual } from "util";
import type { EvaluationProcedure } from "../schemas/hypothesis.js";

export type ResultRecord = Record<string, unknown>;

export type EvaluationResult =
    | {
        status: "evaluated";
        classification: "success" | "partial";
        quality: number;
        /** Short human-readable statement of what was measured. */
        observation: string;
    }
    | {
        status: "unparseable";
        reason: string;
    };

function isRecord(value: unknown): value is ResultRecord {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find the result record in a program's stdout, or null if there is none.
 */
export function parseResultRecord(stdout: string): ResultRecord | null {
    const lines = stdout.split(/\r?\n/);
    for (let i = lines.length - 1; i >= 0; i--) {
        const line = lines[i]?.trim() ?? "";
        if (!line.startsWith("{")) continue;
        try {
            const parsed: unknown = JSON.parse(line);
            if (isRecord(parsed)) return parsed;
        } catch {
            continue;
        }
    }
    return null;
}

/** Resolve a dotted key such as `stats.p95` inside the record. */
export function lookupPath(record: ResultRecord, key: string): unknown {
    let current: unknown = record;
    for (const part of key.split(".")) {
        if (!isRecord(current) || !(part in current)) return undefined;
        current = current[part];
    }
    return current;
}

function readMetric(record: ResultRecord, name: string): number | undefined {
    const metrics = record.metrics;
    const candidates = [isRecord(metrics) ? lookupPath(metrics, name) : undefined, lookupPath(record, name)];
    for (const value of candidates) {
        if (typeof value === "number" && Number.isFinite(value)) return value;
    }
    return undefined;
}

/**
 * Quality of every failure and inconclusive outcome. Positive outcomes
 * always score above it, whatever the metric's goal or sign.
 */
export const NEGATIVE_QUALITY = -1;

/**
 * Map a raw metric onto the quality scale, where higher is always better.
 * Maximised metrics keep their value when non-negative and are squashed
 * into (-1, 0) below zero. Minimised metrics become positive and shrink
 * towards 0 as the value grows.
 */
export function metricQuality(value: number, goal: "maximize" | "minimize"): number {
    if (goal === "maximize") return value >= 0 ? value : value / (1 - value);
    return value >= 0 ? 1 / (1 + value) : 1 - value;
}

export function formatNumber(value: number): string {
    return Number.isInteger(value) ? String(value) : String(Number(value.toPrecision(6)));
}

/**
 * Apply an evaluation procedure to the stdout of a completed run.
 */
export function evaluate(procedure: EvaluationProcedure, stdout: string): EvaluationResult {
    if (procedure.type === "exit_status") {
        return { status: "evaluated", classification: "success", quality: 1, observation: "completed with exit status 0" };
    }

    const record = parseResultRecord(stdout);
    if (record === null) {
        return { status: "unparseable", reason: "no JSON result record on stdout" };
    }

    switch (procedure.type) {
        case "metric": {
            const value = readMetric(record, procedure.metric);
            if (value === undefined) {
                return { status: "unparseable", reason: `metric "${procedure.metric}" missing or not a finite number` };
            }
            const quality = metricQuality(value, procedure.goal);
            const observation = `${procedure.metric} = ${formatNumber(value)} (${procedure.goal})`;
            if (procedure.threshold === undefined) {
                return { status: "evaluated", classification: "success", quality, observation };
            }
            const met = procedure.goal === "maximize" ? value >= procedure.threshold : value <= procedure.threshold;
            return {
                status: "evaluated",
                classification: met ? "success" : "partial",
                quality,
                observation: met
                    ? `${observation}, meets the ${formatNumber(procedure.threshold)} threshold`
                    : `${observation}, short of the ${formatNumber(procedure.threshold)} threshold`,
            };
        }
        case "property": {
            const actual = lookupPath(record, procedure.key);
            if (actual === undefined) {
                return { status: "unparseable", reason: `property "${procedure.key}" missing from the result record` };
            }
            const equal = isDeepStrictEqual(actual, procedure.equals);
            return {
                status: "evaluated",
                classification: equal ? "success" : "partial",
                quality: equal ? 1 : 0,
                observation: equal
                    ? `${procedure.key} = ${JSON.stringify(actual)} as expected`
                    : `${procedure.key} = ${JSON.stringify(actual)}, expected ${JSON.stringify(procedure.equals)}`,
            };
        }
    }
}
