/**
 * Experiment runtimes — how each language is launched, guarded and limited.
 *
 * Every hypothesis kind is materialised into one program file; the runtime
 * decides the interpreter, the preloaded network guard and the memory flag.
 */
import path from "path";
import { pathToFileURL } from "url";
import type { ExperimentLanguage, Hypothesis } from "../schemas/hypothesis.js";

/** Written to stderr by the guards whenever a connection is attempted. */
export const NETWORK_SENTINEL = "__SANDBOX_NETWORK_BLOCKED__";

/** Runtime messages that mean the experiment ran out of memory. */
export const OUT_OF_MEMORY_SENTINELS = [
    "JavaScript heap out of memory",
    "MemoryError",
] as const;

const NODE_NETWORK_GUARD = `import net from "node:net";
import dns from "node:dns";
import { writeSync } from "node:fs";

function deny(what) {
    writeSync(2, "${NETWORK_SENTINEL} " + what + "\\n");
    const err = new Error("network access is disabled in this sandbox (" + what + ")");
    err.code = "ERR_SANDBOX_NETWORK";
    throw err;
}

net.Socket.prototype.connect = function () { deny("socket.connect"); };
dns.lookup = function () { deny("dns.lookup"); };
dns.resolve = function () { deny("dns.resolve"); };
dns.promises.lookup = async function () { deny("dns.lookup"); };
dns.promises.resolve = async function () { deny("dns.resolve"); };
globalThis.fetch = async function () { deny("fetch"); };
`;

const PYTHON_GUARD = `import os
import socket
import sys

def _deny(*args, **kwargs):
    sys.stderr.write("${NETWORK_SENTINEL} socket\\n")
    sys.stderr.flush()
    raise PermissionError("network access is disabled in this sandbox")

if os.environ.get("SANDBOX_NETWORK") != "allowed":
    socket.socket.connect = _deny
    socket.socket.connect_ex = _deny
    socket.create_connection = _deny
    socket.getaddrinfo = _deny

_limit_mb = int(os.environ.get("SANDBOX_MAX_MEMORY_MB", "0"))
if _limit_mb > 0:
    try:
        import resource
        _bytes = _limit_mb * 1024 * 1024
        resource.setrlimit(resource.RLIMIT_AS, (_bytes, _bytes))
    except (ImportError, ValueError, OSError):
        pass
`;

export interface RuntimeLaunch {
    command: string;
    args: string[];
    env: Record<string, string>;
}

export interface RuntimeSpec {
    /** Program file name inside the run directory. */
    programFile: string;
    /** Support files written beside the program (relative path → content). */
    supportFiles(networkAllowed: boolean): Record<string, string>;
    launch(runDir: string, limits: { maxMemoryMb: number; networkAllowed: boolean }): RuntimeLaunch;
}

const GUARD_DIR = ".sandbox";

export const RUNTIMES: Record<ExperimentLanguage, RuntimeSpec> = {
    javascript: {
        programFile: "experiment.mjs",
        supportFiles: (networkAllowed) =>
            networkAllowed ? {} : { [path.join(GUARD_DIR, "network-guard.mjs")]: NODE_NETWORK_GUARD },
        launch: (runDir, { maxMemoryMb, networkAllowed }) => {
            const args = [`--max-old-space-size=${maxMemoryMb}`];
            if (!networkAllowed) {
                const guard = path.join(runDir, GUARD_DIR, "network-guard.mjs");
                args.push("--import", pathToFileURL(guard).href);
            }
            args.push(path.join(runDir, "experiment.mjs"));
            return { command: process.execPath, args, env: {} };
        },
    },
    python: {
        programFile: "experiment.py",
        supportFiles: () => ({ [path.join(GUARD_DIR, "sitecustomize.py")]: PYTHON_GUARD }),
        launch: (runDir, { maxMemoryMb, networkAllowed }) => ({
            command: "python3",
            args: ["-u", path.join(runDir, "experiment.py")],
            env: {
                PYTHONPATH: path.join(runDir, GUARD_DIR),
                PYTHONDONTWRITEBYTECODE: "1",
                SANDBOX_MAX_MEMORY_MB: String(maxMemoryMb),
                SANDBOX_NETWORK: networkAllowed ? "allowed" : "denied",
            },
        }),
    },
};

/**
 * Turn any hypothesis kind into the source of a single program.
 * Parameter sweeps get a `SWEEP_VALUES` constant; a JSON array of numbers
 * and strings is a valid literal in both languages.
 */
export function materializeProgram(hypothesis: Hypothesis): string {
    switch (hypothesis.kind) {
        case "code_experiment":
            return hypothesis.code;
        case "parameter_sweep": {
            const values = JSON.stringify(hypothesis.values);
            const prelude = hypothesis.language === "javascript"
                ? `const SWEEP_PARAMETER = ${JSON.stringify(hypothesis.parameter)};\nconst SWEEP_VALUES = ${values};\n`
                : `SWEEP_PARAMETER = ${JSON.stringify(hypothesis.parameter)}\nSWEEP_VALUES = ${values}\n`;
            return `${prelude}\n${hypothesis.code}`;
        }
    }
}
