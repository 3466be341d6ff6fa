/**
 * Resident memory of a process tree, read from /proc.
 */
import { readFile, readdir } from "fs/promises";

const KIB_PER_MB = 1024;

async function readRssKib(pid: number): Promise<number | null> {
    try {
        const status = await readFile(`/proc/${pid}/status`, "utf8");
        const match = /^VmRSS:\s+(\d+)\s+kB/m.exec(status);
        return match ? Number(match[1]) : 0;
    } catch {
        // Process exited between listing and reading.
        return null;
    }
}

async function readChildren(pid: number): Promise<number[]> {
    let tasks: string[];
    try {
        tasks = await readdir(`/proc/${pid}/task`);
    } catch {
        return [];
    }
    const children: number[] = [];
    for (const task of tasks) {
        try {
            const raw = await readFile(`/proc/${pid}/task/${task}/children`, "utf8");
            for (const token of raw.split(/\s+/)) {
                if (token) children.push(Number(token));
            }
        } catch {
            // Thread ended while listing.
            continue;
        }
    }
    return children;
}

/**
 * Total resident set of `rootPid` and all of its descendants, in megabytes.
 * Returns null when /proc is not available or the root has already exited.
 */
export async function readProcessTreeRssMb(rootPid: number): Promise<number | null> {
    const rootRss = await readRssKib(rootPid);
    if (rootRss === null) return null;

    let totalKib = rootRss;
    const seen = new Set<number>([rootPid]);
    const queue = await readChildren(rootPid);
    while (queue.length > 0) {
        const pid = queue.shift();
        if (pid === undefined || seen.has(pid)) continue;
        seen.add(pid);
        totalKib += (await readRssKib(pid)) ?? 0;
        queue.push(...(await readChildren(pid)));
    }
    return totalKib / KIB_PER_MB;
}
