/**
 * Bounded capture of a child's output streams.
 */

export const TRUNCATION_MARKER = "[output truncated:";

/**
 * Keeps at most `capBytes` of a stream: the first half and a rolling last
 * half, so the final lines (where the result record lives) survive even
 * when the child writes far more than the cap. Both cuts land on UTF-8
 * code point boundaries.
 */
export class BoundedOutput {
    private readonly headCap: number;
    private readonly tailCap: number;
    private readonly head: Buffer[] = [];
    private headBytes = 0;
    private headFull = false;
    private tail: Buffer = Buffer.alloc(0);
    private total = 0;

    constructor(capBytes: number) {
        this.headCap = Math.ceil(capBytes / 2);
        this.tailCap = capBytes - this.headCap;
    }

    append(chunk: Buffer): void {
        this.total += chunk.length;
        let rest = chunk;

        if (!this.headFull) {
            const room = this.headCap - this.headBytes;
            if (rest.length <= room) {
                this.head.push(rest);
                this.headBytes += rest.length;
                return;
            }
            const cut = codePointCut(rest, room);
            this.head.push(rest.subarray(0, cut));
            this.headBytes += cut;
            this.headFull = true;
            rest = rest.subarray(cut);
        }

        if (this.tailCap === 0) return;
        const combined = Buffer.concat([this.tail, rest]);
        this.tail = combined.length > this.tailCap
            ? Buffer.from(combined.subarray(combined.length - this.tailCap))
            : combined;
    }

    get truncated(): boolean {
        return this.droppedBytes > 0;
    }

    get droppedBytes(): number {
        return this.total - this.headBytes - (this.tail.length - this.tailStart());
    }

    toString(): string {
        const head = Buffer.concat(this.head).toString("utf8");
        if (!this.truncated) return head + this.tail.toString("utf8");
        const tail = this.tail.subarray(this.tailStart()).toString("utf8");
        return `${head}\n${TRUNCATION_MARKER} ${this.droppedBytes} bytes omitted]\n${tail}`;
    }

    /** Skip continuation bytes left at the front of the tail by the rolling cut. */
    private tailStart(): number {
        if (this.total - this.headBytes <= this.tail.length) return 0;
        let start = 0;
        while (start < this.tail.length && isContinuationByte(this.tail[start])) start++;
        return start;
    }
}

function isContinuationByte(byte: number | undefined): boolean {
    return byte !== undefined && (byte & 0xc0) === 0x80;
}

/** Largest cut ≤ `max` that does not split a multi-byte character. */
function codePointCut(buffer: Buffer, max: number): number {
    let cut = Math.min(max, buffer.length);
    while (cut > 0 && cut < buffer.length && isContinuationByte(buffer[cut])) cut--;
    return cut;
}

/**
 * Watches a stream for sentinel strings, independently of truncation.
 * A short tail of the previous chunk is kept so a sentinel split across
 * two chunks is still found.
 */
export class SentinelScanner {
    private readonly found = new Set<string>();
    private readonly tailLength: number;
    private tail = "";

    constructor(private readonly sentinels: readonly string[]) {
        this.tailLength = Math.max(0, ...sentinels.map((s) => s.length)) - 1;
    }

    scan(chunk: Buffer): void {
        if (this.found.size === this.sentinels.length) return;
        const text = this.tail + chunk.toString("utf8");
        for (const sentinel of this.sentinels) {
            if (!this.found.has(sentinel) && text.includes(sentinel)) {
                this.found.add(sentinel);
            }
        }
        this.tail = this.tailLength > 0 ? text.slice(-this.tailLength) : "";
    }

    has(sentinel: string): boolean {
        return this.found.has(sentinel);
    }

    hasAny(sentinels: readonly string[]): boolean {
        return sentinels.some((s) => this.found.has(s));
    }
}
