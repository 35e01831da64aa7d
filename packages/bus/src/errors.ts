function describe(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}

export class RecordDecodeError extends Error {
    readonly seq: number;
    readonly raw: string;

    constructor(seq: number, raw: string, cause: unknown) {
        super(`record ${seq} could not be decoded: ${describe(cause)}`, { cause });
        this.name = 'RecordDecodeError';
        this.seq = seq;
        this.raw = raw;
    }
}
