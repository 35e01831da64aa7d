import { open, FileHandle } from 'node:fs/promises';

const NEWLINE = 0x0a;

export interface TailChunk {
    lines: string[];
    /** The file shrank or was replaced since the last read; reading restarted at byte 0. */
    truncated: boolean;
    /** Unread bytes remain past this chunk; read again without waiting. */
    more: boolean;
}

export interface JsonlTailOptions {
    /** Upper bound on bytes pulled from the file per read. */
    chunkSize?: number;
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;
const EMPTY = Buffer.alloc(0);

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export function splitLines(text: string): string[] {
    return text
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/**
 * Byte-offset reader over an append-only line-delimited file.
 *
 * Only whole lines are consumed: bytes after the last newline are carried
 * until a later read sees them terminated, so a record that is still being
 * written is never returned half-way. Each read pulls at most `chunkSize`
 * bytes, so a large backlog is worked through over several reads.
 */
export class JsonlTail {
    private offset = 0;
    private carry: Buffer = EMPTY;
    private inode: number | null = null;
    private readonly chunkSize: number;

    constructor(readonly path: string, options: JsonlTailOptions = {}) {
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
            throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
        }
    }

    /** Bytes consumed as complete lines. */
    get position(): number {
        return this.offset;
    }

    private get readPosition(): number {
        return this.offset + this.carry.length;
    }

    /**
     * Read the complete lines found in the next chunk of the file.
     * Returns null while the file does not exist.
     *
     * @param includePartial also take a trailing unterminated line once the end of the file is reached
     */
    async read(includePartial = false): Promise<TailChunk | null> {
        let handle: FileHandle;
        try {
            handle = await open(this.path, 'r');
        } catch (e) {
            if (isMissingFile(e)) return null;
            throw e;
        }

        try {
            const stats = await handle.stat();
            if (!stats.isFile()) {
                throw new Error(`${this.path} is not a regular file`);
            }
            let truncated = false;

            if (stats.size < this.readPosition || (this.inode !== null && stats.ino !== this.inode)) {
                this.offset = 0;
                this.carry = EMPTY;
                truncated = true;
            }
            this.inode = stats.ino;

            let data = this.carry;
            const available = stats.size - this.readPosition;
            if (available > 0) {
                const buffer = Buffer.alloc(Math.min(available, this.chunkSize));
                const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.readPosition);
                data = Buffer.concat([this.carry, buffer.subarray(0, bytesRead)]);
            }

            const more = this.offset + data.length < stats.size;
            // 0x0a never occurs inside a multi-byte UTF-8 sequence, so cutting here is safe
            const end = includePartial && !more ? data.length : data.lastIndexOf(NEWLINE) + 1;

            this.offset += end;
            this.carry = data.subarray(end);
            const lines = end === 0 ? [] : splitLines(data.subarray(0, end).toString('utf8'));
            return { lines, truncated, more };
        } finally {
            await handle.close();
        }
    }
}
