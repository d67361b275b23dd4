import { type ReadFileSystem, ReadStream } from './file-system';

class MemoryReadStream extends ReadStream {
    private data: Uint8Array;
    private offset = 0;

    constructor(data: Uint8Array) {
        super(data.length);
        this.data = data;
    }

    pull(target: Uint8Array): Promise<number> {
        const n = Math.min(target.length, this.data.length - this.offset);
        target.set(this.data.subarray(this.offset, this.offset + n));
        this.offset += n;
        return Promise.resolve(n);
    }
}

/**
 * Serves named in-memory buffers, so code written against a
 * {@link ReadFileSystem} can run without touching the disk.
 */
class MemoryReadFileSystem implements ReadFileSystem {
    private files = new Map<string, Uint8Array>();

    set(filename: string, data: Uint8Array) {
        this.files.set(filename, data);
    }

    createStream(filename: string): Promise<ReadStream> {
        const data = this.files.get(filename);
        if (!data) {
            return Promise.reject(new Error(`Entry not found: ${filename}`));
        }
        return Promise.resolve(new MemoryReadStream(data));
    }
}

export { MemoryReadFileSystem };
