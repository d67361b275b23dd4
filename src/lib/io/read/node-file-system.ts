import { type FileHandle, open } from 'node:fs/promises';

import { resolve } from 'pathe';

import { type ReadFileSystem, ReadStream } from './file-system';

/**
 * Reads a file front to back through an open handle, which the stream owns.
 */
class NodeReadStream extends ReadStream {
    private fileHandle: FileHandle;
    private position = 0;
    private closed = false;

    constructor(fileHandle: FileHandle, size: number) {
        super(size);
        this.fileHandle = fileHandle;
    }

    async pull(target: Uint8Array): Promise<number> {
        if (this.closed) {
            return 0;
        }
        const { bytesRead } = await this.fileHandle.read(target, 0, target.length, this.position);
        this.position += bytesRead;
        return bytesRead;
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }
        this.closed = true;
        await this.fileHandle.close();
    }
}

/**
 * Local disk. Relative filenames are resolved against `baseDir`, which
 * defaults to the process working directory.
 */
class NodeReadFileSystem implements ReadFileSystem {
    readonly baseDir: string;

    constructor(baseDir: string = process.cwd()) {
        this.baseDir = baseDir;
    }

    async createStream(filename: string): Promise<ReadStream> {
        const fileHandle = await open(resolve(this.baseDir, filename), 'r');
        try {
            const { size } = await fileHandle.stat();
            return new NodeReadStream(fileHandle, size);
        } catch (err) {
            await fileHandle.close();
            throw err;
        }
    }
}

export { NodeReadFileSystem };
