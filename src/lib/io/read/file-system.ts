/**
 * Reports how much of a file has been read.
 * @param bytesLoaded - Bytes read so far.
 * @param totalBytes - File size when the file system knows it.
 */
type ProgressCallback = (bytesLoaded: number, totalBytes: number | undefined) => void;

/**
 * Pull-based byte stream over one whole file. The consumer owns the buffer
 * and the stream fills it.
 */
abstract class ReadStream {
    /**
     * Size of the file when known up front, used to size the read buffer.
     */
    readonly expectedSize: number | undefined;

    constructor(expectedSize?: number) {
        this.expectedSize = expectedSize;
    }

    /**
     * Copy the next bytes of the file into `target`.
     * @returns Number of bytes written, 0 once the file is exhausted.
     */
    abstract pull(target: Uint8Array): Promise<number>;

    /**
     * Pull until the end of the file.
     * @param progress - Called after every pull that returned data.
     */
    async readAll(progress?: ProgressCallback): Promise<Uint8Array> {
        // one spare byte lets an exact size hint reach end of file without growing
        let buffer = new Uint8Array((this.expectedSize ?? 65536) + 1);
        let length = 0;

        for (;;) {
            if (length === buffer.length) {
                const grown = new Uint8Array(buffer.length * 2);
                grown.set(buffer);
                buffer = grown;
            }

            const n = await this.pull(buffer.subarray(length));
            if (n === 0) {
                return buffer.subarray(0, length);
            }
            length += n;
            progress?.(length, this.expectedSize);
        }
    }

    /**
     * Release whatever backs the stream.
     */
    close(): Promise<void> {
        return Promise.resolve();
    }
}

/**
 * Opens files by name.
 */
interface ReadFileSystem {
    /**
     * Open a stream over the named file. Rejects when the file cannot be opened.
     */
    createStream(filename: string): Promise<ReadStream>;
}

/**
 * Read an entire file into memory and close its stream.
 */
const readFile = async (fs: ReadFileSystem, filename: string, progress?: ProgressCallback): Promise<Uint8Array> => {
    const stream = await fs.createStream(filename);
    try {
        return await stream.readAll(progress);
    } finally {
        await stream.close();
    }
};

export { ReadStream, type ReadFileSystem, type ProgressCallback, readFile };
