import { decodeElement, skipElement } from './decode';
import { type ElementTable } from './element-table';
import { PlyError } from './errors';
import { parseHeader } from './header';
import { type PlyHeader } from './types';

/**
 * Parsing engine over an in-memory PLY file.
 *
 * The header is parsed up front. Element records are decoded on demand and
 * strictly in file order: the start of element `i + 1` is only known once
 * element `i` has been loaded or skipped.
 */
class PlyFile {
    readonly header: PlyHeader;

    private data: Uint8Array;

    // byte offset of each element's records, filled in as elements are walked
    private starts: (number | undefined)[];

    /**
     * @param data - Complete file contents.
     * @throws PlyHeaderError if the header is malformed.
     */
    constructor(data: Uint8Array) {
        this.header = parseHeader(data);
        this.data = data;
        this.starts = new Array(this.header.elements.length + 1);
        this.starts[0] = this.header.dataOffset;
    }

    get numElements() {
        return this.header.elements.length;
    }

    private startOf(index: number): number {
        const start = this.starts[index];
        if (start === undefined) {
            throw new PlyError(`element ${index} has not been reached`);
        }
        return start;
    }

    /**
     * Decode the records of element `index`.
     * @throws PlyDataError if the records are truncated or malformed.
     */
    load(index: number): ElementTable {
        const element = this.header.elements[index];
        const { table, end } = decodeElement(this.data, this.startOf(index), element, this.header.format);
        this.starts[index + 1] = end;
        return table;
    }

    /**
     * Move past the records of element `index` without decoding them.
     * @throws PlyDataError if the records are truncated or malformed.
     */
    skip(index: number) {
        if (this.starts[index + 1] !== undefined) {
            return;
        }
        const element = this.header.elements[index];
        this.starts[index + 1] = skipElement(this.data, this.startOf(index), element, this.header.format);
    }

    /**
     * Drop the file contents. Any later load or skip fails.
     */
    close() {
        this.data = new Uint8Array(0);
        this.starts.fill(undefined);
    }
}

export { PlyFile };
