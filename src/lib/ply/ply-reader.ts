import { type ElementTable } from './element-table';
import { PlyError } from './errors';
import {
    ExtractionError,
    extractLayout,
    extractPacked,
    extractStrided,
    retrievePacked,
    type ExtractionBuffer
} from './extract';
import { PlyFile } from './ply-file';
import { type RecordLayout } from './record-layout';
import {
    type PlyElement,
    type PlyElementType,
    type PlyFormat,
    type PlyProperty,
    type PlyPropertyType,
    type TypedArray
} from './types';
import { readFile, NodeReadFileSystem, type ReadFileSystem } from '../io/read';
import { logger } from '../utils/logger';

/**
 * A property resolved against one element.
 *
 * The index remembers the element descriptor it was resolved against and is
 * rejected by extraction calls made on any other element.
 */
type PropertyIndex = {
    /** Element the index was resolved against. */
    readonly element: PlyElement;
    /** Position of the property within the element. */
    readonly index: number;
    /** The resolved property. */
    readonly property: PlyProperty;
};

const TEXCOORD_NAMES: readonly (readonly [string, string])[] = [
    ['u', 'v'],
    ['s', 't'],
    ['texture_u', 'texture_v'],
    ['texture_s', 'texture_t']
];

/**
 * Read session over a PLY file.
 *
 * The session walks elements in file order. For each element the caller may
 * load its records, resolve property names to indices and copy columns into
 * memory it owns, either as packed records of one scalar type or at a caller
 * chosen byte offset and stride.
 *
 * Failures never throw. Operations report them by returning `false` or `null`
 * and log the reason through {@link logger}.
 *
 * @example
 * ```ts
 * const reader = await PlyReader.open('scene.ply');
 * while (reader.hasElement()) {
 *     if (reader.elementIs('vertex') && reader.loadElement()) {
 *         const pos = reader.findPropertyIndices(['x', 'y', 'z']);
 *         const positions = new Float32Array(reader.numRows() * 3);
 *         if (pos && reader.extractProperties(pos, 'float32', positions)) {
 *             // positions is ready for upload
 *         }
 *     }
 *     reader.nextElement();
 * }
 * reader.close();
 * ```
 */
class PlyReader {
    private file: PlyFile | null;

    // position of the current element, equals the element count once exhausted
    private current = 0;

    // storage of the current element, null until loaded
    private table: ElementTable | null = null;

    private constructor(file: PlyFile | null) {
        this.file = file;
    }

    /**
     * Open a PLY file and parse its header.
     *
     * Never rejects. If the file cannot be read or its header is malformed the
     * returned session is invalid and every operation on it is a no-op.
     *
     * @param filename - Path of the file to read.
     * @param fileSystem - File system to read through. Defaults to the local disk.
     * @returns The read session, positioned on the first element.
     */
    static async open(filename: string, fileSystem: ReadFileSystem = new NodeReadFileSystem()): Promise<PlyReader> {
        let data: Uint8Array;
        try {
            data = await readFile(fileSystem, filename);
        } catch (err) {
            logger.error(`PlyReader: failed to read '${filename}': ${err instanceof Error ? err.message : String(err)}`);
            return new PlyReader(null);
        }

        const reader = PlyReader.fromBytes(data);
        if (reader.valid()) {
            logger.debug(`PlyReader: opened '${filename}' (${reader.numElements()} elements)`);
        }
        return reader;
    }

    /**
     * Open a PLY file that is already in memory.
     *
     * @param data - Complete file contents. The session reads from this buffer
     * until it is closed, so it must not be modified meanwhile.
     * @returns The read session. Invalid if the header is malformed.
     */
    static fromBytes(data: Uint8Array): PlyReader {
        try {
            return new PlyReader(new PlyFile(data));
        } catch (err) {
            if (!(err instanceof PlyError)) {
                throw err;
            }
            logger.error(`PlyReader: ${err.message}`);
            return new PlyReader(null);
        }
    }

    /**
     * Release the file contents and any loaded element. The session is
     * invalid afterwards.
     */
    close() {
        this.file?.close();
        this.file = null;
        this.table = null;
    }

    /**
     * Whether the header was parsed and the session has not been closed or
     * invalidated by a truncated file.
     */
    valid(): boolean {
        return this.file !== null;
    }

    // header

    /** Encoding of the data section, or null when invalid. */
    format(): PlyFormat | null {
        return this.file?.header.format ?? null;
    }

    /** Comment lines of the header, without the `comment` keyword. */
    comments(): readonly string[] {
        return this.file?.header.comments ?? [];
    }

    /** `obj_info` lines of the header, without the keyword. */
    objInfo(): readonly string[] {
        return this.file?.header.objInfo ?? [];
    }

    /** Number of elements declared in the header. */
    numElements(): number {
        return this.file?.numElements ?? 0;
    }

    /** Descriptor of element `index`, or null if out of range. */
    getElement(index: number): PlyElement | null {
        return this.file?.header.elements[index] ?? null;
    }

    /** Position of the first element named `name`, or null if absent. */
    findElement(name: string): number | null {
        const index = this.file?.header.elements.findIndex(e => e.name === name) ?? -1;
        return index === -1 ? null : index;
    }

    // element iteration

    /**
     * Whether the session is positioned on an element.
     */
    hasElement(): boolean {
        return this.file !== null && this.current < this.file.numElements;
    }

    /**
     * Advance to the next element, discarding the current element's storage.
     * A no-op once all elements have been visited. If the current element's
     * records cannot be walked to find where the next element starts, the
     * session becomes invalid.
     */
    nextElement() {
        const file = this.file;
        if (!file || !this.hasElement()) {
            return;
        }

        this.table = null;
        try {
            // the last element's extent is never needed
            if (this.current + 1 < file.numElements) {
                file.skip(this.current);
            }
        } catch (err) {
            if (!(err instanceof PlyError)) {
                throw err;
            }
            logger.error(`PlyReader: cannot advance past element: ${err.message}`);
            this.close();
            return;
        }
        this.current++;
    }

    /**
     * Descriptor of the current element, or null when there is none.
     */
    element(): PlyElement | null {
        return this.hasElement() ? this.getElement(this.current) : null;
    }

    /**
     * Whether the current element is named exactly `name`.
     */
    elementIs(name: string): boolean {
        return this.element()?.name === name;
    }

    /**
     * Whether the current element is the well-known element `type`.
     */
    currentElementIs(type: PlyElementType): boolean {
        return this.elementIs(type);
    }

    /**
     * Decode the current element's records. Loading an element that is
     * already loaded does nothing.
     *
     * @returns Whether the element's storage is available. On failure the
     * session stays on the same element, which remains not loaded.
     */
    loadElement(): boolean {
        const file = this.file;
        if (!file || !this.hasElement()) {
            return false;
        }
        if (this.table) {
            return true;
        }

        try {
            this.table = file.load(this.current);
        } catch (err) {
            if (!(err instanceof PlyError)) {
                throw err;
            }
            logger.error(`PlyReader: failed to load element: ${err.message}`);
            return false;
        }

        logger.debug(`PlyReader: loaded element '${this.table.element.name}' (${this.table.numRows} rows)`);
        return true;
    }

    /**
     * Whether the current element's storage has been loaded.
     */
    isLoaded(): boolean {
        return this.table !== null;
    }

    /**
     * Number of rows in the current element, 0 when there is none.
     */
    numRows(): number {
        return this.element()?.count ?? 0;
    }

    // property resolution

    /**
     * Resolve a property of the current element by exact name.
     *
     * @param name - Property name as written in the header.
     * @returns The resolved index, or null if the current element has no such property.
     */
    findPropertyIndex(name: string): PropertyIndex | null {
        const element = this.element();
        if (!element) {
            return null;
        }

        const index = element.properties.findIndex(p => p.name === name);
        if (index === -1) {
            logger.warn(`PlyReader: did not find property '${name}' in element '${element.name}'`);
            return null;
        }

        return { element, index, property: element.properties[index] };
    }

    /**
     * Resolve several properties of the current element.
     *
     * @param names - Property names in output field order.
     * @returns Indices in the same order as `names`, or null if any name is missing.
     */
    findPropertyIndices(names: readonly string[]): PropertyIndex[] | null {
        const result: PropertyIndex[] = [];
        for (const name of names) {
            const index = this.findPropertyIndex(name);
            if (!index) {
                return null;
            }
            result.push(index);
        }
        return result;
    }

    /** Resolve `x`, `y`, `z`. */
    findPos(): PropertyIndex[] | null {
        return this.findPropertyIndices(['x', 'y', 'z']);
    }

    /** Resolve `nx`, `ny`, `nz`. */
    findNormal(): PropertyIndex[] | null {
        return this.findPropertyIndices(['nx', 'ny', 'nz']);
    }

    /** Resolve `red`, `green`, `blue`. */
    findColor(): PropertyIndex[] | null {
        return this.findPropertyIndices(['red', 'green', 'blue']);
    }

    /**
     * Resolve a texture coordinate pair, trying the common spellings in turn:
     * `u v`, `s t`, `texture_u texture_v`, `texture_s texture_t`.
     */
    findTexcoord(): PropertyIndex[] | null {
        const element = this.element();
        if (!element) {
            return null;
        }
        const names = TEXCOORD_NAMES.find(pair => pair.every(n => element.properties.some(p => p.name === n)));
        return names ? this.findPropertyIndices(names) : null;
    }

    // extraction

    /**
     * Copy the current element's rows into a packed record array.
     *
     * Field `i` of record `r` is written to `dest[r * indices.length + i]`.
     * `dest` must be a typed array of `type` holding at least
     * `numRows() * indices.length` values.
     *
     * @param indices - Properties in output field order, resolved on the current element.
     * @param type - Scalar type to write. Values are converted from their storage type.
     * @param dest - Destination array.
     * @returns Whether the copy completed. Nothing is written on failure.
     */
    extractProperties(indices: readonly PropertyIndex[], type: PlyPropertyType, dest: TypedArray): boolean {
        return this.extract('extractProperties', (table) => {
            extractPacked(table, this.columnsOf(table, indices), type, dest);
            return true;
        }) ?? false;
    }

    /**
     * Copy the current element's rows into records at a fixed byte pitch.
     *
     * Field `i` of row `r` is written at byte `offset + r * stride + i * size`,
     * where `size` is the byte size of `type`, in platform byte order. Separate
     * calls with different types and offsets can fill different fields of the
     * same record array.
     *
     * @param indices - Properties in output field order, resolved on the current element.
     * @param type - Scalar type to write.
     * @param offset - Bytes to skip at the start of each record.
     * @param stride - Bytes between the starts of consecutive records.
     * @param dest - Destination memory.
     * @returns Whether the copy completed. Nothing is written on failure.
     */
    extractPropertiesWithStride(
        indices: readonly PropertyIndex[],
        type: PlyPropertyType,
        offset: number,
        stride: number,
        dest: ExtractionBuffer
    ): boolean {
        return this.extract('extractPropertiesWithStride', (table) => {
            extractStrided(table, this.columnsOf(table, indices), type, offset, stride, dest);
            return true;
        }) ?? false;
    }

    /**
     * Copy the current element's rows into a newly allocated packed array.
     *
     * @returns An array of `numRows() * indices.length` values of `type`, or null on failure.
     */
    retrieveProperties(indices: readonly PropertyIndex[], type: PlyPropertyType): TypedArray | null {
        return this.extract('retrieveProperties', (table) => {
            return retrievePacked(table, this.columnsOf(table, indices), type);
        });
    }

    /**
     * Fill an array of fixed-layout records. Every layout field names the
     * property it is read from, and all of them must exist on the current
     * element.
     *
     * @param layout - Record layout, see {@link buildRecordLayout}.
     * @param dest - Destination with room for `numRows() * layout.stride` bytes.
     * @returns Whether the copy completed. Nothing is written on failure.
     */
    extractRecords(layout: RecordLayout, dest: ExtractionBuffer): boolean {
        const indices = this.findPropertyIndices(layout.fields.map(f => f.name));
        if (!indices) {
            return false;
        }
        return this.extract('extractRecords', (table) => {
            extractLayout(table, this.columnsOf(table, indices), layout, dest);
            return true;
        }) ?? false;
    }

    private columnsOf(table: ElementTable, indices: readonly PropertyIndex[]): number[] {
        return indices.map((index) => {
            if (index.element !== table.element) {
                throw new ExtractionError(`property '${index.property.name}' was resolved against element '${index.element.name}', not the current element '${table.element.name}'`);
            }
            return index.index;
        });
    }

    private extract<T>(operation: string, copy: (table: ElementTable) => T): T | null {
        const table = this.table;
        if (!table) {
            logger.error(`PlyReader: ${operation} failed: ${this.hasElement() ? 'element is not loaded' : 'no current element'}`);
            return null;
        }

        try {
            return copy(table);
        } catch (err) {
            if (!(err instanceof PlyError)) {
                throw err;
            }
            logger.error(`PlyReader: ${operation} failed: ${err.message}`);
            return null;
        }
    }
}

export { PlyReader };
export type { PropertyIndex };
