import { Column, ElementTable } from './element-table';
import { PlyDataError } from './errors';
import {
    getArrayType,
    getTypeSize,
    isIntegerType,
    type PlyElement,
    type PlyFormat,
    type PlyPropertyType,
    type TypedArray
} from './types';

// Returns a function that reads a value from a DataView at the given byte offset
type ValueReader = (view: DataView, offset: number) => number;

const getReader = (type: PlyPropertyType, littleEndian: boolean): ValueReader => {
    switch (type) {
        case 'int8':    return (v, o) => v.getInt8(o);
        case 'uint8':   return (v, o) => v.getUint8(o);
        case 'int16':   return (v, o) => v.getInt16(o, littleEndian);
        case 'uint16':  return (v, o) => v.getUint16(o, littleEndian);
        case 'int32':   return (v, o) => v.getInt32(o, littleEndian);
        case 'uint32':  return (v, o) => v.getUint32(o, littleEndian);
        case 'float32': return (v, o) => v.getFloat32(o, littleEndian);
        case 'float64': return (v, o) => v.getFloat64(o, littleEndian);
    }
};

/**
 * Byte size of one record when the element has no list properties, otherwise null.
 */
const getFixedRowSize = (element: PlyElement): number | null => {
    let size = 0;
    for (const property of element.properties) {
        if (property.list) {
            return null;
        }
        size += getTypeSize(property.type);
    }
    return size;
};

/**
 * Smallest number of bytes a record can occupy: every scalar and list count
 * at its binary size, or one byte per token in ASCII.
 */
const getMinRowSize = (element: PlyElement, format: PlyFormat): number => {
    if (format === 'ascii') {
        return element.properties.length;
    }
    let size = 0;
    for (const property of element.properties) {
        size += getTypeSize(property.list ? property.list.countType : property.type);
    }
    return size;
};

// rejects a declared row count the remaining data cannot hold
const checkRowCount = (data: Uint8Array, offset: number, element: PlyElement, format: PlyFormat) => {
    const minRowSize = getMinRowSize(element, format);
    const available = data.length - offset;
    if (element.count * minRowSize > available) {
        throw new PlyDataError('unexpected end of file', element.name, Math.floor(available / minRowSize));
    }
};

const createStorage = (element: PlyElement): (TypedArray | null)[] => {
    return element.properties.map((property) => {
        return property.list ? null : new (getArrayType(property.type))(element.count);
    });
};

// binary

type BinaryColumnInfo = {
    storage: TypedArray | null;
    size: number;
    reader: ValueReader;
    count?: {
        size: number;
        reader: ValueReader;
    };
};

/**
 * Walk the binary records of an element, storing scalar values when `storage` is given.
 * @returns Byte offset just past the element's last record.
 */
const walkBinary = (
    data: Uint8Array,
    offset: number,
    element: PlyElement,
    littleEndian: boolean,
    storage: (TypedArray | null)[] | null
): number => {
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const numRows = element.count;

    const fixedRowSize = getFixedRowSize(element);
    if (fixedRowSize !== null && !storage) {
        return offset + numRows * fixedRowSize;
    }

    const columnInfo: BinaryColumnInfo[] = element.properties.map((property, idx) => {
        return {
            storage: storage ? storage[idx] : null,
            size: getTypeSize(property.type),
            reader: getReader(property.type, littleEndian),
            count: property.list && {
                size: getTypeSize(property.list.countType),
                reader: getReader(property.list.countType, littleEndian)
            }
        };
    });

    let pos = offset;
    for (let r = 0; r < numRows; ++r) {
        for (let p = 0; p < columnInfo.length; ++p) {
            const info = columnInfo[p];

            if (info.count) {
                if (pos + info.count.size > data.length) {
                    throw new PlyDataError('unexpected end of file', element.name, r);
                }
                const length = info.count.reader(view, pos);
                if (length < 0) {
                    throw new PlyDataError(`negative list length ${length}`, element.name, r);
                }
                pos += info.count.size + length * info.size;
                if (pos > data.length) {
                    throw new PlyDataError('unexpected end of file', element.name, r);
                }
                continue;
            }

            if (pos + info.size > data.length) {
                throw new PlyDataError('unexpected end of file', element.name, r);
            }
            if (info.storage) {
                info.storage[r] = info.reader(view, pos);
            }
            pos += info.size;
        }
    }

    return pos;
};

// ascii

const isWhitespace = (c: number) => c === 32 || c === 9 || c === 10 || c === 13;

// longest accepted value token, in bytes
const MAX_TOKEN_LENGTH = 1024;

const tokenDecoder = new TextDecoder('ascii');

const INTEGER_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_LITERAL = /^([+-]?)inf(inity)?$/i;
const NAN_LITERAL = /^[+-]?nan$/i;

/**
 * Whitespace separated token reader over the ASCII data section. Rows are not
 * required to be one per line. Tokens are returned as views into the data.
 */
class AsciiTokenizer {
    private data: Uint8Array;
    position: number;

    constructor(data: Uint8Array, position: number) {
        this.data = data;
        this.position = position;
    }

    next(): Uint8Array | null {
        const data = this.data;
        let pos = this.position;

        while (pos < data.length && isWhitespace(data[pos])) pos++;
        if (pos === data.length) {
            this.position = pos;
            return null;
        }

        const start = pos;
        while (pos < data.length && !isWhitespace(data[pos])) pos++;
        this.position = pos;

        return data.subarray(start, pos);
    }
}

const parseAsciiValue = (token: string, type: PlyPropertyType): number | null => {
    if (isIntegerType(type)) {
        return INTEGER_LITERAL.test(token) ? parseInt(token, 10) : null;
    }
    if (FLOAT_LITERAL.test(token)) {
        return Number(token);
    }
    const inf = INFINITY_LITERAL.exec(token);
    if (inf) {
        return inf[1] === '-' ? -Infinity : Infinity;
    }
    return NAN_LITERAL.test(token) ? NaN : null;
};

/**
 * Walk the ASCII records of an element, storing scalar values when `storage` is given.
 * @returns Byte offset just past the element's last token.
 */
const walkAscii = (
    data: Uint8Array,
    offset: number,
    element: PlyElement,
    storage: (TypedArray | null)[] | null
): number => {
    const tokenizer = new AsciiTokenizer(data, offset);
    const properties = element.properties;

    const read = (type: PlyPropertyType, row: number): number => {
        const bytes = tokenizer.next();
        if (bytes === null) {
            throw new PlyDataError('unexpected end of file', element.name, row);
        }
        if (bytes.length > MAX_TOKEN_LENGTH) {
            throw new PlyDataError(`value of ${bytes.length} bytes exceeds the ${MAX_TOKEN_LENGTH} byte limit`, element.name, row);
        }
        const token = tokenDecoder.decode(bytes);
        const value = parseAsciiValue(token, type);
        if (value === null) {
            throw new PlyDataError(`invalid ${type} value '${token}'`, element.name, row);
        }
        return value;
    };

    for (let r = 0; r < element.count; ++r) {
        for (let p = 0; p < properties.length; ++p) {
            const property = properties[p];

            if (property.list) {
                const length = read(property.list.countType, r);
                if (length < 0) {
                    throw new PlyDataError(`negative list length ${length}`, element.name, r);
                }
                for (let i = 0; i < length; ++i) {
                    read(property.type, r);
                }
                continue;
            }

            const value = read(property.type, r);
            const target = storage && storage[p];
            if (target) {
                target[r] = value;
            }
        }
    }

    return tokenizer.position;
};

// public

const walk = (
    data: Uint8Array,
    offset: number,
    element: PlyElement,
    format: PlyFormat,
    storage: (TypedArray | null)[] | null
) => {
    // nothing to walk, however many rows are declared
    if (element.properties.length === 0) {
        return offset;
    }
    return format === 'ascii' ?
        walkAscii(data, offset, element, storage) :
        walkBinary(data, offset, element, format === 'binary_little_endian', storage);
};

/**
 * Decode an element's records into column storage.
 *
 * @param data - The whole file.
 * @param offset - Byte offset at which the element's records start.
 * @param element - Descriptor of the element to decode.
 * @param format - Encoding of the data section.
 * @returns The decoded table and the byte offset just past the element.
 * @throws PlyDataError if a record is truncated or malformed.
 */
const decodeElement = (
    data: Uint8Array,
    offset: number,
    element: PlyElement,
    format: PlyFormat
): { table: ElementTable, end: number } => {
    checkRowCount(data, offset, element, format);
    const storage = createStorage(element);
    const end = walk(data, offset, element, format, storage);
    const columns = element.properties.map((property, idx) => new Column(property, storage[idx]));
    return { table: new ElementTable(element, columns), end };
};

/**
 * Find the end of an element's records without keeping any values.
 *
 * @returns Byte offset just past the element.
 * @throws PlyDataError if a record is truncated or malformed.
 */
const skipElement = (data: Uint8Array, offset: number, element: PlyElement, format: PlyFormat): number => {
    checkRowCount(data, offset, element, format);
    return walk(data, offset, element, format, null);
};

export { decodeElement, skipElement };
