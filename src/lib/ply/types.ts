/**
 * Union of all typed array types a PLY scalar column can be stored in.
 */
type TypedArray = Int8Array | Uint8Array | Int16Array | Uint16Array | Int32Array | Uint32Array | Float32Array | Float64Array;

/**
 * Scalar storage types of PLY properties.
 *
 * Header spellings map onto these as follows:
 * `char`/`int8`, `uchar`/`uint8`, `short`/`int16`, `ushort`/`uint16`,
 * `int`/`int32`, `uint`/`uint32`, `float`/`float32`, `double`/`float64`.
 */
type PlyPropertyType = 'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32' | 'float32' | 'float64';

/**
 * Encoding of the data section following the header.
 */
type PlyFormat = 'ascii' | 'binary_little_endian' | 'binary_big_endian';

/**
 * Well-known element names. Anything else is a custom element.
 */
type PlyElementType = 'vertex' | 'face';

type PlyProperty = {
    name: string;               // 'x', 'f_dc_0', etc
    type: PlyPropertyType;      // value type (item type for lists)
    list?: {
        countType: PlyPropertyType;
    };
};

type PlyElement = {
    name: string;               // 'vertex', 'face', etc
    count: number;
    properties: readonly PlyProperty[];
};

type PlyHeader = {
    format: PlyFormat;
    version: string;
    comments: string[];
    objInfo: string[];
    elements: readonly PlyElement[];
    // byte offset of the first element's data
    dataOffset: number;
};

type TypedArrayConstructor = new (length: number) => TypedArray;

const TYPE_SIZES: Readonly<Record<PlyPropertyType, number>> = {
    int8: 1,
    uint8: 1,
    int16: 2,
    uint16: 2,
    int32: 4,
    uint32: 4,
    float32: 4,
    float64: 8
};

const getTypeSize = (type: PlyPropertyType): number => TYPE_SIZES[type];

const getArrayType = (type: PlyPropertyType): TypedArrayConstructor => {
    switch (type) {
        case 'int8': return Int8Array;
        case 'uint8': return Uint8Array;
        case 'int16': return Int16Array;
        case 'uint16': return Uint16Array;
        case 'int32': return Int32Array;
        case 'uint32': return Uint32Array;
        case 'float32': return Float32Array;
        case 'float64': return Float64Array;
    }
};

/**
 * Map a header type token onto its storage type.
 *
 * @param token - Type name as written in the header, e.g. 'float' or 'uint8'.
 * @returns The storage type, or null if the token is not a PLY scalar type.
 */
const parsePropertyType = (token: string): PlyPropertyType | null => {
    switch (token) {
        case 'char': case 'int8': return 'int8';
        case 'uchar': case 'uint8': return 'uint8';
        case 'short': case 'int16': return 'int16';
        case 'ushort': case 'uint16': return 'uint16';
        case 'int': case 'int32': return 'int32';
        case 'uint': case 'uint32': return 'uint32';
        case 'float': case 'float32': return 'float32';
        case 'double': case 'float64': return 'float64';
        default: return null;
    }
};

/**
 * Identify the storage type of a typed array.
 *
 * @param data - The array to inspect.
 * @returns The matching property type, or null for arrays outside the PLY set
 * (for example Uint8ClampedArray or BigInt64Array).
 */
const getArrayPropertyType = (data: ArrayBufferView): PlyPropertyType | null => {
    if (data instanceof Int8Array) return 'int8';
    if (data instanceof Uint8Array) return 'uint8';
    if (data instanceof Int16Array) return 'int16';
    if (data instanceof Uint16Array) return 'uint16';
    if (data instanceof Int32Array) return 'int32';
    if (data instanceof Uint32Array) return 'uint32';
    if (data instanceof Float32Array) return 'float32';
    if (data instanceof Float64Array) return 'float64';
    return null;
};

const isIntegerType = (type: PlyPropertyType) => type !== 'float32' && type !== 'float64';

export {
    getArrayPropertyType,
    getArrayType,
    getTypeSize,
    isIntegerType,
    parsePropertyType
};

export type {
    PlyElement,
    PlyElementType,
    PlyFormat,
    PlyHeader,
    PlyProperty,
    PlyPropertyType,
    TypedArray,
    TypedArrayConstructor
};
