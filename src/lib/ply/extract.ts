import { type ElementTable } from './element-table';
import { PlyError } from './errors';
import { type RecordLayout } from './record-layout';
import {
    getArrayPropertyType,
    getArrayType,
    getTypeSize,
    type PlyPropertyType,
    type TypedArray
} from './types';

/**
 * Thrown when an extraction cannot complete. Nothing has been written to the
 * destination when this is raised.
 */
class ExtractionError extends PlyError {
    constructor(message: string) {
        super(message);
        this.name = 'ExtractionError';
    }
}

/**
 * Destination of a strided extraction.
 */
type ExtractionBuffer = ArrayBuffer | ArrayBufferView;

// typed array views use platform byte order, strided writes must agree with them
const platformLittleEndian = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;

type ValueWriter = (view: DataView, offset: number, value: number) => void;

const getWriter = (type: PlyPropertyType): ValueWriter => {
    const le = platformLittleEndian;
    switch (type) {
        case 'int8':    return (v, o, x) => v.setInt8(o, x);
        case 'uint8':   return (v, o, x) => v.setUint8(o, x);
        case 'int16':   return (v, o, x) => v.setInt16(o, x, le);
        case 'uint16':  return (v, o, x) => v.setUint16(o, x, le);
        case 'int32':   return (v, o, x) => v.setInt32(o, x, le);
        case 'uint32':  return (v, o, x) => v.setUint32(o, x, le);
        case 'float32': return (v, o, x) => v.setFloat32(o, x, le);
        case 'float64': return (v, o, x) => v.setFloat64(o, x, le);
    }
};

const toDataView = (dest: ExtractionBuffer): DataView => {
    return ArrayBuffer.isView(dest) ?
        new DataView(dest.buffer, dest.byteOffset, dest.byteLength) :
        new DataView(dest);
};

const isByteCount = (value: number) => Number.isSafeInteger(value) && value >= 0;

/**
 * Look up the scalar storage of each requested column.
 * @throws ExtractionError if a column is out of range or is a list property.
 */
const getSources = (table: ElementTable, columns: readonly number[]): TypedArray[] => {
    if (columns.length === 0) {
        throw new ExtractionError('no properties requested');
    }

    return columns.map((index) => {
        const column = Number.isInteger(index) ? table.getColumn(index) : undefined;
        if (!column) {
            throw new ExtractionError(`property index ${index} is out of range for element '${table.element.name}' with ${table.numColumns} properties`);
        }
        if (!column.data) {
            throw new ExtractionError(`property '${column.name}' is a list, list properties cannot be extracted`);
        }
        return column.data;
    });
};

/**
 * Copy rows into a packed array of records whose fields all share one type.
 * Field `i` of record `r` lands at `dest[r * columns.length + i]`.
 *
 * @param table - Loaded element storage.
 * @param columns - Column positions in output field order.
 * @param type - Requested scalar type. Must be the element type of `dest`.
 * @param dest - Destination with room for `numRows * columns.length` values.
 * @throws ExtractionError if a precondition fails. `dest` is untouched in that case.
 */
const extractPacked = (table: ElementTable, columns: readonly number[], type: PlyPropertyType, dest: TypedArray) => {
    const sources = getSources(table, columns);

    const destType = getArrayPropertyType(dest);
    if (destType !== type) {
        throw new ExtractionError(`destination holds ${destType ?? 'unknown'} values but ${type} was requested`);
    }

    const numRows = table.numRows;
    const numFields = sources.length;
    if (dest.length < numRows * numFields) {
        throw new ExtractionError(`destination holds ${dest.length} values, ${numRows * numFields} required`);
    }

    for (let f = 0; f < numFields; ++f) {
        const src = sources[f];
        for (let r = 0; r < numRows; ++r) {
            dest[r * numFields + f] = src[r];
        }
    }
};

/**
 * Copy rows into records laid out at a fixed byte pitch. Field `i` of row `r`
 * is written at byte `offset + r * stride + i * sizeof(type)`.
 *
 * @param table - Loaded element storage.
 * @param columns - Column positions in output field order.
 * @param type - Scalar type every field is written as.
 * @param offset - Bytes to skip at the start of each record.
 * @param stride - Bytes between the starts of consecutive records.
 * @param dest - Destination memory.
 * @throws ExtractionError if a precondition fails. `dest` is untouched in that case.
 */
const extractStrided = (
    table: ElementTable,
    columns: readonly number[],
    type: PlyPropertyType,
    offset: number,
    stride: number,
    dest: ExtractionBuffer
) => {
    const sources = getSources(table, columns);

    if (!isByteCount(offset) || !isByteCount(stride)) {
        throw new ExtractionError(`offset ${offset} and stride ${stride} must be non-negative integers`);
    }

    const size = getTypeSize(type);
    const blockSize = sources.length * size;
    if (offset + blockSize > stride) {
        throw new ExtractionError(`${sources.length} ${type} fields at offset ${offset} do not fit in stride ${stride}`);
    }

    const view = toDataView(dest);
    const numRows = table.numRows;
    const required = numRows > 0 ? (numRows - 1) * stride + offset + blockSize : 0;
    if (view.byteLength < required) {
        throw new ExtractionError(`destination holds ${view.byteLength} bytes, ${required} required`);
    }

    const write = getWriter(type);
    for (let f = 0; f < sources.length; ++f) {
        const src = sources[f];
        const fieldOffset = offset + f * size;
        for (let r = 0; r < numRows; ++r) {
            write(view, fieldOffset + r * stride, src[r]);
        }
    }
};

/**
 * Copy rows into an array of records described by a layout, each field
 * written with its own type at its own offset.
 *
 * @param table - Loaded element storage.
 * @param columns - Column position of each layout field, in layout order.
 * @param layout - Record layout.
 * @param dest - Destination with room for `numRows * layout.stride` bytes.
 * @throws ExtractionError if a precondition fails. `dest` is untouched in that case.
 */
const extractLayout = (table: ElementTable, columns: readonly number[], layout: RecordLayout, dest: ExtractionBuffer) => {
    if (columns.length !== layout.fields.length) {
        throw new ExtractionError(`layout has ${layout.fields.length} fields but ${columns.length} properties were resolved`);
    }

    for (const field of layout.fields) {
        if (!isByteCount(field.byteOffset) || field.byteOffset + getTypeSize(field.type) > layout.stride) {
            throw new ExtractionError(`field '${field.name}' at offset ${field.byteOffset} does not fit in stride ${layout.stride}`);
        }
    }

    const sources = getSources(table, columns);
    const view = toDataView(dest);
    const required = table.numRows * layout.stride;
    if (view.byteLength < required) {
        throw new ExtractionError(`destination holds ${view.byteLength} bytes, ${required} required`);
    }

    for (let f = 0; f < sources.length; ++f) {
        const field = layout.fields[f];
        const write = getWriter(field.type);
        const src = sources[f];
        for (let r = 0; r < table.numRows; ++r) {
            write(view, field.byteOffset + r * layout.stride, src[r]);
        }
    }
};

/**
 * Allocate a packed array of `type` and extract into it.
 * @throws ExtractionError if a precondition fails.
 */
const retrievePacked = (table: ElementTable, columns: readonly number[], type: PlyPropertyType): TypedArray => {
    const result = new (getArrayType(type))(table.numRows * columns.length);
    extractPacked(table, columns, type, result);
    return result;
};

export { ExtractionError, extractLayout, extractPacked, extractStrided, retrievePacked };
export type { ExtractionBuffer };
