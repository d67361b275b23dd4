import { getTypeSize, type PlyPropertyType } from './types';

/**
 * A named field of a fixed-layout output record.
 */
type RecordField = {
    /** Property to read the field from. */
    name: string;
    /** Scalar type the field is written as. */
    type: PlyPropertyType;
};

/**
 * A field with its position inside the record.
 */
type RecordFieldLayout = RecordField & {
    readonly byteOffset: number;
};

/**
 * Byte layout of a fixed-layout record array.
 *
 * Every field carries its own type, so a caller filling a struct array from
 * several typed extractions never pairs a type with an offset by hand.
 */
type RecordLayout = {
    readonly fields: readonly RecordFieldLayout[];
    /** Bytes between the starts of consecutive records. */
    readonly stride: number;
};

/**
 * Lay out fields in declaration order, aligning each to its own size. The
 * stride is padded to a multiple of the widest field, so consecutive records
 * keep every field aligned.
 *
 * @param fields - Fields in declaration order.
 * @returns The resolved layout.
 * @throws Error if no fields are given or a field name repeats.
 *
 * @example
 * ```ts
 * const layout = buildRecordLayout([
 *     { name: 'red', type: 'uint8' },
 *     { name: 'x', type: 'float32' }
 * ]);
 * // red at 0, x at 4, stride 8
 * ```
 */
const buildRecordLayout = (fields: readonly RecordField[]): RecordLayout => {
    if (fields.length === 0) {
        throw new Error('record layout must have at least one field');
    }

    const seen = new Set<string>();
    const out: RecordFieldLayout[] = [];
    let offset = 0;
    let alignment = 1;

    for (const field of fields) {
        if (seen.has(field.name)) {
            throw new Error(`duplicate record field '${field.name}'`);
        }
        seen.add(field.name);

        const size = getTypeSize(field.type);
        offset = Math.ceil(offset / size) * size;
        out.push({ name: field.name, type: field.type, byteOffset: offset });
        offset += size;
        alignment = Math.max(alignment, size);
    }

    return {
        fields: out,
        stride: Math.ceil(offset / alignment) * alignment
    };
};

export { buildRecordLayout };
export type { RecordField, RecordFieldLayout, RecordLayout };
