import { type PlyElement, type PlyProperty, type TypedArray } from './types';

/**
 * A single decoded property of an element.
 *
 * Scalar properties own a typed array holding one value per row. List
 * properties are walked over during decoding but not kept, so their
 * `data` is null.
 *
 * @example
 * ```ts
 * const x = new Column({ name: 'x', type: 'float32' }, new Float32Array([1, 2, 3]));
 * console.log(x.name); // 'x'
 * ```
 */
class Column {
    readonly property: PlyProperty;
    readonly data: TypedArray | null;

    constructor(property: PlyProperty, data: TypedArray | null) {
        this.property = property;
        this.data = data;
    }

    get name() {
        return this.property.name;
    }
}

/**
 * Materialized column storage for one element.
 *
 * Every scalar column holds exactly `element.count` values.
 */
class ElementTable {
    readonly element: PlyElement;
    readonly columns: readonly Column[];

    constructor(element: PlyElement, columns: Column[]) {
        if (columns.length !== element.properties.length) {
            throw new Error(`Element '${element.name}' expects ${element.properties.length} columns, got ${columns.length}`);
        }

        for (const column of columns) {
            if (column.data && column.data.length !== element.count) {
                throw new Error(`Column '${column.name}' has inconsistent number of rows: expected ${element.count}, got ${column.data.length}`);
            }
        }

        this.element = element;
        this.columns = columns;
    }

    get numRows() {
        return this.element.count;
    }

    get numColumns() {
        return this.columns.length;
    }

    getColumn(index: number): Column | undefined {
        return this.columns[index];
    }
}

export { Column, ElementTable };
