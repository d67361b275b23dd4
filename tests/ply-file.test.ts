import { describe, it, expect } from 'vitest';

import { PlyDataError, PlyError, PlyFile, type PlyFormat } from '../src/lib';
import { buildPly, textPly, type FixtureElement } from './helpers/build-ply';

const mixed: FixtureElement[] = [
    {
        name: 'vertex',
        properties: [
            { name: 'x', type: 'float32' },
            { name: 'id', type: 'int16' },
            { name: 'red', type: 'uint8' },
            { name: 'weight', type: 'float64' }
        ],
        rows: [
            [1.5, -3, 255, 0.25],
            [-2.25, 1200, 7, 1e10]
        ]
    },
    {
        name: 'face',
        properties: [
            { name: 'vertex_indices', type: 'int32', list: 'uint8' },
            { name: 'flags', type: 'uint32' }
        ],
        rows: [
            [[0, 1, 2], 9],
            [[2, 1, 0, 3], 4000000000]
        ]
    },
    {
        name: 'material',
        properties: [{ name: 'ambient', type: 'int8' }],
        rows: [[-128]]
    }
];

const formats: PlyFormat[] = ['ascii', 'binary_little_endian', 'binary_big_endian'];

describe('PlyFile', () => {
    describe.each(formats)('%s', (format) => {
        it('decodes scalar columns of every element in file order', () => {
            const file = new PlyFile(buildPly(format, mixed));

            const vertex = file.load(0);
            expect(vertex.columns.map(c => c.name)).toEqual(['x', 'id', 'red', 'weight']);
            expect(Array.from(vertex.getColumn(0)?.data ?? [])).toEqual([1.5, -2.25]);
            expect(Array.from(vertex.getColumn(1)?.data ?? [])).toEqual([-3, 1200]);
            expect(Array.from(vertex.getColumn(2)?.data ?? [])).toEqual([255, 7]);
            expect(Array.from(vertex.getColumn(3)?.data ?? [])).toEqual([0.25, 1e10]);

            const face = file.load(1);
            expect(face.getColumn(0)?.data).toBeNull();
            expect(face.getColumn(0)?.property.list).toEqual({ countType: 'uint8' });
            expect(Array.from(face.getColumn(1)?.data ?? [])).toEqual([9, 4000000000]);

            const material = file.load(2);
            expect(material.getColumn(0)?.data).toEqual(new Int8Array([-128]));
        });

        it('skips elements without decoding them', () => {
            const file = new PlyFile(buildPly(format, mixed));
            file.skip(0);
            file.skip(1);
            expect(file.load(2).getColumn(0)?.data).toEqual(new Int8Array([-128]));
        });

        it('reports a truncated element', () => {
            const bytes = buildPly(format, mixed.slice(0, 1));
            // ascii drops the whole last token, binary the last few bytes
            const file = new PlyFile(bytes.subarray(0, bytes.length - (format === 'ascii' ? 12 : 3)));
            expect(() => file.load(0)).toThrowError(PlyDataError);
        });
    });

    it('stores columns in their declared types', () => {
        const file = new PlyFile(buildPly('binary_little_endian', mixed));
        const vertex = file.load(0);
        expect(vertex.columns.map(c => c.data?.constructor)).toEqual([Float32Array, Int16Array, Uint8Array, Float64Array]);
    });

    it('reads ascii rows that span several lines', () => {
        const file = new PlyFile(textPly('ply\nformat ascii 1.0\nelement vertex 2\nproperty int a\nproperty int b\nend_header\n1\n2 3\n\n4\n'));
        const table = file.load(0);
        expect(table.getColumn(0)?.data).toEqual(new Int32Array([1, 3]));
        expect(table.getColumn(1)?.data).toEqual(new Int32Array([2, 4]));
    });

    it('reads ascii float spellings', () => {
        const file = new PlyFile(textPly('ply\nformat ascii 1.0\nelement vertex 5\nproperty double v\nend_header\n-1e3 .5 inf -Infinity nan\n'));
        const data = Array.from(file.load(0).getColumn(0)?.data ?? []);
        expect(data).toEqual([-1000, 0.5, Infinity, -Infinity, NaN]);
    });

    it('rejects a malformed ascii value with its element and row', () => {
        const file = new PlyFile(textPly('ply\nformat ascii 1.0\nelement vertex 2\nproperty int a\nend_header\n1\n2.5\n'));

        let error: unknown;
        try {
            file.load(0);
        } catch (err) {
            error = err;
        }
        expect(error).toBeInstanceOf(PlyDataError);
        expect(error).toMatchObject({
            element: 'vertex',
            row: 1,
            message: "element 'vertex' row 1: invalid int32 value '2.5'"
        });
    });

    it('reports the row at which binary data runs out', () => {
        const bytes = buildPly('binary_little_endian', [{
            name: 'vertex',
            properties: [{ name: 'x', type: 'float32' }],
            rows: [[1], [2], [3]]
        }]);
        const file = new PlyFile(bytes.subarray(0, bytes.length - 1));
        expect(() => file.load(0)).toThrowError("element 'vertex' row 2: unexpected end of file");
    });

    it('rejects a row count the data cannot hold before allocating', () => {
        const header = 'ply\nformat binary_big_endian 1.0\nelement face 9007199254740991\nproperty list uchar int vertex_indices\nend_header\n';
        const file = new PlyFile(new Uint8Array([...textPly(header), 1, 0, 0, 0, 7]));
        expect(() => file.load(0)).toThrowError("element 'face' row 5: unexpected end of file");
        expect(() => file.skip(0)).toThrowError("element 'face' row 5: unexpected end of file");
    });

    it('walks elements without properties', () => {
        const file = new PlyFile(textPly('ply\nformat ascii 1.0\nelement marker 9007199254740991\nelement vertex 1\nproperty int a\nend_header\n42\n'));
        expect(file.load(0).numRows).toBe(9007199254740991);
        expect(file.load(1).getColumn(0)?.data).toEqual(new Int32Array([42]));
    });

    it('rejects an oversized ascii token', () => {
        const file = new PlyFile(textPly(`ply\nformat ascii 1.0\nelement vertex 1\nproperty int a\nend_header\n${'7'.repeat(1025)}\n`));
        expect(() => file.load(0)).toThrowError("element 'vertex' row 0: value of 1025 bytes exceeds the 1024 byte limit");
    });

    it('requires earlier elements to be walked first', () => {
        const file = new PlyFile(buildPly('ascii', mixed));
        expect(() => file.load(1)).toThrowError(new PlyError('element 1 has not been reached'));
    });

    it('cannot load after close', () => {
        const file = new PlyFile(buildPly('ascii', mixed));
        file.close();
        expect(() => file.load(0)).toThrowError(PlyError);
    });
});
