import { describe, it, expect } from 'vitest';

import { parseHeader, PlyHeaderError } from '../src/lib';
import { textPly } from './helpers/build-ply';

describe('parseHeader', () => {
    it('decodes format, comments, elements and properties', () => {
        const text = [
            'ply',
            'format binary_little_endian 1.0',
            'comment made by hand',
            'obj_info scanner v2',
            'element vertex 3',
            'property float x',
            'property float32 y',
            'property uchar red',
            'element face 1',
            'property list uchar int vertex_indices',
            'end_header',
            ''
        ].join('\n');
        const header = parseHeader(textPly(text));

        expect(header.format).toBe('binary_little_endian');
        expect(header.version).toBe('1.0');
        expect(header.comments).toEqual(['made by hand']);
        expect(header.objInfo).toEqual(['scanner v2']);
        expect(header.dataOffset).toBe(text.length);
        expect(header.elements).toEqual([
            {
                name: 'vertex',
                count: 3,
                properties: [
                    { name: 'x', type: 'float32' },
                    { name: 'y', type: 'float32' },
                    { name: 'red', type: 'uint8' }
                ]
            },
            {
                name: 'face',
                count: 1,
                properties: [
                    { name: 'vertex_indices', type: 'int32', list: { countType: 'uint8' } }
                ]
            }
        ]);
    });

    it('accepts CRLF line endings', () => {
        const text = 'ply\r\nformat ascii 1.0\r\nelement vertex 1\r\nproperty double x\r\nend_header\r\n1.5\r\n';
        const header = parseHeader(textPly(text));

        expect(header.format).toBe('ascii');
        expect(header.elements[0].properties).toEqual([{ name: 'x', type: 'float64' }]);
        expect(header.dataOffset).toBe(text.indexOf('1.5'));
    });

    it('accepts a header with no elements', () => {
        const header = parseHeader(textPly('ply\nformat ascii 1.0\nend_header\n'));
        expect(header.elements).toEqual([]);
    });

    it('returns frozen element descriptors', () => {
        const header = parseHeader(textPly('ply\nformat ascii 1.0\nelement vertex 1\nproperty float x\nend_header\n'));
        expect(Object.isFrozen(header.elements)).toBe(true);
        expect(Object.isFrozen(header.elements[0])).toBe(true);
        expect(Object.isFrozen(header.elements[0].properties[0])).toBe(true);
    });

    it.each([
        ['missing magic', 'plx\nformat ascii 1.0\nend_header\n', 'invalid file header'],
        ['magic prefix only', 'plyx\nformat ascii 1.0\nend_header\n', 'invalid file header'],
        ['missing end_header', 'ply\nformat ascii 1.0\nelement vertex 1\n', 'missing end_header'],
        ['missing format', 'ply\nelement vertex 1\nproperty float x\nend_header\n', 'missing format line'],
        ['unknown format', 'ply\nformat binary_middle_endian 1.0\nend_header\n', "unsupported format 'binary_middle_endian 1.0'"],
        ['duplicate format', 'ply\nformat ascii 1.0\nformat ascii 1.0\nend_header\n', 'duplicate format line'],
        ['unknown keyword', 'ply\nformat ascii 1.0\nbogus line\nend_header\n', "unrecognized header value 'bogus' in ply header"],
        ['unknown type', 'ply\nformat ascii 1.0\nelement vertex 1\nproperty half x\nend_header\n', "unknown property type 'half'"],
        ['negative count', 'ply\nformat ascii 1.0\nelement vertex -1\nend_header\n', "invalid element count '-1'"],
        ['property before element', 'ply\nformat ascii 1.0\nproperty float x\nend_header\n', "property 'x' declared before any element"],
        ['duplicate property', 'ply\nformat ascii 1.0\nelement vertex 1\nproperty float x\nproperty int x\nend_header\n', "duplicate property 'x' in element 'vertex'"],
        ['float list count', 'ply\nformat ascii 1.0\nelement face 1\nproperty list float int idx\nend_header\n', "list count type must be an integer type, got 'float'"]
    ])('rejects %s', (_, text, message) => {
        expect(() => parseHeader(textPly(text))).toThrowError(new PlyHeaderError(message));
    });

    it('reports the error as a PlyHeaderError', () => {
        let error: unknown;
        try {
            parseHeader(textPly('ply\nend_header\n'));
        } catch (err) {
            error = err;
        }
        expect(error).toBeInstanceOf(PlyHeaderError);
        expect(error).toMatchObject({ name: 'PlyHeaderError', message: 'missing format line' });
    });
});
