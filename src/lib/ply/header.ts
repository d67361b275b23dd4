import { PlyHeaderError } from './errors';
import {
    isIntegerType,
    parsePropertyType,
    type PlyElement,
    type PlyFormat,
    type PlyHeader,
    type PlyProperty
} from './types';

// we don't support ply text header larger than 128k
const MAX_HEADER_SIZE = 128 * 1024;

const NEWLINE = 10;

const magicBytes = new Uint8Array([112, 108, 121]);     // ply

const cmp = (a: Uint8Array, b: Uint8Array, aOffset = 0) => {
    for (let i = 0; i < b.length; ++i) {
        if (a[aOffset + i] !== b[i]) {
            return false;
        }
    }
    return true;
};

const isFormat = (value: string): value is PlyFormat => {
    return value === 'ascii' || value === 'binary_little_endian' || value === 'binary_big_endian';
};

/**
 * Split the header section into lines, stopping after `end_header`.
 * Lines may end in '\n' or '\r\n'.
 */
const splitHeaderLines = (data: Uint8Array): { lines: string[], dataOffset: number } => {
    const decoder = new TextDecoder('ascii');
    const limit = Math.min(data.length, MAX_HEADER_SIZE);
    const lines: string[] = [];

    let start = 0;
    while (start < limit) {
        let end = data.indexOf(NEWLINE, start);
        const last = end === -1 || end >= limit;
        if (last) {
            end = limit;
        }

        const line = decoder.decode(data.subarray(start, end)).replace(/\r$/, '');
        lines.push(line);

        if (line.trim() === 'end_header') {
            return { lines, dataOffset: Math.min(end + 1, data.length) };
        }

        if (last) {
            break;
        }
        start = end + 1;
    }

    throw new PlyHeaderError(data.length > MAX_HEADER_SIZE ?
        `header exceeds ${MAX_HEADER_SIZE} bytes or is missing end_header` :
        'missing end_header');
};

const parseCount = (token: string) => {
    if (!/^\d+$/.test(token)) {
        throw new PlyHeaderError(`invalid element count '${token}'`);
    }
    const count = parseInt(token, 10);
    if (!Number.isSafeInteger(count)) {
        throw new PlyHeaderError(`element count '${token}' is too large`);
    }
    return count;
};

const parseProperty = (words: string[]): PlyProperty => {
    if (words[1] === 'list') {
        if (words.length !== 5) {
            throw new PlyHeaderError(`invalid list property '${words.join(' ')}'`);
        }
        const countType = parsePropertyType(words[2]);
        const type = parsePropertyType(words[3]);
        if (!countType || !type) {
            throw new PlyHeaderError(`unknown list property type in '${words.join(' ')}'`);
        }
        if (!isIntegerType(countType)) {
            throw new PlyHeaderError(`list count type must be an integer type, got '${words[2]}'`);
        }
        return { name: words[4], type, list: { countType } };
    }

    if (words.length !== 3) {
        throw new PlyHeaderError(`invalid property '${words.join(' ')}'`);
    }
    const type = parsePropertyType(words[1]);
    if (!type) {
        throw new PlyHeaderError(`unknown property type '${words[1]}'`);
    }
    return { name: words[2], type };
};

/**
 * Parse the text header at the start of a PLY file.
 *
 * @param data - File bytes, starting at the `ply` magic.
 * @returns The decoded header, including the byte offset at which element data begins.
 * @throws PlyHeaderError if the header is malformed.
 */
const parseHeader = (data: Uint8Array): PlyHeader => {
    if (data.length < magicBytes.length || !cmp(data, magicBytes)) {
        throw new PlyHeaderError('invalid file header');
    }

    const { lines, dataOffset } = splitHeaderLines(data);
    if (lines[0].trim() !== 'ply') {
        throw new PlyHeaderError('invalid file header');
    }

    let format: PlyFormat | undefined;
    let version = '';
    const comments: string[] = [];
    const objInfo: string[] = [];
    const elements: { name: string, count: number, properties: PlyProperty[] }[] = [];

    for (let i = 1; i < lines.length; ++i) {
        const line = lines[i];
        const words = line.trim().split(/\s+/);

        switch (words[0]) {
            case '':
            case 'end_header':
                // skip
                break;
            case 'format': {
                if (format) {
                    throw new PlyHeaderError('duplicate format line');
                }
                const value = words[1];
                if (words.length !== 3 || !isFormat(value)) {
                    throw new PlyHeaderError(`unsupported format '${words.slice(1).join(' ')}'`);
                }
                format = value;
                version = words[2];
                break;
            }
            case 'comment':
                comments.push(line.trim().replace(/^comment\s?/, ''));
                break;
            case 'obj_info':
                objInfo.push(line.trim().replace(/^obj_info\s?/, ''));
                break;
            case 'element': {
                if (words.length !== 3) {
                    throw new PlyHeaderError('invalid ply header');
                }
                elements.push({
                    name: words[1],
                    count: parseCount(words[2]),
                    properties: []
                });
                break;
            }
            case 'property': {
                const element = elements[elements.length - 1];
                if (!element) {
                    throw new PlyHeaderError(`property '${words[words.length - 1]}' declared before any element`);
                }
                const property = parseProperty(words);
                if (element.properties.some(p => p.name === property.name)) {
                    throw new PlyHeaderError(`duplicate property '${property.name}' in element '${element.name}'`);
                }
                element.properties.push(property);
                break;
            }
            default: {
                throw new PlyHeaderError(`unrecognized header value '${words[0]}' in ply header`);
            }
        }
    }

    if (!format) {
        throw new PlyHeaderError('missing format line');
    }

    const frozen: PlyElement[] = elements.map(e => Object.freeze({
        name: e.name,
        count: e.count,
        properties: Object.freeze(e.properties.map(p => Object.freeze(p)))
    }));

    return {
        format,
        version,
        comments,
        objInfo,
        elements: Object.freeze(frozen),
        dataOffset
    };
};

export { parseHeader };
