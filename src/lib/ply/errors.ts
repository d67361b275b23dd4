/**
 * Base class for failures raised by the PLY parsing engine.
 */
class PlyError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PlyError';
    }
}

/**
 * Thrown when the header is missing, truncated or contains a line the parser
 * does not understand.
 */
class PlyHeaderError extends PlyError {
    constructor(message: string) {
        super(message);
        this.name = 'PlyHeaderError';
    }
}

/**
 * Thrown when an element's records are truncated or hold a malformed value.
 */
class PlyDataError extends PlyError {
    /** Name of the element being decoded. */
    readonly element: string;

    /** Row at which decoding stopped. */
    readonly row: number;

    constructor(message: string, element: string, row: number) {
        super(`element '${element}' row ${row}: ${message}`);
        this.name = 'PlyDataError';
        this.element = element;
        this.row = row;
    }
}

export { PlyError, PlyHeaderError, PlyDataError };
