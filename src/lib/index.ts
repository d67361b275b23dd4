// Read session
export { PlyReader } from './ply/ply-reader';
export type { PropertyIndex } from './ply/ply-reader';

// Record layouts
export { buildRecordLayout } from './ply/record-layout';
export type { RecordField, RecordFieldLayout, RecordLayout } from './ply/record-layout';

// Parsing engine (for advanced use)
export { PlyFile } from './ply/ply-file';
export { parseHeader } from './ply/header';
export { Column, ElementTable } from './ply/element-table';
export { getArrayPropertyType, getTypeSize, parsePropertyType } from './ply/types';
export type {
    PlyElement,
    PlyElementType,
    PlyFormat,
    PlyHeader,
    PlyProperty,
    PlyPropertyType,
    TypedArray
} from './ply/types';
export type { ExtractionBuffer } from './ply/extract';

// Errors
export { PlyError, PlyHeaderError, PlyDataError } from './ply/errors';
export { ExtractionError } from './ply/extract';

// File system abstractions
export { ReadStream, MemoryReadFileSystem, NodeReadFileSystem, readFile } from './io/read';
export type { ReadFileSystem, ProgressCallback } from './io/read';

// Logger
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
