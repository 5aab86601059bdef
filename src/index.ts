/**
 * savetab public API
 *
 * @module savetab
 */

import { decodeEnvelope, encodeEnvelope } from './envelope/codec.js';
import { streamDecode, streamEncode } from './envelope/stream.js';
import { formatTables } from './tables/format.js';
import { parseTables } from './tables/parse.js';
import { validateTables } from './tables/validate.js';
import { loadPlaintext, loadSave, savePlaintext, saveToEnvelope } from './save-file.js';

export type {
    SaveTabLogger as Logger,
    EnvelopeDecodeOptions,
    EnvelopeStreamOptions,
    EnvelopeStreamStats,
    LongRowPolicy,
    TableParseOptions,
    TableValidateOptions,
    LoadSaveOptions,
} from './types.js';
export type {
    Cell,
    CellType,
    IntegerCell,
    FloatCell,
    TextCell,
    Row,
    TableSet,
    HeaderOrder,
    ParsedTables,
    TableIssue,
} from './tables/types.js';
export type { ChunkSource } from './envelope/stream.js';
export type { FormatStage } from './errors.js';

export {
    SaveTabError,
    FormatError,
    Base64FormatError,
    GzipFormatError,
    TableStructureError,
    Utf8FormatError,
    LimitExceededError,
} from './errors.js';
export {
    DEFAULT_CHUNK_SIZE,
    TABLE_MARKER,
    COLUMN_SEPARATOR,
    ROW_SEPARATOR,
    DEFAULT_REQUIRED_TABLES,
} from './constants.js';

export { decodeEnvelope, encodeEnvelope } from './envelope/codec.js';
export { streamDecode, streamEncode, Base64DecodeStream, Base64EncodeStream } from './envelope/stream.js';
export { inferCell, renderCell, renderFloat, integerCell, floatCell, textCell, cellToPrimitive } from './tables/cell.js';
export { parseTables } from './tables/parse.js';
export { formatTables, resolveColumns } from './tables/format.js';
export { validateTables } from './tables/validate.js';
export { loadSave, loadPlaintext, saveToEnvelope, savePlaintext, decodeUtf8 } from './save-file.js';

// The SaveTab namespace object: the four calls an editor needs plus the
// streaming and convenience variants.
export const SaveTab = {
    /** Envelope text → wrapped bytes. */
    decode: decodeEnvelope,
    /** Bytes → envelope text. */
    encode: encodeEnvelope,
    /** Envelope text source → bytes sink, bounded memory. */
    streamDecode,
    /** Bytes source → envelope text sink, bounded memory. */
    streamEncode,
    /** Plaintext → tables + header order. */
    parse: parseTables,
    /** Tables + header order → plaintext. */
    format: formatTables,
    validate: validateTables,
    load: loadSave,
    loadPlaintext,
    save: saveToEnvelope,
    savePlaintext,
};

export default SaveTab;
