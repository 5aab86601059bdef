// ─── Envelope ─────────────────────────────────────────────────────────────────

/** Read size for the streaming codec. */
export const DEFAULT_CHUNK_SIZE = 8192;

export const BASE64_GROUP_CHARS = 4; // one decoded group = 4 characters
export const BASE64_GROUP_BYTES = 3; // one encoded group = 3 bytes

export const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);

// ─── Plaintext tables ─────────────────────────────────────────────────────────

/** A line starting with this marker opens a table; the rest of the line is its name. */
export const TABLE_MARKER = '###';
export const COLUMN_SEPARATOR = '\t';
export const ROW_SEPARATOR = '\n';

/** Tables a complete save is expected to carry. */
export const DEFAULT_REQUIRED_TABLES: readonly string[] = ['Savegame', 'Youtuber', 'Channel'];
