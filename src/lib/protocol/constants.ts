/**
 * Size of the primary header in bytes (6 bytes)
 *
 * Every frame on the wire starts with this fixed-size header.
 */
export const PRIMARY_HEADER_SIZE = 6;

/**
 * Size of the optional secondary header in bytes (8 bytes)
 *
 * Present only when the primary header's secondary header flag is set.
 */
export const SECONDARY_HEADER_SIZE = 8;

/**
 * Size of the trailing checksum in bytes (2 bytes, big-endian)
 */
export const CHECKSUM_SIZE = 2;

/**
 * Maximum size of the data field in bytes.
 *
 * The 16-bit data length field stores the data field size minus one,
 * so 0xFFFF announces 65536 bytes.
 */
export const DATA_MAX_SIZE = 0x10000;

/**
 * Offset of the 16-bit data length field inside the primary header
 */
export const DATA_LENGTH_OFFSET = 4;

/**
 * Default number of decoded packets the output channel holds before the reader blocks
 */
export const CHANNEL_CAPACITY = 1024;
