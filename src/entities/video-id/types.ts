/**
 * Video identifier types
 */

/**
 * Opaque YouTube video identifier (letters, digits, `-` and `_`)
 */
export type VideoId = string;
