/**
 * Codecs for field encodings that have no default JSON form.
 */

export * from './color';
export * from './timestamp';
