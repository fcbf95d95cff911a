export * from './cache/playback-cache.js';
export * from './compositor/frame-compositor.js';
export * from './gif-playback.service.js';
export * from './lzw/code-table.js';
export * from './lzw/lzw-decoder.js';
export * from './parser/block-parser.js';
export * from './parser/byte-cursor.js';
export * from './strategies/create-gif-playback.js';
export * from './strategies/full-cache-gif.js';
export * from './strategies/streaming-compressed-gif.js';
export * from './strategies/streaming-index-gif.js';
