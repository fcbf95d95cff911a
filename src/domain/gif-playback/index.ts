export * from './contracts/gif-playback.js';
export * from './entities/gif-document.js';
export * from './entities/gif-frame.js';
export * from './value-objects/decoder-limits.js';
export * from './value-objects/gif-blocks.js';
export * from './value-objects/index-stream.js';
export * from './value-objects/packed-fields.js';
