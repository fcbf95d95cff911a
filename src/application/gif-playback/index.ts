export * from './commands/load-playback.command.js';
export * from './dto/load-playback.dto.js';
export * from './handlers/load-playback.handler.js';
