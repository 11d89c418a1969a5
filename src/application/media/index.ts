export * from './commands/create-media.command.js';
export * from './dto/create-media.dto.js';
export * from './handlers/create-media.handler.js';
export * from './media-synthesizer.js';
