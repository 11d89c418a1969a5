export * from './commands/publish-version.command.js';
export * from './dto/publish-version.dto.js';
export * from './handlers/publish-version.handler.js';
export * from './identity-resolver.js';
export * from './version-publisher.js';
