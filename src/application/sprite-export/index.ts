export * from './commands/export-sprites.command.js';
export * from './dto/export-sprites.dto.js';
export * from './handlers/export-sprites.handler.js';
