export * from './types/index.js';
export type * from './types/service.js';
export { ShotnameApp, describeSummary } from './core/App.js';
export type { AppDeps, PausePrompt } from './core/App.js';
export { ConfigStore, DEFAULT_CONFIG, parseRawConfig, validateConfig } from './core/config/ConfigStore.js';
export {
	ConfigError,
	TimestampUnavailableError,
	UnknownDateSourceError,
	errorMessage,
} from './core/errors.js';
export { ExifReader } from './core/exif/ExifReader.js';
export { FsSafe } from './core/fs/FsSafe.js';
export { MoveCommand } from './core/fs/MoveCommand.js';
export { Logger } from './core/log/Logger.js';
export type { Level, LoggerOptions } from './core/log/Logger.js';
export { parseDateSource, parseDateSources } from './core/rename/DateSource.js';
export { matchesTimestamp } from './core/rename/NameMatcher.js';
export { formatTimestamp, parseTimestamp, toDateFnsPattern } from './core/rename/NameTemplate.js';
export { RenameService } from './core/rename/RenameService.js';
export { LiveStrategy, SimulatedStrategy, createStrategy } from './core/rename/RenameStrategy.js';
export { TimestampResolver, parseExifTimestamp } from './core/rename/TimestampResolver.js';
export { candidateName, findUniqueFilename } from './core/rename/UniqueName.js';
export { run } from './cli/index.js';
