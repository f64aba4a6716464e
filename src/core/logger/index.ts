export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	redactSensitiveData,
	type LoggerOptions,
	type LogMeta,
	type ChalkColor,
} from './logger.js';
