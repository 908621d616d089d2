export {
	type ConverterConfig,
	type ConverterConfigInput,
	converterConfigSchema,
	resolveConfig,
} from "./config";
export * from "./convert/index";
export * from "./fs/index";
export { createLogger, type Logger, type LogLevel, setLogLevel } from "./logger";
export * from "./web/index";
