// Shared - JSON & Errors
export * from './shared/json/JsonEncoding.js';
export * from './shared/errors/ResponseErrors.js';
export * from './shared/errors/ErrorCodes.js';
export * from './shared/errors/ApiError.js';
export * from './shared/errors/ErrorNormalizer.js';

// Ports
export * from './application/ports/IResponseSink.js';

// Response writers
export * from './interface-adapters/response/ContentWriter.js';
export * from './interface-adapters/response/ValueMarshaller.js';
export * from './interface-adapters/response/ErrorWriter.js';
export * from './interface-adapters/response/JsonResponder.js';

// Infrastructure - Sinks & Observability
export * from './infrastructure/sinks/NodeResponseSink.js';
export * from './infrastructure/sinks/RecordingResponseSink.js';
export * from './infrastructure/sinks/StatusCode.js';
export * from './infrastructure/observability/Logger.js';

// Configuration
export * from './config/ResponderConfig.js';
