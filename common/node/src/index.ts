// Logger
export { resolveLogger, type Logger, type LoggerFactory, type NamedLoggerFactory } from "./logger.js";

// Utilities
export * from "./utils.js";

// Configuration
export { ConfigStore, type ConfigListener } from "./config-store.js";

// Validation
export { checkValue, validateArgs, type ValidationFailure, type ValidationResult } from "./validator.js";

// Call log
export { EventLog, type EventLogParams } from "./event-log.js";

// Rate limiting
export { RateLimiter, type RateLimiterParams, type RateWindowRecord } from "./rate-limiter.js";

// Middleware
export {
  MiddlewareChain,
  type EndpointRef,
  type Gate,
  type GateCall,
  type GateOutcome,
} from "./middleware-chain.js";

// Assertions
export { Assertions } from "./assertions.js";

// Dispatcher
export {
  RemoteHandler,
  type EndpointDescription,
  type EndpointOptions,
  type EndpointRegistration,
  type RemoteCallback,
  type RemoteHandlerParams,
} from "./remote-handler.js";
