export { type Clock, systemClock, ManualClock } from "./clock.js";
export { ConfigError, SetupError } from "./errors.js";
export { type ByteTransport } from "./transport/types.js";
export { StreamTransport, connectTcp, type StreamTransportOptions } from "./transport/stream.js";
export { MemoryTransport } from "./transport/memory.js";
export { type Endpoint, type IoErrorKind, type ReadResult, type SendResult } from "./endpoint.js";
export { Poller, readinessOf, type Readiness } from "./poller.js";
export { TriggerSet, compilePatterns, DEFAULT_ON_PATTERNS, DEFAULT_OFF_PATTERNS } from "./triggers.js";
export { RateLimiter, BITS_PER_BYTE } from "./rate-limiter.js";
export {
    SerialEndpoint,
    openSerialPort,
    type SerialPortOptions,
    type Parity,
    type DataBits,
    type StopBits,
} from "./serial.js";
export {
    RudicsClient,
    DEFAULT_RUDICS_PORT,
    type RudicsClientOptions,
    type DisconnectReason,
    type OpenResult,
    type Connector,
} from "./rudics.js";
export { SessionController, type SessionOptions, type ConnectionState } from "./session.js";
export { TrafficCapture, type TrafficSource } from "./capture.js";
export { type Bridge, type BridgeStatus } from "./bridge.js";
export { SerialRudicsBridge, type SerialRudicsBridgeOptions } from "./bridges/serial-rudics.js";
export { createBridge, createSession, type BridgeDependencies } from "./app.js";
export { loadConfig, validateConfig, DEFAULT_CONFIG, type Config, type ConfigOverrides } from "./config.js";
export { createRootLogger, createChildLogger, type LogConfig } from "./logger.js";
