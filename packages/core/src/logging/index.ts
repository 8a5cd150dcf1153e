export { LoggingLive, makeLoggingLayer } from "./logging-layer.js";
