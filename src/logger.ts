import pino from "pino";
import type { Logger } from "pino";

// Logs go to stderr: in stdio mode stdout carries the JSON-RPC stream.
const destination = pino.destination(2);

export function createLogger(name: string, level = process.env.LOG_LEVEL || "info"): Logger {
  return pino({ name, level }, destination);
}
