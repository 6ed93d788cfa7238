/**
 * ConversionWorker.ts - Worker thread entry for SyncConverter
 *
 * Runs conversions on this thread's own event loop while the calling thread
 * is parked in Atomics.wait. The thread reports itself RUNNING once it
 * listens, and STOPPED on any way out, so the caller is never left waiting.
 */

import { parentPort, workerData } from "node:worker_threads";
import { loadConfig } from "../config/Config.js";
import { createLogger } from "../util/Logger.js";
import { Converter } from "./Converter.js";
import { errorMessage } from "./ConversionDispatcher.js";
import {
  RequestSchema,
  SignalDataSchema,
  WorkerDataSchema,
  describeIssue,
  handleRequest,
  markRunning,
  markStopped,
  rejectMessage,
} from "./WorkerProtocol.js";

const { signal } = SignalDataSchema.parse(workerData);
const { config } = loadConfig();
const logger = createLogger('worker', config.debug);

process.on('exit', () => markStopped(signal));
process.on('uncaughtException', (error) => {
  logger.warn(`Conversion worker crashed: ${errorMessage(error)}`);
  markStopped(signal);
  process.exit(1);
});

const channel = WorkerDataSchema.parse(workerData);
const converter = new Converter({ config });

if (!parentPort) {
  throw new Error('ConversionWorker must run in a worker thread');
}

parentPort.on('message', (message: unknown) => {
  const request = RequestSchema.safeParse(message);
  if (!request.success) {
    logger.warn(`Rejected malformed request: ${describeIssue(request.error)}`);
    rejectMessage(message, channel);
    return;
  }

  handleRequest(request.data, channel, converter).catch((error: unknown) => {
    logger.warn(`Request ${request.data.id} failed to reply: ${errorMessage(error)}`);
    markStopped(signal);
  });
});

markRunning(signal);
