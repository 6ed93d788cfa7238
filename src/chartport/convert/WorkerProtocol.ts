/**
 * WorkerProtocol.ts - Messages between SyncConverter and its worker thread
 *
 * The shared Int32Array has two slots. The caller blocks on REPLY_SLOT; the
 * worker posts the reply on a dedicated MessagePort first and only then flips
 * the slot to READY and notifies, so the reply is always waiting when the
 * caller wakes. STATE_SLOT tracks the worker itself: STARTING until it is
 * listening, then RUNNING, and STOPPED once it dies. Stopping also releases a
 * caller parked on REPLY_SLOT.
 */

import { MessagePort } from "node:worker_threads";
import { z } from "zod";
import { ConversionCallSchema, runCall } from "./ConversionCall.js";
import type { Converter } from "./Converter.js";
import { errorMessage } from "./ConversionDispatcher.js";
import { BinaryResult, ERROR, OK, TextResult } from "./types.js";

export const REPLY_SLOT = 0;
export const STATE_SLOT = 1;
export const SIGNAL_SLOTS = 2;

// REPLY_SLOT values
export const PENDING = 0;
export const READY = 1;

// STATE_SLOT values
export const STARTING = 0;
export const RUNNING = 1;
export const STOPPED = 2;

export interface BridgeChannel {
  port: MessagePort;
  signal: Int32Array;
}

export function createSignal(): Int32Array {
  return new Int32Array(new SharedArrayBuffer(SIGNAL_SLOTS * Int32Array.BYTES_PER_ELEMENT));
}

export function markRunning(signal: Int32Array): void {
  Atomics.store(signal, STATE_SLOT, RUNNING);
  Atomics.notify(signal, STATE_SLOT);
}

export function markStopped(signal: Int32Array): void {
  Atomics.store(signal, STATE_SLOT, STOPPED);
  Atomics.store(signal, REPLY_SLOT, READY);
  Atomics.notify(signal, STATE_SLOT);
  Atomics.notify(signal, REPLY_SLOT);
}

export const SignalDataSchema = z.object({
  signal: z.instanceof(Int32Array).refine(signal => signal.length >= SIGNAL_SLOTS, 'signal is too short'),
});

export const WorkerDataSchema = SignalDataSchema.extend({
  port: z.instanceof(MessagePort),
});

export const RequestSchema = z.object({
  id: z.number().int(),
  call: ConversionCallSchema,
});

export type BridgeRequest = z.infer<typeof RequestSchema>;

const Bytes = z.custom<Uint8Array>(value => value instanceof Uint8Array, 'Expected a Uint8Array');

export const WireResultSchema = z.union([
  z.tuple([z.literal(OK), z.union([z.string(), Bytes])]),
  z.tuple([z.literal(ERROR), z.string()]),
]);

export type WireResult = z.infer<typeof WireResultSchema>;

export const ResponseSchema = z.object({
  id: z.number().int(),
  result: WireResultSchema,
});

export type BridgeResponse = z.infer<typeof ResponseSchema>;

function reply(channel: BridgeChannel, response: BridgeResponse): void {
  try {
    channel.port.postMessage(response);
  } finally {
    Atomics.store(channel.signal, REPLY_SLOT, READY);
    Atomics.notify(channel.signal, REPLY_SLOT);
  }
}

export async function handleRequest(request: BridgeRequest, channel: BridgeChannel, converter: Converter): Promise<void> {
  let result: TextResult | BinaryResult;
  try {
    result = await runCall(converter, request.call);
  } catch (error) {
    result = [ERROR, errorMessage(error)];
  }
  reply(channel, { id: request.id, result: toWire(result) });
}

function toWire(result: TextResult | BinaryResult): WireResult {
  return result[0] === ERROR ? [ERROR, result[1]] : [OK, result[1]];
}

export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'invalid message';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function rejectMessage(message: unknown, channel: BridgeChannel): void {
  const id = z.object({ id: z.number().int() }).safeParse(message);
  reply(channel, { id: id.success ? id.data.id : -1, result: [ERROR, 'Malformed conversion request'] });
}

export function expectText(result: WireResult): TextResult {
  if (result[0] === ERROR) {
    return [ERROR, result[1]];
  }
  const payload = result[1];
  return typeof payload === 'string' ? [OK, payload] : [ERROR, 'Expected a text payload from the conversion worker'];
}

export function expectBinary(result: WireResult): BinaryResult {
  if (result[0] === ERROR) {
    return [ERROR, result[1]];
  }
  const payload = result[1];
  return payload instanceof Uint8Array ? [OK, payload] : [ERROR, 'Expected a binary payload from the conversion worker'];
}
