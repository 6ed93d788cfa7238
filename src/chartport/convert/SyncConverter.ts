/**
 * SyncConverter - Blocking front end for callers that cannot await
 *
 * Conversions run on a dedicated worker thread. The calling thread parks in
 * Atomics.wait until the worker signals that the reply is on the port, so no
 * event loop (neither the caller's nor the worker's) is blocked by the other.
 * Only worker startup is bounded; once a conversion is dispatched it runs to
 * completion, to a failure, or until the worker stops.
 */

import { extname } from "node:path";
import { fileURLToPath } from "node:url";
import { MessageChannel, MessagePort, Worker, receiveMessageOnPort } from "node:worker_threads";
import { ConversionCall } from "./ConversionCall.js";
import { errorMessage } from "./ConversionDispatcher.js";
import { DEFAULT_PARAMS } from "./OptionResolver.js";
import { BinaryResult, ERROR, TextResult } from "./types.js";
import {
  PENDING,
  REPLY_SLOT,
  RUNNING,
  ResponseSchema,
  STARTING,
  STATE_SLOT,
  WireResult,
  createSignal,
  expectBinary,
  expectText,
} from "./WorkerProtocol.js";

export const STARTUP_TIMEOUT_MS = 30_000;

export interface SyncConverterOptions {
  /** Worker module to run; defaults to the one beside this file */
  entry?: URL;
  startupTimeoutMs?: number;
}

export function workerEntry(moduleUrl: string = import.meta.url): URL {
  // From sources the worker goes through a bootstrap that registers tsx
  return extname(fileURLToPath(moduleUrl)) === '.ts'
    ? new URL('./load-worker.mjs', moduleUrl)
    : new URL('./ConversionWorker.js', moduleUrl);
}

export class SyncConverter {
  private worker: Worker;
  private port: MessagePort;
  private signal: Int32Array;
  private startupTimeoutMs: number;
  private nextId = 0;
  private stopped: string | null = null;

  constructor(options: SyncConverterOptions = {}) {
    const { port1, port2 } = new MessageChannel();
    this.signal = createSignal();
    this.port = port1;
    this.startupTimeoutMs = options.startupTimeoutMs ?? STARTUP_TIMEOUT_MS;

    this.worker = new Worker(options.entry ?? workerEntry(), {
      workerData: { port: port2, signal: this.signal },
      transferList: [port2],
    });
    this.worker.on('error', (error: unknown) => {
      this.stopped = `Conversion worker failed: ${errorMessage(error)}`;
    });
    this.worker.on('exit', (code: number) => {
      this.stopped ??= `Conversion worker exited with code ${code}`;
    });
    this.worker.unref();
  }

  private awaitStartup(): string | null {
    if (this.stopped) {
      return this.stopped;
    }
    if (Atomics.load(this.signal, STATE_SLOT) === STARTING) {
      Atomics.wait(this.signal, STATE_SLOT, STARTING, this.startupTimeoutMs);
    }

    switch (Atomics.load(this.signal, STATE_SLOT)) {
      case RUNNING:
        return null;
      case STARTING:
        this.stopped = `Conversion worker did not start within ${this.startupTimeoutMs}ms`;
        return this.stopped;
      default:
        this.stopped = 'Conversion worker stopped unexpectedly';
        return this.stopped;
    }
  }

  private call(call: ConversionCall): WireResult {
    const problem = this.awaitStartup();
    if (problem) {
      return [ERROR, problem];
    }

    const id = ++this.nextId;
    Atomics.store(this.signal, REPLY_SLOT, PENDING);
    this.worker.postMessage({ id, call });
    Atomics.wait(this.signal, REPLY_SLOT, PENDING);

    const received = receiveMessageOnPort(this.port);
    if (!received) {
      // Woken without a reply: the worker stopped mid-call
      this.stopped = 'Conversion worker stopped unexpectedly';
      return [ERROR, this.stopped];
    }

    const response = ResponseSchema.safeParse(received.message);
    if (!response.success) {
      return [ERROR, 'Conversion worker returned a malformed reply'];
    }
    if (response.data.id !== id) {
      return [ERROR, `Conversion worker replied to request ${response.data.id}, expected ${id}`];
    }
    return response.data.result;
  }

  vegaToSvg(spec: string): TextResult {
    return expectText(this.call({ operation: 'vega_to_svg', spec }));
  }

  vegaToHtml(spec: string, bundle: boolean = DEFAULT_PARAMS.bundle, renderer: string = DEFAULT_PARAMS.renderer): TextResult {
    return expectText(this.call({ operation: 'vega_to_html', spec, bundle, renderer }));
  }

  vegaToPng(spec: string, scale: number = DEFAULT_PARAMS.scale, ppi: number = DEFAULT_PARAMS.ppi): BinaryResult {
    return expectBinary(this.call({ operation: 'vega_to_png', spec, scale, ppi }));
  }

  vegaToJpeg(spec: string, scale: number = DEFAULT_PARAMS.scale, quality: number = DEFAULT_PARAMS.quality): BinaryResult {
    return expectBinary(this.call({ operation: 'vega_to_jpeg', spec, scale, quality }));
  }

  vegaToPdf(spec: string): BinaryResult {
    return expectBinary(this.call({ operation: 'vega_to_pdf', spec }));
  }

  vegaliteToSvg(spec: string): TextResult {
    return expectText(this.call({ operation: 'vegalite_to_svg', spec }));
  }

  vegaliteToHtml(spec: string, bundle: boolean = DEFAULT_PARAMS.bundle, renderer: string = DEFAULT_PARAMS.renderer): TextResult {
    return expectText(this.call({ operation: 'vegalite_to_html', spec, bundle, renderer }));
  }

  vegaliteToPng(spec: string, scale: number = DEFAULT_PARAMS.scale, ppi: number = DEFAULT_PARAMS.ppi): BinaryResult {
    return expectBinary(this.call({ operation: 'vegalite_to_png', spec, scale, ppi }));
  }

  vegaliteToJpeg(spec: string, scale: number = DEFAULT_PARAMS.scale, quality: number = DEFAULT_PARAMS.quality): BinaryResult {
    return expectBinary(this.call({ operation: 'vegalite_to_jpeg', spec, scale, quality }));
  }

  vegaliteToPdf(spec: string): BinaryResult {
    return expectBinary(this.call({ operation: 'vegalite_to_pdf', spec }));
  }

  vegaliteToVega(spec: string): TextResult {
    return expectText(this.call({ operation: 'vegalite_to_vega', spec }));
  }

  async close(): Promise<void> {
    this.stopped = 'SyncConverter is closed';
    this.port.close();
    await this.worker.terminate();
  }
}
