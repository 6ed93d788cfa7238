import { afterAll, describe, it, expect } from 'vitest';
import { SyncConverter, workerEntry } from './SyncConverter.js';

const RECT = JSON.stringify({
  width: 20,
  height: 10,
  marks: [{
    type: 'rect',
    encode: {
      enter: {
        width: { value: 20 },
        height: { value: 10 },
        fill: { value: 'steelblue' },
      },
    },
  }],
});

describe('workerEntry', () => {
  it('goes through the tsx bootstrap when running from sources', () => {
    expect(workerEntry('file:///srv/chartport/src/chartport/convert/SyncConverter.ts').href)
      .toBe('file:///srv/chartport/src/chartport/convert/load-worker.mjs');
  });

  it('loads the compiled worker directly', () => {
    expect(workerEntry('file:///srv/chartport/dist/chartport/convert/SyncConverter.js').href)
      .toBe('file:///srv/chartport/dist/chartport/convert/ConversionWorker.js');
  });
});

describe('SyncConverter', () => {
  const converter = new SyncConverter();

  afterAll(async () => {
    await converter.close();
  });

  it('returns text results from the worker', () => {
    expect(converter.vegaToSvg('not json')).toEqual(['error', 'Vega spec is not valid JSON']);

    const svg = converter.vegaToSvg(RECT);
    expect(svg[0]).toBe('ok');
    expect(svg[0] === 'ok' && svg[1].startsWith('<svg')).toBe(true);
  }, 60_000);

  it('returns binary results from the worker', () => {
    const png = converter.vegaToPng(RECT, 2, 72);
    expect(png[0]).toBe('ok');
    if (png[0] === 'ok') {
      expect(png[1]).toBeInstanceOf(Uint8Array);
      expect(Array.from(png[1].slice(0, 4))).toEqual([0x89, 0x50, 0x4e, 0x47]);
    }
  }, 60_000);

  it('leaves numeric checks to the engine', () => {
    expect(converter.vegaToPng(RECT, NaN, 72))
      .toEqual(['error', 'Scale factor must be a positive number, received NaN']);
    expect(converter.vegaliteToHtml('{}', true, 'webgl')).toEqual(['error', 'Invalid renderer provided']);
  }, 60_000);

  it('answers with an error once closed', async () => {
    const closing = new SyncConverter();
    await closing.close();
    expect(closing.vegaToSvg(RECT)).toEqual(['error', 'SyncConverter is closed']);
  });

  it('gives up on a worker that never starts', async () => {
    const idle = new SyncConverter({
      entry: new URL('../testing/idle-worker.mjs', import.meta.url),
      startupTimeoutMs: 200,
    });
    expect(idle.vegaToSvg(RECT)).toEqual(['error', 'Conversion worker did not start within 200ms']);
    expect(idle.vegaToPdf(RECT)).toEqual(['error', 'Conversion worker did not start within 200ms']);
    await idle.close();
  });
});
