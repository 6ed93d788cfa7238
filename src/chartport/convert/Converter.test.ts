import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../config/Config.js';
import { FAKE_JPEG, FAKE_PDF, FAKE_PNG, FAKE_SVG, FAKE_VEGA, FakeEngine } from '../testing/FakeEngine.js';
import { silentLogger } from '../util/Logger.js';
import { Converter } from './Converter.js';
import { BinaryResult, TextResult } from './types.js';

function setup(failWith?: string) {
  const engines: FakeEngine[] = [];
  const converter = new Converter({
    config: DEFAULT_CONFIG,
    logger: silentLogger,
    createEngine: () => {
      const engine = new FakeEngine(failWith);
      engines.push(engine);
      return engine;
    },
  });
  return { converter, engines };
}

type Operation = (converter: Converter, spec: string) => Promise<TextResult | BinaryResult>;

const vegaOperations: [string, Operation][] = [
  ['vegaToSvg', (c, s) => c.vegaToSvg(s)],
  ['vegaToHtml', (c, s) => c.vegaToHtml(s)],
  ['vegaToPng', (c, s) => c.vegaToPng(s)],
  ['vegaToJpeg', (c, s) => c.vegaToJpeg(s)],
  ['vegaToPdf', (c, s) => c.vegaToPdf(s)],
];

const vegaliteOperations: [string, Operation][] = [
  ['vegaliteToSvg', (c, s) => c.vegaliteToSvg(s)],
  ['vegaliteToHtml', (c, s) => c.vegaliteToHtml(s)],
  ['vegaliteToPng', (c, s) => c.vegaliteToPng(s)],
  ['vegaliteToJpeg', (c, s) => c.vegaliteToJpeg(s)],
  ['vegaliteToPdf', (c, s) => c.vegaliteToPdf(s)],
  ['vegaliteToVega', (c, s) => c.vegaliteToVega(s)],
];

describe('Converter', () => {
  describe('spec intake', () => {
    it.each(vegaOperations)('%s rejects text that is not JSON without touching the engine', async (_name, run) => {
      const { converter, engines } = setup();
      expect(await run(converter, 'not json')).toEqual(['error', 'Vega spec is not valid JSON']);
      expect(engines).toHaveLength(0);
    });

    it.each(vegaliteOperations)('%s rejects text that is not JSON without touching the engine', async (_name, run) => {
      const { converter, engines } = setup();
      expect(await run(converter, '{"mark":')).toEqual(['error', 'VegaLite spec is not valid JSON']);
      expect(engines).toHaveLength(0);
    });
  });

  describe('option resolution', () => {
    it('fails on an unknown renderer before any engine is created', async () => {
      const { converter, engines } = setup();
      expect(await converter.vegaToHtml('{}', true, 'webgl')).toEqual(['error', 'Invalid renderer provided']);
      expect(await converter.vegaliteToHtml('{}', false, 'webgl')).toEqual(['error', 'Invalid renderer provided']);
      expect(engines).toHaveLength(0);
    });

    it('applies the documented defaults', async () => {
      const { converter, engines } = setup();
      await converter.vegaToPng('{}');
      await converter.vegaToJpeg('{}');
      await converter.vegaliteToHtml('{}');

      expect(engines[0].calls[0].args).toEqual([{ showWarnings: false }, 1, 72]);
      expect(engines[1].calls[0].args).toEqual([{ showWarnings: false }, 1, 90]);
      expect(engines[2].calls[0].args).toEqual([{ vlVersion: '5.21', showWarnings: false }, true, 'svg']);
    });

    it('passes numeric parameters to the engine unchanged', async () => {
      const { converter, engines } = setup();
      await converter.vegaliteToJpeg('{}', 2, 150);
      await converter.vegaliteToPng('{}', 0.5, 300);

      expect(engines[0].calls[0]).toEqual({
        method: 'vegaliteToJpeg',
        spec: {},
        args: [{ vlVersion: '5.21', showWarnings: false }, 2, 150],
      });
      expect(engines[1].calls[0].args).toEqual([{ vlVersion: '5.21', showWarnings: false }, 0.5, 300]);
    });

    it('forwards the bundle flag and renderer', async () => {
      const { converter, engines } = setup();
      await converter.vegaToHtml('{}', false, 'canvas');
      expect(engines[0].calls[0].args).toEqual([{ showWarnings: false }, false, 'canvas']);
    });

    it('takes the warning setting from the configuration', async () => {
      const engine = new FakeEngine();
      const converter = new Converter({
        config: { ...DEFAULT_CONFIG, showWarnings: true },
        logger: silentLogger,
        createEngine: () => engine,
      });
      await converter.vegaliteToSvg('{}');
      expect(engine.calls[0].args).toEqual([{ vlVersion: '5.21', showWarnings: true }]);
    });
  });

  describe('dispatch', () => {
    it('routes each operation to its engine method with the parsed spec', async () => {
      const { converter, engines } = setup();
      await converter.vegaToSvg('{"marks": []}');
      await converter.vegaliteToPdf('{"mark": "bar"}');

      expect(engines[0].calls).toEqual([{ method: 'vegaToSvg', spec: { marks: [] }, args: [{ showWarnings: false }] }]);
      expect(engines[1].calls[0].method).toBe('vegaliteToPdf');
      expect(engines[1].calls[0].spec).toEqual({ mark: 'bar' });
    });

    it('uses a fresh engine for every call', async () => {
      const { converter, engines } = setup();
      await converter.vegaToSvg('{}');
      await converter.vegaToSvg('{}');

      expect(engines).toHaveLength(2);
      expect(engines[0]).not.toBe(engines[1]);
      expect(engines[0].calls).toHaveLength(1);
      expect(engines[1].calls).toHaveLength(1);
    });

    it('hands spec validation to the engine', async () => {
      const { converter, engines } = setup();
      expect(await converter.vegaToSvg('42')).toEqual(['ok', FAKE_SVG]);
      expect(engines[0].calls[0].spec).toBe(42);
    });
  });

  describe('results', () => {
    it('returns text payloads', async () => {
      const { converter } = setup();
      expect(await converter.vegaliteToSvg('{}')).toEqual(['ok', FAKE_SVG]);
    });

    it('serializes compiled Vega as JSON text', async () => {
      const { converter } = setup();
      const result = await converter.vegaliteToVega('{"mark": "bar"}');
      expect(result).toEqual(['ok', JSON.stringify(FAKE_VEGA)]);
      if (result[0] === 'ok') {
        expect(JSON.parse(result[1])).toEqual(FAKE_VEGA);
      }
    });

    it('returns binary payloads as bytes', async () => {
      const { converter } = setup();
      expect(await converter.vegaToPng('{}')).toEqual(['ok', FAKE_PNG]);
      expect(await converter.vegaliteToJpeg('{}')).toEqual(['ok', FAKE_JPEG]);
      expect(await converter.vegaToPdf('{}')).toEqual(['ok', FAKE_PDF]);
    });

    it('passes the engine message through unchanged when the engine fails', async () => {
      const message = 'Invalid specification {"mark":"bar"}. Make sure the specification includes at least one of the following properties: "mark", "layer"';
      const { converter, engines } = setup(message);

      expect(await converter.vegaliteToSvg('{"mark":"bar"}')).toEqual(['error', message]);
      expect(await converter.vegaliteToPng('{"mark":"bar"}')).toEqual(['error', message]);
      expect(engines).toHaveLength(2);
    });
  });
});
