import { describe, it, expect } from 'vitest';
import { FAKE_HTML, FAKE_PDF, FakeEngine } from '../testing/FakeEngine.js';
import { dispatchBinary, dispatchText, errorMessage } from './ConversionDispatcher.js';
import { ConversionConfig, OPERATIONS } from './types.js';

const config: ConversionConfig = {
  vlVersion: '5.21',
  renderer: 'canvas',
  bundle: false,
  scale: 2,
  ppi: 144,
  quality: 80,
  showWarnings: true,
};

class StringRejectingEngine extends FakeEngine {
  override vegaToSvg(): Promise<string> {
    return Promise.reject('plain failure');
  }
}

describe('dispatchText', () => {
  it('passes the resolved HTML options', async () => {
    const engine = new FakeEngine();
    const outcome = await dispatchText(engine, OPERATIONS.vegalite_to_html, { mark: 'point' }, config);

    expect(outcome).toEqual({ success: true, data: FAKE_HTML });
    expect(engine.calls).toEqual([{
      method: 'vegaliteToHtml',
      spec: { mark: 'point' },
      args: [{ vlVersion: '5.21', showWarnings: true }, false, 'canvas'],
    }]);
  });

  it('captures engine errors as failures', async () => {
    const outcome = await dispatchText(new FakeEngine('compile failed'), OPERATIONS.vega_to_svg, {}, config);
    expect(outcome).toEqual({ success: false, error: 'compile failed' });
  });

  it('stringifies rejections that are not errors', async () => {
    const outcome = await dispatchText(new StringRejectingEngine(), OPERATIONS.vega_to_svg, {}, config);
    expect(outcome).toEqual({ success: false, error: 'plain failure' });
  });
});

describe('dispatchBinary', () => {
  it('passes scale and ppi for PNG', async () => {
    const engine = new FakeEngine();
    await dispatchBinary(engine, OPERATIONS.vega_to_png, {}, config);
    expect(engine.calls[0]).toEqual({ method: 'vegaToPng', spec: {}, args: [{ showWarnings: true }, 2, 144] });
  });

  it('passes scale and quality for JPEG', async () => {
    const engine = new FakeEngine();
    await dispatchBinary(engine, OPERATIONS.vegalite_to_jpeg, {}, config);
    expect(engine.calls[0].args).toEqual([{ vlVersion: '5.21', showWarnings: true }, 2, 80]);
  });

  it('returns the PDF bytes', async () => {
    expect(await dispatchBinary(new FakeEngine(), OPERATIONS.vega_to_pdf, {}, config)).toEqual({ success: true, data: FAKE_PDF });
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('nope'))).toBe('nope');
    expect(errorMessage(404)).toBe('404');
  });
});
