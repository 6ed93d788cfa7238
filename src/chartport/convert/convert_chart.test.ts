import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../config/Config.js';
import { FAKE_PNG, FAKE_SVG, FakeEngine } from '../testing/FakeEngine.js';
import { silentLogger } from '../util/Logger.js';
import { Converter } from './Converter.js';
import { CliIO, USAGE, runCli } from './convert_chart.js';

function memoryIO(files: Record<string, string>) {
  const written = new Map<string, string | Uint8Array>();
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file, open '${path}'`);
      }
      return content;
    },
    writeFile: async (path, data) => { written.set(path, data); },
    stdout: (text) => { out.push(text); },
    stderr: (text) => { err.push(text); },
  };
  return { io, written, stdout: () => out.join(''), stderr: () => err.join('') };
}

function setup(files: Record<string, string> = { 'in.json': '{}' }) {
  const engine = new FakeEngine();
  const converter = new Converter({ config: DEFAULT_CONFIG, logger: silentLogger, createEngine: () => engine });
  return { engine, converter, ...memoryIO(files) };
}

describe('runCli', () => {
  it('prints text output to stdout', async () => {
    const { io, converter, stdout, stderr } = setup();
    expect(await runCli(['vega', 'svg', 'in.json'], io, converter)).toBe(0);
    expect(stdout()).toBe(`${FAKE_SVG}\n`);
    expect(stderr()).toBe('');
  });

  it('writes to --output when given', async () => {
    const { io, converter, written, stderr } = setup();
    expect(await runCli(['vega-lite', 'png', 'in.json', '-o', 'out.png'], io, converter)).toBe(0);
    expect(written.get('out.png')).toEqual(FAKE_PNG);
    expect(stderr()).toBe('Written: out.png\n');
  });

  it('requires --output for binary formats', async () => {
    const { io, converter, engine, stderr } = setup();
    expect(await runCli(['vega', 'png', 'in.json'], io, converter)).toBe(1);
    expect(stderr()).toBe('Error: png output is binary, pass --output <file>\n');
    expect(engine.calls).toHaveLength(0);
  });

  it('forwards numeric options and the bundle flag', async () => {
    const { io, converter, engine } = setup();
    await runCli(['vega-lite', 'jpeg', 'in.json', '--output', 'x.jpg', '--scale', '2', '--quality', '150'], io, converter);
    await runCli(['vega', 'html', 'in.json', '--no-bundle', '--renderer', 'canvas'], io, converter);

    expect(engine.calls[0].args).toEqual([{ vlVersion: '5.21', showWarnings: false }, 2, 150]);
    expect(engine.calls[1].args).toEqual([{ showWarnings: false }, false, 'canvas']);
  });

  it('reports conversion failures', async () => {
    const { io, converter, stderr } = setup({ 'in.json': 'nope' });
    expect(await runCli(['vega', 'svg', 'in.json'], io, converter)).toBe(1);
    expect(stderr()).toBe('Error: Vega spec is not valid JSON\n');
  });

  it('reports an unknown renderer', async () => {
    const { io, converter, stderr } = setup();
    expect(await runCli(['vega', 'html', 'in.json', '--renderer', 'webgl'], io, converter)).toBe(1);
    expect(stderr()).toBe('Error: Invalid renderer provided\n');
  });

  it('only compiles Vega-Lite to Vega', async () => {
    const { io, converter, stderr } = setup();
    expect(await runCli(['vega', 'vega', 'in.json'], io, converter)).toBe(1);
    expect(stderr()).toBe('Error: Only Vega-Lite specs compile to Vega\n');
  });

  it('rejects non-numeric options', async () => {
    const { io, converter, stderr } = setup();
    expect(await runCli(['vega', 'png', 'in.json', '-o', 'x.png', '--quality', 'abc'], io, converter)).toBe(1);
    expect(stderr()).toBe('Error: --quality expects a number, got: abc\n');
  });

  it('prints usage for a wrong argument count', async () => {
    const { io, converter, stderr } = setup();
    expect(await runCli(['vega', 'svg'], io, converter)).toBe(1);
    expect(stderr()).toBe(`${USAGE}\n`);
  });

  it('rejects unknown grammars and formats', async () => {
    const { io, converter, stderr } = setup();
    expect(await runCli(['vega', 'gif', 'in.json'], io, converter)).toBe(1);
    expect(stderr()).toBe(`Error: unknown grammar or format\n${USAGE}\n`);
  });

  it('reports unreadable input files', async () => {
    const { io, converter, stderr } = setup({});
    expect(await runCli(['vega', 'svg', 'missing.json'], io, converter)).toBe(1);
    expect(stderr()).toBe("Error: ENOENT: no such file, open 'missing.json'\n");
  });
});
