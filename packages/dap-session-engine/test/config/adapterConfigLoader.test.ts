import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AdapterConfigLoader } from '../../src/config/adapterConfigLoader';
import { createMockLogger } from '../mocks/mockLogger';

describe('AdapterConfigLoader', () => {
  let tempDir: string;
  let loader: AdapterConfigLoader;

  const writeConfig = (name: string, content: string): string => {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf8');
    return file;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'adapter-config-'));
    loader = new AdapterConfigLoader(createMockLogger());
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads every adapter with its type from the key', () => {
    const file = writeConfig(
      'adapters.json',
      JSON.stringify({
        adapters: {
          python: { command: 'python', args: ['-m', 'debugpy.adapter'] },
          mock: {
            command: 'mock-adapter',
            env: { MOCK_LEVEL: 'debug' },
            cwd: '/tmp',
          },
        },
      }),
    );

    expect(loader.loadFromFile(file)).to.deep.equal([
      { type: 'python', command: 'python', args: ['-m', 'debugpy.adapter'] },
      {
        type: 'mock',
        command: 'mock-adapter',
        env: { MOCK_LEVEL: 'debug' },
        cwd: '/tmp',
      },
    ]);
  });

  it('finds one adapter by type', () => {
    const file = writeConfig(
      'adapters.json',
      JSON.stringify({ adapters: { go: { command: 'dlv', args: ['dap'] } } }),
    );

    expect(loader.loadAdapter(file, 'go')).to.deep.equal({
      type: 'go',
      command: 'dlv',
      args: ['dap'],
    });
    expect(() => loader.loadAdapter(file, 'python')).to.throw(
      `No adapter of type 'python' in ${file}`,
    );
  });

  it('fails for a missing file', () => {
    const file = path.join(tempDir, 'missing.json');

    expect(() => loader.loadFromFile(file)).to.throw(
      `Failed to load adapter configurations: Adapter configuration file not found: ${file}`,
    );
  });

  it('fails without an adapters object', () => {
    const file = writeConfig('bad.json', JSON.stringify({ adapters: [] }));

    expect(() => loader.loadFromFile(file)).to.throw(
      'missing or invalid "adapters" property',
    );
  });

  it('fails for an adapter without a command', () => {
    const file = writeConfig(
      'bad.json',
      JSON.stringify({ adapters: { node: { args: ['x'] } } }),
    );

    expect(() => loader.loadFromFile(file)).to.throw(
      'adapters.node.command must be a non-empty string',
    );
  });

  it('fails for non-string args', () => {
    const file = writeConfig(
      'bad.json',
      JSON.stringify({ adapters: { node: { command: 'node', args: [1] } } }),
    );

    expect(() => loader.loadFromFile(file)).to.throw(
      'adapters.node.args must be an array of strings',
    );
  });
});
