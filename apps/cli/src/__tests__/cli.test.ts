import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PipelineError } from '@linewright/contracts';
import type { DocumentFetcher } from '@linewright/layout-bridge';
import { HELP, run } from '../index.js';

type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

type SuccessEnvelope<TData> = {
  ok: true;
  command: string;
  data: TData;
  meta: {
    elapsedMs: number;
  };
};

type ErrorEnvelope = {
  ok: false;
  error: {
    code: string;
    message: string;
  };
};

type RenderData = {
  scrollY: number;
  entries: number;
  commands: Array<{ x: number; y: number; text: string; font: { size: number; weight: string; style: string } }>;
};

const PAGES: Record<string, string> = {
  'http://site.test/hello': '<!DOCTYPE html><p>Hello world</p>',
  'http://site.test/mixed': '<p>Hi <b>there</b></p>',
};

const stubFetcher: DocumentFetcher = async (url) => {
  const markup = PAGES[url];
  if (markup === undefined) {
    throw new PipelineError('TRANSPORT_ERROR', `No page at ${url}`);
  }
  return markup;
};

async function runCli(args: string[]): Promise<RunResult> {
  let stdout = '';
  let stderr = '';

  const code = await run(args, {
    stdout(message: string) {
      stdout += message;
    },
    stderr(message: string) {
      stderr += message;
    },
    fetchDocument: stubFetcher,
  });

  return { code, stdout, stderr };
}

function parseJsonOutput<T>(result: RunResult): T {
  const source = result.stdout.trim();
  if (!source) {
    throw new Error('No JSON output found.');
  }

  return JSON.parse(source) as T;
}

describe('linewright cli', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints help without a command', async () => {
    const result = await runCli([]);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(`${HELP}\n`);
  });

  it('prints help for --help even with a command', async () => {
    const result = await runCli(['render', '--help']);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(`${HELP}\n`);
  });

  describe('render', () => {
    it('prints the visible draw commands', async () => {
      const result = await runCli(['render', 'http://site.test/hello']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe(
        ['Drew 2 of 2 words (scroll 0)', '13 21.2 16/normal/roman Hello', '61 21.2 16/normal/roman world', ''].join(
          '\n',
        ),
      );
    });

    it('draws nothing after scrolling past the document', async () => {
      const result = await runCli(['render', 'http://site.test/hello', '--scroll', '100']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('Drew 0 of 2 words (scroll 100)\n');
    });

    it('emits a JSON envelope', async () => {
      const result = await runCli(['render', 'http://site.test/hello', '--json']);
      expect(result.code).toBe(0);

      const envelope = parseJsonOutput<SuccessEnvelope<RenderData>>(result);
      expect(envelope.ok).toBe(true);
      expect(envelope.command).toBe('render');
      expect(envelope.data.entries).toBe(2);
      expect(envelope.data.commands.map((command) => [command.x, command.text])).toEqual([
        [13, 'Hello'],
        [61, 'world'],
      ]);
      expect(envelope.data.commands[0].y).toBeCloseTo(21.2, 10);
      expect(envelope.data.commands[0].font).toEqual({ size: 16, weight: 'normal', style: 'roman' });
    });

    it('reports invalid viewport sizes as pipeline failures', async () => {
      const result = await runCli(['render', 'http://site.test/hello', '--width=20']);
      expect(result.code).toBe(2);
      expect(result.stderr).toBe('Error: Horizontal margins leave no room for text\n');
    });

    it('reports fetch failures with exit code 2', async () => {
      const result = await runCli(['render', 'http://site.test/missing']);
      expect(result.code).toBe(2);
      expect(result.stdout).toBe('');
      expect(result.stderr).toBe('Error: No page at http://site.test/missing\n');
    });

    it('reports failures as a JSON envelope under --json', async () => {
      const result = await runCli(['render', 'http://site.test/missing', '--json']);
      expect(result.code).toBe(2);
      expect(parseJsonOutput<ErrorEnvelope>(result)).toEqual({
        ok: false,
        error: { code: 'TRANSPORT_ERROR', message: 'No page at http://site.test/missing' },
      });
    });

    it('requires a url', async () => {
      const result = await runCli(['render']);
      expect(result.code).toBe(1);
      expect(result.stderr).toBe('Error: Usage: linewright render <url>\n');
    });
  });

  describe('tokens', () => {
    it('prints the token stream indented by depth', async () => {
      const result = await runCli(['tokens', 'http://site.test/mixed']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe(
        ['html', '  head', '  body', '    p', '      text "Hi "', '      b', '        text "there"', ''].join('\n'),
      );
    });

    it('includes index and depth in JSON output', async () => {
      const result = await runCli(['tokens', 'http://site.test/mixed', '--json']);
      const envelope = parseJsonOutput<SuccessEnvelope<{ tokens: Array<{ index: number; depth: number; tag: string }> }>>(
        result,
      );
      expect(envelope.data.tokens.map((token) => [token.index, token.depth, token.tag])).toEqual([
        [0, 0, 'html'],
        [1, 1, 'head'],
        [2, 1, 'body'],
        [3, 2, 'p'],
        [4, 3, 'text'],
        [5, 3, 'b'],
        [6, 4, 'text'],
      ]);
    });
  });

  describe('text', () => {
    it('prints text leaves one per line', async () => {
      const result = await runCli(['text', 'http://site.test/mixed']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('Hi \nthere\n');
    });
  });

  it('rejects unknown commands and shows help', async () => {
    const result = await runCli(['frobnicate']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe(`Error: Unknown command: frobnicate\n${HELP}\n`);
  });

  it('rejects unknown options', async () => {
    const result = await runCli(['render', 'http://site.test/hello', '--zoom', '2']);
    expect(result.code).toBe(1);
    expect(result.stderr).toBe('Error: Unknown option --zoom\n');
  });
});
