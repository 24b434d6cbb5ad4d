import { fontKeyToString, type ViewportConfig } from '@linewright/contracts';
import type { DocumentFetcher } from '@linewright/layout-bridge';
import { configureMeasurement } from '@linewright/measuring-dom';
import { render, type RenderResult } from './commands/render.js';
import { text } from './commands/text.js';
import { tokens, type TokensResult } from './commands/tokens.js';
import { parseArgs, type ParsedArgs } from './lib/args.js';
import { CliError, toCliError } from './lib/errors.js';

export const HELP = `
linewright — lay out and render HTML text in your terminal

Commands:
  render <url>     Print the draw commands of the visible viewport
  tokens <url>     Print the document-order token stream
  text <url>       Print the text leaves

URLs may use http:, https: or file:.

Options:
  --width <px>          Viewport width (default 800)
  --height <px>         Viewport height (default 600)
  --scroll <px>         Scroll down before drawing (render only)
  --style-mode <mode>   flat (default) or nested
  --json                Machine-readable output
  --help                Show this message

Examples:
  linewright render https://example.com/
  linewright render file:///tmp/page.html --width 400 --scroll 200
  linewright tokens file:///tmp/page.html --json

Set LW_DEBUG_LAYOUT=1 to trace layout passes.
`;

export type CliIo = {
  stdout(message: string): void;
  stderr(message: string): void;
  /** Overrides how URLs are fetched. */
  fetchDocument?: DocumentFetcher;
};

type SuccessEnvelope = {
  ok: true;
  command: string;
  data: unknown;
  meta: { elapsedMs: number };
};

type ErrorEnvelope = {
  ok: false;
  error: { code: string; message: string };
};

const formatNumber = (value: number): string => String(Number(value.toFixed(2)));

function formatRenderResult(result: RenderResult): string {
  const lines: string[] = [];

  lines.push(`Drew ${result.commands.length} of ${result.entries} words (scroll ${formatNumber(result.scrollY)})`);
  for (const command of result.commands) {
    lines.push(`${formatNumber(command.x)} ${formatNumber(command.y)} ${fontKeyToString(command.font)} ${command.text}`);
  }

  return lines.join('\n');
}

function formatTokensResult(result: TokensResult): string {
  return result.tokens
    .map((token) => {
      const indent = '  '.repeat(token.depth);
      return token.text === undefined ? `${indent}${token.tag}` : `${indent}${token.tag} ${JSON.stringify(token.text)}`;
    })
    .join('\n');
}

function viewportOverrides(args: ParsedArgs): Partial<ViewportConfig> {
  const overrides: Partial<ViewportConfig> = {};
  if (args.width !== undefined) overrides.width = args.width;
  if (args.height !== undefined) overrides.height = args.height;
  return overrides;
}

function requireUrl(args: ParsedArgs): string {
  const [url] = args.positionals;
  if (url === undefined) {
    throw new CliError('MISSING_REQUIRED', `Usage: linewright ${args.command ?? '<command>'} <url>`);
  }
  return url;
}

async function execute(args: ParsedArgs, io: CliIo): Promise<{ data: unknown; pretty: string }> {
  switch (args.command) {
    case 'render': {
      const result = await render(requireUrl(args), {
        fetchDocument: io.fetchDocument,
        viewport: viewportOverrides(args),
        styleMode: args.styleMode,
        scroll: args.scroll,
      });
      return { data: result, pretty: formatRenderResult(result) };
    }

    case 'tokens': {
      const result = await tokens(requireUrl(args), io.fetchDocument);
      return { data: result, pretty: formatTokensResult(result) };
    }

    case 'text': {
      const result = await text(requireUrl(args), io.fetchDocument);
      return { data: result, pretty: result.texts.join('\n') };
    }

    default:
      throw new CliError('UNKNOWN_COMMAND', `Unknown command: ${args.command ?? ''}`);
  }
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 * Resolves with the process exit code; never throws.
 */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  const started = performance.now();
  const wantsJson = argv.includes('--json');

  try {
    const args = parseArgs(argv);
    if (args.help || args.command === undefined) {
      io.stdout(`${HELP}\n`);
      return 0;
    }

    // No canvas outside a browser: measure with fixed ratios.
    configureMeasurement({ mode: 'deterministic' });

    const { data, pretty } = await execute(args, io);
    if (args.json) {
      const envelope: SuccessEnvelope = {
        ok: true,
        command: args.command,
        data,
        meta: { elapsedMs: Math.round(performance.now() - started) },
      };
      io.stdout(`${JSON.stringify(envelope, null, 2)}\n`);
    } else {
      io.stdout(`${pretty}\n`);
    }
    return 0;
  } catch (error) {
    const cliError = toCliError(error);
    if (wantsJson) {
      const envelope: ErrorEnvelope = { ok: false, error: { code: cliError.code, message: cliError.message } };
      io.stdout(`${JSON.stringify(envelope, null, 2)}\n`);
    } else {
      io.stderr(`Error: ${cliError.message}\n`);
      if (cliError.code === 'UNKNOWN_COMMAND') {
        io.stderr(`${HELP}\n`);
      }
    }
    return cliError.exitCode;
  }
}
