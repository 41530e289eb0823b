#!/usr/bin/env node
/**
 * CLI entry point for image-extract
 */
import 'dotenv/config';
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { loadConfig } from './config.js';
import { createRuntime, type Runtime } from './runtime.js';
import { createApp, startServer, stopServer } from './server.js';
import { toErrorResponse } from './errors.js';
import type { ExtractionResult } from './extract/types.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

interface ExtractCliOptions {
  command: 'extract';
  url: string;
  json: boolean;
  size?: string;
  format?: string;
  maxImages?: number;
  /** Seconds */
  timeout?: number;
}

interface PlatformsCliOptions {
  command: 'platforms';
  json: boolean;
}

interface ServeCliOptions {
  command: 'serve';
  port?: number;
}

export type CliOptions = ExtractCliOptions | PlatformsCliOptions | ServeCliOptions;

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let json = false;
  let size: string | undefined;
  let format: string | undefined;
  let maxImages: number | undefined;
  let timeout: number | undefined;
  let port: number | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--size':
        if (i + 1 >= args.length) return { kind: 'error', message: '--size requires a value' };
        size = args[++i];
        break;
      case '--format':
        if (i + 1 >= args.length) return { kind: 'error', message: '--format requires a value' };
        format = args[++i];
        break;
      case '--max-images': {
        if (i + 1 >= args.length)
          return { kind: 'error', message: '--max-images requires a value' };
        const v = Number(args[++i]);
        if (!Number.isInteger(v) || v <= 0)
          return { kind: 'error', message: '--max-images must be a positive integer' };
        maxImages = v;
        break;
      }
      case '--timeout': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--timeout requires a value' };
        const v = Number(args[++i]);
        if (!Number.isFinite(v) || v <= 0)
          return { kind: 'error', message: '--timeout must be a positive number (seconds)' };
        timeout = v;
        break;
      }
      case '--port': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--port requires a value' };
        const v = Number(args[++i]);
        if (!Number.isInteger(v) || v < 0 || v > 65535)
          return { kind: 'error', message: '--port must be an integer between 0 and 65535' };
        port = v;
        break;
      }
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional[0] === 'platforms') {
    return { kind: 'ok', opts: { command: 'platforms', json }, warnings };
  }

  if (positional[0] === 'serve') {
    return { kind: 'ok', opts: { command: 'serve', port }, warnings };
  }

  if (positional.length === 0) {
    return { kind: 'error', message: 'Missing required <url> argument' };
  }

  return {
    kind: 'ok',
    opts: { command: 'extract', url: positional[0], json, size, format, maxImages, timeout },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: image-extract <url> [options]
       image-extract platforms [--json]
       image-extract serve [--port <n>]

Prints the direct image URLs behind a photo or album page.

Options:
  --json              Full JSON output (platform, type, images, metadata)
  --size <size>       Preferred size: thumbnail, small, medium, large, original
  --format <format>   json (default) or detailed (extra metadata)
  --max-images <n>    Cap the number of images returned
  --timeout <sec>     Overall extraction timeout in seconds (default: 30)
  --port <n>          Port for serve (env: PORT, default: 3000)
  -v, --version       Show version number
  -h, --help          Show this help message

Environment:
  FLICKR_API_KEY      Required for Flickr URLs
  LOG_LEVEL           pino log level (logs go to stderr)`);
}

function toRequestOptions(opts: ExtractCliOptions): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  if (opts.size !== undefined) options.size = opts.size;
  if (opts.format !== undefined) options.format = opts.format;
  if (opts.maxImages !== undefined) options.max_images = opts.maxImages;
  if (opts.timeout !== undefined) options.timeout = opts.timeout;
  return options;
}

function printResult(result: ExtractionResult): void {
  console.log(`Platform: ${result.platform} (${result.type})`);
  const title = result.metadata.title ?? result.images[0]?.title;
  if (typeof title === 'string' && title) console.log(`Title: ${title}`);
  console.log(`Images: ${result.images.length}`);
  console.log('---');
  for (const image of result.images) {
    const dimensions =
      image.width !== undefined && image.height !== undefined
        ? ` ${image.width}x${image.height}`
        : '';
    const label = image.size_label ? ` ${image.size_label}` : '';
    console.log(`${image.url}${dimensions}${label}`);
  }
}

async function runExtract(runtime: Runtime, opts: ExtractCliOptions): Promise<number> {
  try {
    const result = await runtime.service.extract(opts.url, toRequestOptions(opts));
    if (opts.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printResult(result);
    }
    return 0;
  } catch (error) {
    const { body } = toErrorResponse(error);
    if (opts.json) {
      console.log(JSON.stringify(body, null, 2));
    } else {
      console.error(`Error: ${body.message}`);
      console.error(`Hint: ${body.hint}`);
    }
    return 1;
  }
}

async function runServe(runtime: Runtime, port: number): Promise<number> {
  const server = await startServer(createApp(runtime.service), port);
  await new Promise<void>((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });
  await stopServer(server);
  return 0;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(args);

  switch (result.kind) {
    case 'version':
      console.log(`image-extract ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  let runtime: Runtime;
  try {
    runtime = createRuntime(loadConfig());
  } catch (error) {
    console.error(`Error: ${toErrorResponse(error).body.message}`);
    return 1;
  }

  try {
    switch (opts.command) {
      case 'platforms': {
        const platforms = runtime.service.getSupportedPlatforms();
        console.log(opts.json ? JSON.stringify({ platforms }) : platforms.join('\n'));
        return 0;
      }
      case 'serve':
        return await runServe(runtime, opts.port ?? runtime.config.server.port);
      case 'extract':
        return await runExtract(runtime, opts);
    }
  } finally {
    await runtime.close();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's native library holds libuv references that keep the
      // event loop alive after cleanup.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
