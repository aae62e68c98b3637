import path from 'node:path';
import { DEFAULT_CONCURRENCY, DEFAULT_USER_AGENT } from './crawler.js';
import { isDigestAlgorithm } from './digest.js';
import { ConfigError } from './errors.js';
import { DEFAULT_LINK_SELECTOR } from './listing.js';
import { outputRoot } from './paths.js';
import type { CrawlConfig, UrlRewrite } from './types.js';

export const DEFAULT_MANIFEST_FILE = 'repository_sha256.csv';

export type CliConfig = {
  crawl: CrawlConfig;
  outputDir: string;
  manifestFile: string; // absolute
  reportFile: string; // absolute
  download: boolean;
};

function flagValue(argv: string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const idx = argv.indexOf(name);
    if (idx >= 0 && argv[idx + 1] && !argv[idx + 1].startsWith('-')) return argv[idx + 1];
  }
  return undefined;
}

// --url/-u, or the first positional argument that looks like an URL
function getCliUrl(argv: string[]): string | undefined {
  const explicit = flagValue(argv, '--url', '-u');
  if (explicit) return explicit;
  return argv.find((a) => /^https?:\/\//i.test(a));
}

function parseInteger(name: string, raw: string | undefined, min: number): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${JSON.stringify(raw)}`);
  }
  return value;
}

function parseBoolean(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true';
}

/**
 * `find=>replace` pairs separated by ';', e.g. `/src/branch/=>/raw/branch/`.
 */
export function parseRewrites(raw: string | undefined): UrlRewrite[] {
  if (!raw?.trim()) return [];
  return raw
    .split(';')
    .filter((part) => part.trim())
    .map((part) => {
      const idx = part.indexOf('=>');
      if (idx <= 0) throw new ConfigError(`FILE_URL_REWRITE entry must look like find=>replace, got ${JSON.stringify(part)}`);
      return { find: part.slice(0, idx).trim(), replace: part.slice(idx + 2).trim() };
    });
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const rootUrl = getCliUrl(argv) || env.ROOT_URL;
  if (!rootUrl) throw new ConfigError('Missing root URL (pass it as an argument, --url or ROOT_URL)');

  const algorithm = env.DIGEST_ALGORITHM?.trim().toLowerCase() || 'sha256';
  if (!isDigestAlgorithm(algorithm)) throw new ConfigError(`Unsupported DIGEST_ALGORITHM: ${algorithm}`);

  const outFlag = flagValue(argv, '--out', '-o');
  const outputDir = outFlag ? path.resolve(outFlag) : outputRoot(env);
  const manifestFile = path.resolve(outputDir, env.MANIFEST_FILE || DEFAULT_MANIFEST_FILE);

  return {
    crawl: {
      rootUrl,
      concurrency: parseInteger('CONCURRENCY', flagValue(argv, '--concurrency', '-c') ?? env.CONCURRENCY, 1) ?? DEFAULT_CONCURRENCY,
      maxDepth: parseInteger('MAX_DEPTH', flagValue(argv, '--max-depth') ?? env.MAX_DEPTH, 0),
      maxPages: parseInteger('MAX_PAGES', env.MAX_PAGES, 1),
      algorithm,
      timeoutMs: parseInteger('TIMEOUT_MS', env.TIMEOUT_MS, 1) ?? 30000,
      retries: parseInteger('RETRIES', env.RETRIES, 0) ?? 2,
      retryDelayMs: parseInteger('RETRY_DELAY_MS', env.RETRY_DELAY_MS, 0) ?? 1000,
      delayMs: parseInteger('DELAY_MS', env.DELAY_MS, 0) ?? 0,
      userAgent: env.USER_AGENT || DEFAULT_USER_AGENT,
      linkSelector: env.LINK_SELECTOR || DEFAULT_LINK_SELECTOR,
      dirSelector: env.LISTING_DIR_SELECTOR?.trim() || undefined,
      fileUrlRewrites: parseRewrites(env.FILE_URL_REWRITE)
    },
    outputDir,
    manifestFile,
    reportFile: path.join(outputDir, 'report.json'),
    download: argv.includes('--download') || parseBoolean(env.DOWNLOAD)
  };
}
