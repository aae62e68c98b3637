#!/usr/bin/env node
import 'dotenv/config';
import path from 'node:path';
import { loadConfig, type CliConfig } from './config.js';
import { Crawler } from './crawler.js';
import { EmptyCrawlError, getErrorMessage } from './errors.js';
import { writeManifestCsv } from './export_csv.js';
import { FileMirror, writeJson } from './storage.js';
import type { CrawlReport } from './types.js';

async function main() {
  const [cmd, ...args] = process.argv.slice(2);
  switch (cmd) {
    case 'crawl':
      await runCrawl(args);
      break;
    case 'help':
    default:
      printHelp();
  }
}

async function writeOutputs(cfg: CliConfig, report: CrawlReport) {
  await writeManifestCsv(report.manifest, cfg.manifestFile);
  writeJson(cfg.reportFile, {
    rootUrl: report.rootUrl,
    algorithm: report.manifest.algorithm,
    summary: report.manifest.summary,
    visitedCount: report.visitedCount,
    listingsExpanded: report.listingsExpanded,
    listingsSkipped: report.listingsSkipped,
    cancelled: report.cancelled,
    durationMs: report.durationMs,
    failures: report.manifest.failures
  });
  console.log(`[crawl] saved: ${cfg.manifestFile}, ${cfg.reportFile}`);
}

async function runCrawl(args: string[]) {
  const cfg = loadConfig(args, process.env);
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.warn('[crawl] interrupted; letting in-flight requests settle');
    controller.abort();
  });

  const sink = cfg.download ? new FileMirror(path.join(cfg.outputDir, 'files')) : undefined;
  const crawler = new Crawler({ ...cfg.crawl, signal: controller.signal }, { sink });

  let report: CrawlReport;
  try {
    report = await crawler.crawl();
  } catch (err) {
    if (err instanceof EmptyCrawlError) await writeOutputs(cfg, err.report);
    throw err;
  }

  await writeOutputs(cfg, report);
  const { summary } = report.manifest;
  console.log(`[crawl] files: ${summary.succeeded}/${summary.total}, bytes: ${summary.bytes}`);
  for (const f of report.manifest.failures) {
    if (f.status === 'error') console.warn(`[crawl] fail: ${f.path} (${f.errorKind}) ${f.error}`);
  }
  if (summary.failed > 0 || report.cancelled) process.exitCode = 2;
}

function printHelp() {
  console.log('Usage:');
  console.log('  listing-digest crawl <root-url> [--concurrency N] [--max-depth N] [--out DIR] [--download]');
  console.log('Env:');
  console.log('  ROOT_URL=https://example.com/repo/ OUTPUT_DIR=output MANIFEST_FILE=repository_sha256.csv');
  console.log('  CONCURRENCY=5 TIMEOUT_MS=30000 RETRIES=2 RETRY_DELAY_MS=1000 DELAY_MS=0 USER_AGENT=...');
  console.log('  MAX_DEPTH= MAX_PAGES= DIGEST_ALGORITHM=sha256 LINK_SELECTOR="a[href]" DOWNLOAD=1');
  console.log('  LISTING_DIR_SELECTOR=".octicon-file-directory-fill + a" FILE_URL_REWRITE="/src/branch/=>/raw/branch/"');
}

main().catch((err) => {
  console.error('[crawl] failed:', getErrorMessage(err));
  process.exit(1);
});
