import assert from 'node:assert/strict';
import path from 'node:path';
import { describe, it } from 'node:test';
import { loadConfig, parseRewrites } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
  it('takes the root URL from the first positional argument and fills defaults', () => {
    const cfg = loadConfig(['https://example.com/repo/'], {});
    assert.deepEqual(cfg.crawl, {
      rootUrl: 'https://example.com/repo/',
      concurrency: 5,
      maxDepth: undefined,
      maxPages: undefined,
      algorithm: 'sha256',
      timeoutMs: 30000,
      retries: 2,
      retryDelayMs: 1000,
      delayMs: 0,
      userAgent: 'listing-digest/0.1',
      linkSelector: 'a[href]',
      dirSelector: undefined,
      fileUrlRewrites: []
    });
    assert.equal(cfg.outputDir, path.resolve('output'));
    assert.equal(cfg.manifestFile, path.resolve('output', 'repository_sha256.csv'));
    assert.equal(cfg.reportFile, path.join(path.resolve('output'), 'report.json'));
    assert.equal(cfg.download, false);
  });

  it('reads settings from the environment', () => {
    const cfg = loadConfig([], {
      ROOT_URL: 'https://example.com/repo/',
      CONCURRENCY: '12',
      MAX_DEPTH: '0',
      MAX_PAGES: '40',
      RETRIES: '0',
      DIGEST_ALGORITHM: 'SHA512',
      OUTPUT_DIR: 'out',
      MANIFEST_FILE: 'hashes.csv',
      DOWNLOAD: 'true',
      FILE_URL_REWRITE: '/src/branch/=>/raw/branch/',
      LISTING_DIR_SELECTOR: '.octicon-file-directory-fill + a'
    });
    assert.equal(cfg.crawl.rootUrl, 'https://example.com/repo/');
    assert.equal(cfg.crawl.concurrency, 12);
    assert.equal(cfg.crawl.maxDepth, 0);
    assert.equal(cfg.crawl.maxPages, 40);
    assert.equal(cfg.crawl.retries, 0);
    assert.equal(cfg.crawl.algorithm, 'sha512');
    assert.deepEqual(cfg.crawl.fileUrlRewrites, [{ find: '/src/branch/', replace: '/raw/branch/' }]);
    assert.equal(cfg.crawl.dirSelector, '.octicon-file-directory-fill + a');
    assert.equal(cfg.manifestFile, path.resolve('out', 'hashes.csv'));
    assert.equal(cfg.download, true);
  });

  it('prefers command line flags over the environment', () => {
    const cfg = loadConfig(
      ['--url', 'https://example.com/a/', '--concurrency', '3', '--max-depth', '2', '--out', 'dump', '--download'],
      { ROOT_URL: 'https://example.com/b/', CONCURRENCY: '9' }
    );
    assert.equal(cfg.crawl.rootUrl, 'https://example.com/a/');
    assert.equal(cfg.crawl.concurrency, 3);
    assert.equal(cfg.crawl.maxDepth, 2);
    assert.equal(cfg.outputDir, path.resolve('dump'));
    assert.equal(cfg.download, true);
  });

  it('requires a root URL', () => {
    assert.throws(() => loadConfig([], {}), ConfigError);
  });

  it('rejects malformed numbers', () => {
    assert.throws(
      () => loadConfig(['https://example.com/repo/'], { CONCURRENCY: '0' }),
      { name: 'ConfigError', message: 'CONCURRENCY must be an integer >= 1, got "0"' }
    );
    assert.throws(() => loadConfig(['https://example.com/repo/'], { TIMEOUT_MS: 'soon' }), ConfigError);
  });

  it('rejects unknown digest algorithms', () => {
    assert.throws(() => loadConfig(['https://example.com/repo/'], { DIGEST_ALGORITHM: 'crc32' }), ConfigError);
  });
});

describe('parseRewrites', () => {
  it('splits several rules', () => {
    assert.deepEqual(parseRewrites('/src/=>/raw/; /view/ => /download/ ;'), [
      { find: '/src/', replace: '/raw/' },
      { find: '/view/', replace: '/download/' }
    ]);
  });

  it('returns no rules for empty input and rejects rules without an arrow', () => {
    assert.deepEqual(parseRewrites(undefined), []);
    assert.throws(() => parseRewrites('/src/'), ConfigError);
  });
});
