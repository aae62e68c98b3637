import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import {
  canonicalUrl,
  classifyRoot,
  createScope,
  isAncestorOrSelf,
  isWithinScope,
  manifestPath,
  sanitizeFilename
} from './utils.js';

describe('canonicalUrl', () => {
  it('drops fragments and trailing slashes', () => {
    assert.equal(canonicalUrl('https://Example.com/repo/#readme'), 'https://example.com/repo');
    assert.equal(canonicalUrl('https://example.com/a//'), 'https://example.com/a');
  });

  it('keeps the bare origin path and the query', () => {
    assert.equal(canonicalUrl('https://example.com/'), 'https://example.com/');
    assert.equal(canonicalUrl('https://example.com/a/?page=2'), 'https://example.com/a?page=2');
  });
});

describe('classifyRoot', () => {
  it('treats trailing slashes as listings and extensions as files', () => {
    assert.equal(classifyRoot(new URL('https://example.com/repo/')), 'listing');
    assert.equal(classifyRoot(new URL('https://example.com/repo/a.txt')), 'file');
    assert.equal(classifyRoot(new URL('https://example.com/org/project-configuration')), 'listing');
  });
});

describe('createScope', () => {
  it('scopes a listing to its directory and makes paths relative to the parent', () => {
    assert.deepEqual(createScope(new URL('https://example.com/repo/'), 'listing'), {
      origin: 'https://example.com',
      prefix: '/repo/',
      base: '/'
    });
    assert.deepEqual(createScope(new URL('https://example.com/a/b'), 'listing'), {
      origin: 'https://example.com',
      prefix: '/a/b/',
      base: '/a/'
    });
    assert.deepEqual(createScope(new URL('https://example.com/'), 'listing'), {
      origin: 'https://example.com',
      prefix: '/',
      base: '/'
    });
  });

  it('scopes a file to its own directory', () => {
    assert.deepEqual(createScope(new URL('https://example.com/repo/a.txt'), 'file'), {
      origin: 'https://example.com',
      prefix: '/repo/',
      base: '/repo/'
    });
  });
});

describe('isWithinScope', () => {
  const scope = createScope(new URL('https://example.com/repo/'), 'listing');

  it('accepts the root itself and anything below it', () => {
    assert.equal(isWithinScope(new URL('https://example.com/repo'), scope), true);
    assert.equal(isWithinScope(new URL('https://example.com/repo/sub/x.txt'), scope), true);
  });

  it('rejects siblings and other origins', () => {
    assert.equal(isWithinScope(new URL('https://example.com/repository/x'), scope), false);
    assert.equal(isWithinScope(new URL('https://example.com/'), scope), false);
    assert.equal(isWithinScope(new URL('https://cdn.example.com/repo/x'), scope), false);
  });
});

describe('isAncestorOrSelf', () => {
  const page = new URL('https://example.com/repo/sub/');

  it('matches the page and its parents with or without trailing slash', () => {
    assert.equal(isAncestorOrSelf(new URL('https://example.com/repo/sub'), page), true);
    assert.equal(isAncestorOrSelf(new URL('https://example.com/repo'), page), true);
  });

  it('does not match children', () => {
    assert.equal(isAncestorOrSelf(new URL('https://example.com/repo/sub/b.txt'), page), false);
  });
});

describe('manifestPath', () => {
  const scope = createScope(new URL('https://example.com/repo/'), 'listing');

  it('includes the root directory name', () => {
    assert.equal(manifestPath('https://example.com/repo/sub/b.txt', scope, 'file'), 'repo/sub/b.txt');
  });

  it('keeps a trailing slash on listings', () => {
    assert.equal(manifestPath('https://example.com/repo/sub/', scope, 'listing'), 'repo/sub/');
    assert.equal(manifestPath('https://example.com/repo/sub', scope, 'listing'), 'repo/sub/');
  });

  it('decodes percent-encoded names', () => {
    assert.equal(manifestPath('https://example.com/repo/b%20c.txt', scope, 'file'), 'repo/b c.txt');
  });
});

describe('sanitizeFilename', () => {
  it('neutralises separators and dot segments', () => {
    assert.equal(sanitizeFilename('a/b:c'), 'a-b-c');
    assert.equal(sanitizeFilename('..'), '-');
    assert.equal(sanitizeFilename('  '), 'file');
  });
});
