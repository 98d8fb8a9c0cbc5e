import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import { loadSuiteFile, parseSuiteYaml } from '../../src/suite/load.js';

const fallbacks = { timeoutSeconds: 10 };

const SUITE = `
name: Items API
base_url: https://api.example.test/v1
defaults:
  headers:
    Accept: application/json
    X-Version: 2
  timeout_seconds: 5
  retries: 1
auth:
  type: bearer
  token_env: ITEMS_TOKEN
tests:
  - id: list
    path: /items
    params:
      page: 1
  - id: create
    method: post
    path: /items
    headers:
      accept: text/plain
    body:
      name: widget
    timeout_seconds: 2
    retries: 0
`;

describe('parseSuiteYaml', () => {
  it('resolves each test against the suite defaults', () => {
    const suite = parseSuiteYaml(SUITE, fallbacks);

    expect(suite.name).toBe('Items API');
    expect(suite.auth).toEqual({ type: 'bearer', token_env: 'ITEMS_TOKEN' });
    expect(suite.cases.map((c) => c.id)).toEqual(['list', 'create']);

    expect(suite.cases[0]?.request).toEqual({
      method: 'GET',
      url: 'https://api.example.test/v1/items',
      headers: { Accept: 'application/json', 'X-Version': '2' },
      params: { page: 1 },
      timeoutSeconds: 5,
      maxRetries: 1
    });
    expect(suite.cases[1]?.request).toEqual({
      method: 'POST',
      url: 'https://api.example.test/v1/items',
      headers: { 'X-Version': '2', accept: 'text/plain' },
      params: {},
      body: { name: 'widget' },
      timeoutSeconds: 2,
      maxRetries: 0
    });
  });

  it('falls back to the configured timeout when the suite sets none', () => {
    const suite = parseSuiteYaml('base_url: https://api.example.test\ntests:\n  - id: health\n    path: /health\n', fallbacks);
    expect(suite.name).toBe('Unnamed Test Suite');
    expect(suite.cases[0]?.request.timeoutSeconds).toBe(10);
    expect(suite.cases[0]?.request.maxRetries).toBeUndefined();
  });

  it.each([
    ['an empty mapping', 'auth: {}\n'],
    ['an empty key', 'auth:\n']
  ])('runs without auth when auth is %s', (_label, authLine) => {
    const suite = parseSuiteYaml(`name: Open\n${authLine}tests:\n  - id: health\n    path: https://api.example.test/health\n`, fallbacks);
    expect(suite.auth).toBeUndefined();
    expect(suite.cases).toHaveLength(1);
  });

  it('still rejects an auth block without a type', () => {
    expect(() => parseSuiteYaml('auth:\n  token: test-token\n', fallbacks)).toThrow(/^Invalid test suite: auth/);
  });

  it('accepts an empty document as a suite with no tests', () => {
    expect(parseSuiteYaml('', fallbacks).cases).toEqual([]);
  });

  it('names the failing test when a request is invalid', () => {
    const source = 'base_url: https://api.example.test\ntests:\n  - id: bad\n    method: FETCH\n    path: /x\n';
    expect(() => parseSuiteYaml(source, fallbacks)).toThrow(/^tests\[0\] \(bad\): Invalid request config: method/);
  });

  it('rejects duplicate test ids', () => {
    const source = 'tests:\n  - id: a\n  - id: a\n';
    expect(() => parseSuiteYaml(source, fallbacks)).toThrow('Invalid test suite: tests.1.id: duplicate test id a');
  });

  it('rejects malformed YAML', () => {
    expect(() => parseSuiteYaml('tests: [unclosed', fallbacks)).toThrow(/^Test suite is not valid YAML/);
  });
});

describe('loadSuiteFile', () => {
  it('reads a suite from disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'api-doctor-suite-'));
    const file = join(dir, 'suite.yaml');
    writeFileSync(file, SUITE);
    const suite = await loadSuiteFile(file, fallbacks);
    expect(suite.cases).toHaveLength(2);
  });

  it('reports an unreadable path as a configuration error', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'api-doctor-suite-'));
    await expect(loadSuiteFile(dir, fallbacks)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadSuiteFile(dir, fallbacks)).rejects.toThrow(`Test suite file could not be read: ${dir}`);
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(loadSuiteFile('/nonexistent/suite.yaml', fallbacks)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadSuiteFile('/nonexistent/suite.yaml', fallbacks)).rejects.toThrow(
      'Test suite file not found: /nonexistent/suite.yaml'
    );
  });
});
