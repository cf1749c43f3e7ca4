import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { IgnoreRules, parseIgnoreFile } from '../src/tools/ignore-rules.js';
import { grepTool } from '../src/tools/search.js';
import type { ToolContext } from '../src/tools.js';

import { makeWorkspace, removeWorkspace, toolContext } from './helpers.js';

let root: string;
let ctx: ToolContext;

async function put(rel: string, content: string | Buffer): Promise<void> {
  const abs = path.join(root, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, content);
}

before(async () => {
  root = await makeWorkspace();
  ctx = toolContext(root);
  await put('.gitignore', 'dist/\n*.log\n!keep.log\n');
  await put('src/app.ts', 'const TODO = 1;\n// todo: later\n');
  await put('src/lib/.ignore', 'generated.ts\n');
  await put('src/lib/generated.ts', 'TODO generated\n');
  await put('src/lib/util.ts', 'export const a = 1; // TODO\n');
  await put('dist/app.js', 'TODO built\n');
  await put('debug.log', 'TODO log\n');
  await put('keep.log', 'TODO kept\n');
  await put('.git/HEAD', 'TODO ref\n');
  await put('image.bin', Buffer.from([0x54, 0x4f, 0x44, 0x4f, 0x00]));
});

after(async () => {
  await removeWorkspace(root);
});

function files(r: Record<string, unknown>): string[] {
  const results = r.results;
  assert.ok(Array.isArray(results));
  return results.map((h: unknown) => {
    assert.ok(h && typeof h === 'object' && 'file' in h && typeof h.file === 'string');
    return h.file;
  });
}

describe('grep', () => {
  it('honours ignore files and skips .git and binaries', async () => {
    const r = await grepTool(ctx, { pattern: 'TODO' });
    assert.deepEqual(files(r), ['keep.log', 'src/app.ts', 'src/lib/util.ts']);
    assert.equal(r.count, 3);
    assert.equal(r.root, root);
    assert.equal(r.pattern, 'TODO');
  });

  it('reports 1-based line numbers and the matching line', async () => {
    const r = await grepTool(ctx, { pattern: 'todo:', root: 'src' });
    assert.deepEqual(r.results, [
      { file: 'app.ts', abs_path: path.join(root, 'src', 'app.ts'), line: 2, match: '// todo: later' },
    ]);
  });

  it('matches case-insensitively on request', async () => {
    const r = await grepTool(ctx, { pattern: 'todo', case_sensitive: false, include_globs: ['src/*.ts'] });
    assert.deepEqual(
      r.results,
      [1, 2].map((line) => ({
        file: 'src/app.ts',
        abs_path: path.join(root, 'src', 'app.ts'),
        line,
        match: line === 1 ? 'const TODO = 1;' : '// todo: later',
      }))
    );
  });

  it('treats a literal pattern as plain text', async () => {
    await put('notes/regex.txt', 'a+b\naab\n');
    const r = await grepTool(ctx, { pattern: 'a+b', literal: true, root: 'notes' });
    assert.deepEqual(files(r), ['regex.txt']);
    assert.equal(r.count, 1);
  });

  it('stops at max_results', async () => {
    const r = await grepTool(ctx, { pattern: 'TODO', max_results: 2 });
    assert.equal(r.count, 2);
    const none = await grepTool(ctx, { pattern: 'TODO', max_results: 0 });
    assert.deepEqual(none.results, []);
  });

  it('searches a single file named as the root', async () => {
    const r = await grepTool(ctx, { pattern: 'export', root: 'src/lib/util.ts' });
    assert.deepEqual(files(r), ['util.ts']);
  });

  it('excludes globs', async () => {
    const r = await grepTool(ctx, { pattern: 'TODO', exclude_globs: ['*.log'] });
    assert.deepEqual(files(r), ['src/app.ts', 'src/lib/util.ts']);
  });

  it('rejects an invalid regex with a hint', async () => {
    await assert.rejects(
      () => grepTool(ctx, { pattern: '(' }),
      /^ToolError: grep: invalid regex pattern: .*/
    );
  });
});

describe('IgnoreRules', () => {
  it('parses negation, escapes, directory-only and anchored lines', () => {
    assert.deepEqual(parseIgnoreFile('# c\n\n!keep\n\\#hash\n/build/\ndocs/*.md\n'), [
      { pattern: 'keep', negate: true, dirOnly: false, anchored: false },
      { pattern: '#hash', negate: false, dirOnly: false, anchored: false },
      { pattern: 'build', negate: false, dirOnly: true, anchored: true },
      { pattern: 'docs/*.md', negate: false, dirOnly: false, anchored: true },
    ]);
  });

  it('applies anchored rules relative to their directory', async () => {
    await put('anchored/.gitignore', '/top.txt\n');
    const rules = new IgnoreRules();
    await rules.load(path.join(root, 'anchored'));
    assert.equal(rules.isIgnored(path.join(root, 'anchored', 'top.txt'), false), true);
    assert.equal(rules.isIgnored(path.join(root, 'anchored', 'sub', 'top.txt'), false), false);
    assert.equal(rules.isIgnored(path.join(root, 'elsewhere', 'top.txt'), false), false);
  });

  it('matches names that begin with two dots', async () => {
    await put('dotted/.ignore', '..cache\n');
    const rules = new IgnoreRules();
    await rules.load(path.join(root, 'dotted'));
    assert.equal(rules.isIgnored(path.join(root, 'dotted', '..cache'), true), true);
    assert.equal(rules.isIgnored(path.join(root, 'dotted', 'cache'), true), false);
  });

  it('skips .gitignore files when told the tree is not a repository', async () => {
    await put('nogit/.gitignore', '*.tmp\n');
    const rules = new IgnoreRules({ gitignore: false });
    await rules.load(path.join(root, 'nogit'));
    assert.equal(rules.isIgnored(path.join(root, 'nogit', 'a.tmp'), false), false);
  });
});

describe('grep outside a git repository', () => {
  let plain: string;

  before(async () => {
    plain = await makeWorkspace('termpilot-nogit-');
    await fs.writeFile(path.join(plain, '.gitignore'), '*.log\n');
    await fs.writeFile(path.join(plain, '.ignore'), 'skip.txt\n');
    await fs.writeFile(path.join(plain, 'app.log'), 'TODO log\n');
    await fs.writeFile(path.join(plain, 'skip.txt'), 'TODO skipped\n');
    await fs.writeFile(path.join(plain, 'main.ts'), 'TODO main\n');
  });

  after(async () => {
    await removeWorkspace(plain);
  });

  it('ignores .gitignore but still honours .ignore', async () => {
    const r = await grepTool(toolContext(plain), { pattern: 'TODO' });
    assert.deepEqual(files(r), ['app.log', 'main.ts']);
  });
});
