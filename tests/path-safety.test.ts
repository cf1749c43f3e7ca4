import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';
import { after, before, describe, it } from 'node:test';

import { displayPath, isWithinDir, resolvePath } from '../src/tools/path-safety.js';
import { IOError, PathEscapeError, ValidationError } from '../src/tools/tool-error.js';

import { makeWorkspace, removeWorkspace } from './helpers.js';

let root: string;
let outside: string;

before(async () => {
  root = await makeWorkspace();
  outside = await makeWorkspace('termpilot-outside-');
  await fs.mkdir(path.join(root, 'src'));
  await fs.writeFile(path.join(root, 'src', 'main.ts'), 'export {};\n');
  await fs.writeFile(path.join(outside, 'secret.txt'), 'nope\n');
});

after(async () => {
  await removeWorkspace(root);
  await removeWorkspace(outside);
});

describe('isWithinDir', () => {
  it('accepts the directory itself and descendants', () => {
    assert.equal(isWithinDir('/a/b', '/a/b'), true);
    assert.equal(isWithinDir('/a/b/c/d', '/a/b'), true);
  });

  it('accepts names inside the directory that begin with two dots', () => {
    assert.equal(isWithinDir('/a/b/..notes', '/a/b'), true);
    assert.equal(isWithinDir('/a/b/..cache/x', '/a/b'), true);
    assert.equal(isWithinDir('/a/..b', '/a/b'), false);
  });

  it('rejects siblings that share a prefix', () => {
    assert.equal(isWithinDir('/a/bc', '/a/b'), false);
    assert.equal(isWithinDir('/a', '/a/b'), false);
  });
});

describe('resolvePath', () => {
  it('resolves a relative path against the root', async () => {
    const p = await resolvePath({ root }, 'src/main.ts');
    assert.equal(p, path.join(root, 'src', 'main.ts'));
  });

  it('accepts an absolute path inside the root', async () => {
    const abs = path.join(root, 'src', 'main.ts');
    assert.equal(await resolvePath({ root }, abs), abs);
  });

  it('resolves an in-root file whose name begins with two dots', async () => {
    await fs.writeFile(path.join(root, '..notes'), 'kept\n');
    assert.equal(await resolvePath({ root }, '..notes'), path.join(root, '..notes'));
  });

  it('rejects ../ traversal out of the root', async () => {
    await assert.rejects(
      () => resolvePath({ root }, path.join('..', path.basename(outside), 'secret.txt')),
      PathEscapeError
    );
  });

  it('rejects an absolute path outside the root', async () => {
    await assert.rejects(() => resolvePath({ root }, path.join(outside, 'secret.txt')), PathEscapeError);
  });

  it('rejects a symlink that points outside the root', async () => {
    await fs.symlink(path.join(outside, 'secret.txt'), path.join(root, 'link.txt'));
    await assert.rejects(() => resolvePath({ root }, 'link.txt'), PathEscapeError);
    await assert.rejects(() => resolvePath({ root }, 'link.txt', true), PathEscapeError);
  });

  it('fails with IOError for a missing file unless nonexistent paths are allowed', async () => {
    await assert.rejects(() => resolvePath({ root }, 'missing.txt'), IOError);
    assert.equal(await resolvePath({ root }, 'missing.txt', true), path.join(root, 'missing.txt'));
  });

  it('keeps a missing multi-level tail under the canonical parent', async () => {
    const p = await resolvePath({ root }, 'new/deeper/file.txt', true);
    assert.equal(p, path.join(root, 'new', 'deeper', 'file.txt'));
  });

  it('rejects a missing path whose existing ancestor is outside', async () => {
    await assert.rejects(
      () => resolvePath({ root }, path.join(outside, 'nested', 'x.txt'), true),
      PathEscapeError
    );
  });

  it('rejects empty and non-string input', async () => {
    await assert.rejects(() => resolvePath({ root }, ''), ValidationError);
    await assert.rejects(() => resolvePath({ root }, 42), ValidationError);
  });
});

describe('displayPath', () => {
  it('shows paths relative to the root', () => {
    assert.equal(displayPath(path.join(root, 'src', 'main.ts'), root), path.join('src', 'main.ts'));
    assert.equal(displayPath(root, root), '.');
  });

  it('hides the location of paths outside the root', () => {
    assert.equal(displayPath('/elsewhere/file.txt', root), '[outside-root]/file.txt');
  });
});
