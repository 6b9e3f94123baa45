import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { identityFromStat, resolveIdentity } from './identity.js';

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'pagewatch-identity-test-'));
}

test('symlinks, hardlinks and other spellings of one file resolve to the same identity', async () => {
    const dir = createTempDir();
    const target = path.join(dir, 'main.txt');
    fs.writeFileSync(target, 'hello');
    fs.symlinkSync(target, path.join(dir, 'link.txt'));
    fs.linkSync(target, path.join(dir, 'hard.txt'));

    const spellings = [
        target,
        path.join(dir, 'link.txt'),
        path.join(dir, 'hard.txt'),
        path.relative(process.cwd(), target),
        `${dir}${path.sep}.${path.sep}main.txt`,
    ];
    const results = await Promise.all(spellings.map((spelling) => resolveIdentity(spelling)));

    const identities = results.map((result) => {
        assert.equal(result.ok, true);
        return result.ok ? result.value : '';
    });
    assert.equal(new Set(identities).size, 1);
    assert.match(identities[0], /^[0-9a-f]{32}$/);

    fs.rmSync(dir, { recursive: true, force: true });
});

test('distinct files get distinct identities', async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'a.txt'), 'same');
    fs.writeFileSync(path.join(dir, 'b.txt'), 'same');

    const a = await resolveIdentity(path.join(dir, 'a.txt'));
    const b = await resolveIdentity(path.join(dir, 'b.txt'));

    assert.equal(a.ok && b.ok, true);
    if (a.ok && b.ok) {
        assert.notEqual(a.value, b.value);
    }
    fs.rmSync(dir, { recursive: true, force: true });
});

test('a missing path is reported as a not_found error value', async () => {
    const dir = createTempDir();
    const missing = path.join(dir, 'missing.txt');

    const result = await resolveIdentity(missing);

    assert.equal(result.ok, false);
    if (!result.ok) {
        assert.equal(result.error.kind, 'not_found');
        assert.equal(result.error.path, missing);
        assert.equal(result.error.message, `file not found (searched at ${missing})`);
    }
    fs.rmSync(dir, { recursive: true, force: true });
});

test('identityFromStat depends on device and inode only', () => {
    assert.equal(identityFromStat(1n, 2n), identityFromStat(1n, 2n));
    assert.notEqual(identityFromStat(1n, 2n), identityFromStat(2n, 1n));
});
