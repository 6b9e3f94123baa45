import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DependencyTracker } from './dependencies.js';
import { SlotCache } from './slot-cache.js';

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'pagewatch-deps-test-'));
}

async function createLoadedWorkspace() {
    const dir = createTempDir();
    const loaded = path.join(dir, 'main.txt');
    const unrelated = path.join(dir, 'notes.txt');
    fs.writeFileSync(loaded, 'hello');
    fs.writeFileSync(unrelated, 'scratch');

    const cache = new SlotCache();
    await cache.getOrLoadSource(loaded);
    return { dir, loaded, unrelated, cache, tracker: new DependencyTracker(cache) };
}

test('a rename from a loaded path to a new path is relevant', async () => {
    const { dir, loaded, tracker } = await createLoadedWorkspace();
    const renamed = path.join(dir, 'renamed.txt');

    const relevant = await tracker.isRelevant({
        kind: { type: 'modify', modify: 'name' },
        paths: [loaded, renamed],
    });

    assert.equal(relevant, true);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('a metadata-only change to a loaded path is not relevant', async () => {
    const { dir, loaded, tracker } = await createLoadedWorkspace();

    assert.equal(await tracker.isRelevant({ kind: { type: 'modify', modify: 'metadata' }, paths: [loaded] }), false);
    assert.equal(await tracker.isRelevant({ kind: { type: 'access' }, paths: [loaded] }), false);
    assert.equal(await tracker.isRelevant({ kind: { type: 'other' }, paths: [loaded] }), false);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('content changes are relevant only for touched paths', async () => {
    const { dir, loaded, unrelated, tracker } = await createLoadedWorkspace();

    assert.equal(await tracker.isRelevant({ kind: { type: 'modify', modify: 'data' }, paths: [loaded] }), true);
    assert.equal(await tracker.isRelevant({ kind: { type: 'modify', modify: 'data' }, paths: [unrelated] }), false);
    assert.equal(await tracker.isRelevant({ kind: { type: 'remove' }, paths: [loaded] }), true);
    assert.equal(await tracker.isRelevant({ kind: { type: 'any' }, paths: [unrelated, loaded] }), true);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('creating a file that was requested but missing is relevant', async () => {
    const { dir, cache, tracker } = await createLoadedWorkspace();
    const include = path.join(dir, 'chapter.txt');
    await cache.getOrLoadSource(include);

    fs.writeFileSync(include, 'now it exists');

    assert.equal(await tracker.isRelevant({ kind: { type: 'create' }, paths: [include] }), true);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('an event on another name of a loaded file matches by identity', async () => {
    const dir = createTempDir();
    const original = path.join(dir, 'main.txt');
    const hardlink = path.join(dir, 'alias.txt');
    fs.writeFileSync(original, 'hello');
    fs.linkSync(original, hardlink);
    const cache = new SlotCache();
    const tracker = new DependencyTracker(cache);
    await cache.getOrLoadSource(hardlink);

    assert.equal(cache.hasPath(original), false);
    assert.equal(await tracker.touched(original), true);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('nothing is touched after a reset', async () => {
    const { dir, loaded, cache, tracker } = await createLoadedWorkspace();

    cache.reset();

    assert.equal(await tracker.touched(loaded), false);
    fs.rmSync(dir, { recursive: true, force: true });
});
