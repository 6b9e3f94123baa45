import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PreviewWorld } from '../world/world.js';
import { parsePlain, PlainEngine, resolveIncludePath } from './plain-engine.js';
import { WHITE } from './types.js';

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'pagewatch-plain-test-'));
}

async function createWorld(dir: string, main: string): Promise<PreviewWorld> {
    const world = new PreviewWorld({ root: dir });
    const resolved = await world.resolve(path.join(dir, main));
    assert.equal(resolved.ok, true);
    if (resolved.ok) {
        world.setMain(resolved.value);
    }
    return world;
}

function pixelAt(data: Uint8Array, width: number, x: number, y: number): number[] {
    const i = (y * width + x) * 4;
    return Array.from(data.slice(i, i + 4));
}

test('parsePlain turns lines into nodes with directive spans', () => {
    const nodes = parsePlain('Title\n\n  #include "a.txt"\n#pagebreak\n#bogus x\n#include a.txt\n');

    assert.deepEqual(nodes, [
        { kind: 'text', length: 5 },
        { kind: 'blank' },
        { kind: 'include', target: 'a.txt', start: 9, end: 25 },
        { kind: 'pagebreak' },
        { kind: 'error', message: 'unknown directive `#bogus`', start: 37, end: 45 },
        { kind: 'error', message: 'expected a quoted path after `#include`', start: 46, end: 60 },
    ]);
});

test('resolveIncludePath treats absolute targets as root-relative', () => {
    assert.equal(resolveIncludePath('/proj', '/proj/ch/one.txt', 'two.txt'), path.resolve('/proj/ch', 'two.txt'));
    assert.equal(resolveIncludePath('/proj', '/proj/ch/one.txt', '/shared/x.txt'), path.join('/proj', '/shared/x.txt'));
});

test('compile splices includes and breaks pages', async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'main.txt'), 'Intro\n#include "chapter.txt"\n#pagebreak\nOutro\n');
    fs.writeFileSync(path.join(dir, 'chapter.txt'), 'Chapter body\n');
    const world = await createWorld(dir, 'main.txt');

    const outcome = await new PlainEngine().compile(world);

    assert.equal(outcome.ok, true);
    if (outcome.ok) {
        assert.equal(outcome.pages.length, 2);
        assert.deepEqual(outcome.pages[0].lines, [
            { y: 56, width: 27.5 },
            { y: 70, width: 66 },
        ]);
        assert.deepEqual(outcome.pages[1].lines, [{ y: 56, width: 27.5 }]);
    }
    assert.equal(world.cache.hasPath(path.join(dir, 'chapter.txt')), true);
    fs.rmSync(dir, { recursive: true, force: true });
});

test('long documents overflow onto further pages', async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'main.txt'), Array.from({ length: 60 }, (_, i) => `line ${i}`).join('\n'));
    const world = await createWorld(dir, 'main.txt');

    const outcome = await new PlainEngine().compile(world);

    assert.equal(outcome.ok, true);
    if (outcome.ok) {
        assert.deepEqual(outcome.pages.map((page) => page.lines.length), [52, 8]);
    }
    fs.rmSync(dir, { recursive: true, force: true });
});

test('a missing include is reported at the directive with the file path', async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'main.txt'), 'Hello\n#include "missing.txt"\n');
    const world = await createWorld(dir, 'main.txt');

    const outcome = await new PlainEngine().compile(world);

    assert.deepEqual(outcome, {
        ok: false,
        errors: [{
            message: `file not found (searched at ${path.join(dir, 'missing.txt')})`,
            span: { source: 0, start: 6, end: 28 },
            trace: [],
        }],
    });
    fs.rmSync(dir, { recursive: true, force: true });
});

test('include cycles are errors traced through the include chain', async () => {
    const dir = createTempDir();
    fs.writeFileSync(path.join(dir, 'a.txt'), '#include "b.txt"\n');
    fs.writeFileSync(path.join(dir, 'b.txt'), 'Body\n#include "a.txt"\n');
    const world = await createWorld(dir, 'a.txt');

    const outcome = await new PlainEngine().compile(world);

    assert.deepEqual(outcome, {
        ok: false,
        errors: [{
            message: 'cyclic include',
            span: { source: 1, start: 5, end: 21 },
            trace: [{ message: 'error occurred in this include', span: { source: 0, start: 0, end: 16 } }],
        }],
    });
    fs.rmSync(dir, { recursive: true, force: true });
});

test('render paints the fill and one grey bar per line', () => {
    const engine = new PlainEngine();

    const pixmap = engine.render({ width: 595, height: 842, lines: [{ y: 56, width: 10 }] }, 1, WHITE);

    assert.equal(pixmap.width, 595);
    assert.equal(pixmap.height, 842);
    assert.equal(pixmap.data.length, 595 * 842 * 4);
    assert.deepEqual(pixelAt(pixmap.data, 595, 0, 0), [255, 255, 255, 255]);
    assert.deepEqual(pixelAt(pixmap.data, 595, 56, 60), [68, 68, 68, 255]);
    assert.deepEqual(pixelAt(pixmap.data, 595, 65, 65), [68, 68, 68, 255]);
    assert.deepEqual(pixelAt(pixmap.data, 595, 66, 60), [255, 255, 255, 255]);
    assert.deepEqual(pixelAt(pixmap.data, 595, 56, 66), [255, 255, 255, 255]);
});

test('render premultiplies a translucent fill', () => {
    const pixmap = new PlainEngine().render({ width: 1, height: 1, lines: [] }, 2, { r: 255, g: 0, b: 100, a: 128 });

    assert.equal(pixmap.width, 2);
    assert.equal(pixmap.height, 2);
    assert.deepEqual(pixelAt(pixmap.data, 2, 1, 1), [128, 0, 50, 128]);
});

test('evict drops parse results unused for maxAge compilations', async () => {
    const dir = createTempDir();
    const main = path.join(dir, 'main.txt');
    fs.writeFileSync(main, 'first');
    const engine = new PlainEngine();

    const world = await createWorld(dir, 'main.txt');
    await engine.compile(world);
    engine.evict(1);
    assert.equal(engine.memoSize, 1);

    fs.writeFileSync(main, 'second');
    world.reset();
    const reloaded = await world.resolve(main);
    if (reloaded.ok) {
        world.setMain(reloaded.value);
    }
    await engine.compile(world);
    assert.equal(engine.memoSize, 2);
    engine.evict(1);
    assert.equal(engine.memoSize, 1);
    fs.rmSync(dir, { recursive: true, force: true });
});
