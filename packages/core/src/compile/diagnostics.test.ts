import test from 'node:test';
import assert from 'node:assert/strict';
import { Source } from '../world/source.js';
import { displayPath, formatDiagnostics } from './diagnostics.js';

test('displayPath shortens paths inside the root only', () => {
    assert.equal(displayPath('/proj/ch/one.txt', '/proj'), 'ch/one.txt');
    assert.equal(displayPath('/elsewhere/one.txt', '/proj'), '/elsewhere/one.txt');
    assert.equal(displayPath('/proj/one.txt'), '/proj/one.txt');
});

test('formatDiagnostics points at the offending line', () => {
    const source = new Source(0, '/proj/main.txt', 'Hello\n#bogus here\n');

    const output = formatDiagnostics(
        [{ message: 'unknown directive `#bogus`', span: { source: 0, start: 6, end: 17 }, trace: [] }],
        () => source,
        '/proj'
    );

    assert.equal(output, [
        'error: unknown directive `#bogus`',
        ' --> main.txt:2:1',
        '  |',
        '2 | #bogus here',
        '  | ^^^^^^^^^^^',
    ].join('\n'));
});

test('formatDiagnostics adds one help block per trace point', () => {
    const sources = [
        new Source(0, '/proj/a.txt', '#include "b.txt"\n'),
        new Source(1, '/proj/b.txt', 'Body\n  #include "a.txt"\n'),
    ];

    const output = formatDiagnostics(
        [{
            message: 'cyclic include',
            span: { source: 1, start: 7, end: 23 },
            trace: [{ message: 'error occurred in this include', span: { source: 0, start: 0, end: 16 } }],
        }],
        (id) => sources[id],
        '/proj'
    );

    assert.equal(output, [
        'error: cyclic include',
        ' --> b.txt:2:3',
        '  |',
        '2 |   #include "a.txt"',
        '  |   ^^^^^^^^^^^^^^^^',
        '',
        'help: error occurred in this include',
        ' --> a.txt:1:1',
        '  |',
        '1 | #include "b.txt"',
        '  | ^^^^^^^^^^^^^^^^',
    ].join('\n'));
});

test('errors without a span print only the message', () => {
    const output = formatDiagnostics(
        [{ message: 'file not found (searched at /proj/main.txt)', trace: [] }],
        () => {
            throw new Error('no source should be looked up');
        }
    );

    assert.equal(output, 'error: file not found (searched at /proj/main.txt)');
});
