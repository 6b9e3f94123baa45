import test from 'node:test';
import assert from 'node:assert/strict';
import { FontBook, formatVariant, type FontInfo } from './book.js';

function face(family: string, style: FontInfo['variant']['style'], weight: number, stretch = 1): FontInfo {
    return { family, variant: { style, weight, stretch } };
}

test('families groups faces case-insensitively in sorted order', () => {
    const book = new FontBook();
    book.push(face('Noto Serif', 'normal', 400));
    book.push(face('Fira Sans', 'normal', 400));
    book.push(face('noto serif', 'italic', 700));

    const families = book.families();

    assert.deepEqual(families.map(([name, infos]) => [name, infos.length]), [
        ['Fira Sans', 1],
        ['Noto Serif', 2],
    ]);
    assert.equal(book.length, 3);
});

test('select prefers style, then stretch, then weight', () => {
    const book = new FontBook();
    book.push(face('Serif', 'normal', 400));
    book.push(face('Serif', 'italic', 900));
    book.push(face('Serif', 'normal', 700, 0.75));
    book.push(face('Serif', 'normal', 600));
    book.push(face('Other', 'italic', 700));

    assert.equal(book.select('serif', { style: 'italic', weight: 400, stretch: 1 }), 1);
    assert.equal(book.select('Serif', { style: 'normal', weight: 700, stretch: 1 }), 3);
    assert.equal(book.select('Serif', { style: 'normal', weight: 700, stretch: 0.75 }), 2);
    assert.equal(book.select('Missing', { style: 'normal', weight: 400, stretch: 1 }), undefined);
});

test('formatVariant prints stretch as a percentage', () => {
    assert.equal(formatVariant({ style: 'oblique', weight: 300, stretch: 0.875 }), 'Style: oblique, Weight: 300, Stretch: 87.5%');
});
