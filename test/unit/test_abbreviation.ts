// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// This file is part of Genie
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import assert from 'assert';

import { Document } from '../../lib/document';
import AbbreviationCorrector from '../../lib/tokenizer/abbreviation';

const corrector = new AbbreviationCorrector();

function testMerge() {
    const section = new Document('Abbrev. has').sections[0];
    section.append(0, 6);
    section.append(6, 7);

    const edits = corrector.correct(section, 'has');
    assert.deepStrictEqual(edits, [
        { type: 'remove', index: 1 },
        { type: 'remove', index: 0 },
        { type: 'insert', index: 0, start: 0, end: 7, normalized: null },
    ]);
    section.apply(edits);
    assert.deepStrictEqual(section.tokens.map((t) => t.string), ['Abbrev.']);

    // the merged token is never merged again
    section.append(8, 11);
    assert.deepStrictEqual(corrector.correct(section, 'no'), []);
}

function testNoMerge() {
    const section = new Document('Abbrev. Has').sections[0];
    section.append(0, 6);
    section.append(6, 7);
    assert.deepStrictEqual(corrector.correct(section, 'Has'), []);
    assert.deepStrictEqual(corrector.correct(section, '2'), []);
    assert.deepStrictEqual(corrector.correct(section, ''), []);

    // the period must touch the word
    const spaced = new Document('Abbrev . has').sections[0];
    spaced.append(0, 6);
    spaced.append(7, 8);
    assert.deepStrictEqual(corrector.correct(spaced, 'has'), []);

    // not a period
    const comma = new Document('Abbrev, has').sections[0];
    comma.append(0, 6);
    comma.append(6, 7);
    assert.deepStrictEqual(corrector.correct(comma, 'has'), []);

    // too short
    const single = new Document('. has').sections[0];
    single.append(0, 1);
    assert.deepStrictEqual(corrector.correct(single, 'has'), []);
}

function testNormalized() {
    const section = new Document('Beyonc&eacute;. x').sections[0];
    section.append(0, 14, 'Beyonce');
    section.append(14, 15);

    const edits = corrector.correct(section, 'x');
    assert.deepStrictEqual(edits[2], { type: 'insert', index: 0, start: 0, end: 15, normalized: 'Beyonce.' });
    section.apply(edits);
    assert.strictEqual(section.tokens[0].raw, 'Beyonc&eacute;.');
    assert.strictEqual(section.tokens[0].string, 'Beyonce.');
}

export default async function main() {
    testMerge();
    testNoMerge();
    testNormalized();
}
if (!module.parent)
    main().catch((e) => { console.error(e); process.exit(1); });
