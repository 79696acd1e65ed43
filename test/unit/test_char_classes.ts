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

import * as C from '../../lib/tokenizer/char-classes';

function testPredicates() {
    assert.strictEqual(C.isLowerCase('a'), true);
    assert.strictEqual(C.isLowerCase('é'), true);
    assert.strictEqual(C.isLowerCase('A'), false);
    assert.strictEqual(C.isLowerCase('1'), false);
    assert.strictEqual(C.isLowerCase('.'), false);

    assert.strictEqual(C.isWhitespace(' '), true);
    assert.strictEqual(C.isWhitespace('\u00a0'), true);
    assert.strictEqual(C.isWhitespace('\n'), true);
    assert.strictEqual(C.isWhitespace('\u3000'), true);
    assert.strictEqual(C.isWhitespace('\u0085'), true);
    assert.strictEqual(C.isWhitespace('\u2028'), true);
    assert.strictEqual(C.isWhitespace('a'), false);

    assert.strictEqual(C.isDigit('7'), true);
    assert.strictEqual(C.isDigit('x'), false);

    assert.strictEqual(C.isQuote('"'), true);
    assert.strictEqual(C.isQuote('“'), true);
    assert.strictEqual(C.isQuote('«'), true);
    assert.strictEqual(C.isQuote("'"), false);

    assert.strictEqual(C.isApostrophe("'"), true);
    assert.strictEqual(C.isApostrophe('`'), true);
    assert.strictEqual(C.isApostrophe('’'), true);
    assert.strictEqual(C.isApostrophe('"'), false);

    assert.strictEqual(C.isCurrencySymbol('$'), true);
    assert.strictEqual(C.isCurrencySymbol('¢'), true);
    assert.strictEqual(C.isCurrencySymbol('€'), true);
    assert.strictEqual(C.isCurrencySymbol('£'), true);
    assert.strictEqual(C.isCurrencySymbol('#'), false);

    assert.strictEqual(C.isDash('-'), true);
    assert.strictEqual(C.isDash('–'), true);
    assert.strictEqual(C.isDash('—'), true);
    assert.strictEqual(C.isEmDash('—'), true);
    assert.strictEqual(C.isEmDash('–'), false);
    assert.strictEqual(C.isEmDash('-'), false);

    assert.strictEqual(C.isFractionGlyph('½'), true);
    assert.strictEqual(C.isFractionGlyph('⅓'), true);
    assert.strictEqual(C.isFractionGlyph('/'), false);

    assert.strictEqual(C.isEllipsisGlyph('…'), true);
    assert.strictEqual(C.isEllipsisGlyph('.'), false);

    assert.strictEqual(C.isPennBracketCode('-LRB-'), true);
    assert.strictEqual(C.isPennBracketCode('-rcb-'), true);
    assert.strictEqual(C.isPennBracketCode('-Lrb-'), false);
    assert.strictEqual(C.isPennBracketCode('-LRB'), false);
    assert.strictEqual(C.isPennBracketCode('x-LRB-'), false);
}

function testEntities() {
    assert.strictEqual(C.startsHtmlEntity('a &amp; b', 2), true);
    assert.strictEqual(C.startsHtmlEntity('a &amp; b', 0), false);
    assert.strictEqual(C.startsHtmlEntity('&#38;', 0), true);
    assert.strictEqual(C.startsHtmlEntity('&#x26;', 0), true);
    assert.strictEqual(C.startsHtmlEntity('&amp', 0), false);
    assert.strictEqual(C.startsHtmlEntity('& amp;', 0), false);
    assert.strictEqual(C.startsHtmlEntity('a &amp; b', 2), true);
}

function testApostrophe() {
    assert.strictEqual(C.lastApostrophe("rock'n'roll"), 6);
    assert.strictEqual(C.lastApostrophe('he’ll'), 2);
    assert.strictEqual(C.lastApostrophe('abc'), -1);
}

function testPatterns() {
    assert.strictEqual(C.alternation(['a', 'abc', 'ab']), 'abc|ab|a');
    assert.strictEqual(C.alternation(['Ph.D.']), 'Ph\\.D\\.');
    assert.strictEqual(C.entityPattern(['amp']), '&(?:amp);');

    const pattern = new RegExp('^(?:' + C.entityPattern(C.ENTITY_NAMES.quote) + ')$');
    assert(pattern.test('&ldquo;'));
    assert(!pattern.test('&ldquo'));

    assert.strictEqual(C.FRACTIONS.get('¾'), '3/4');
    assert.strictEqual(C.PENN_BRACKETS.LSB, '[');
}

export default async function main() {
    testPredicates();
    testEntities();
    testApostrophe();
    testPatterns();
}
if (!module.parent)
    main().catch((e) => { console.error(e); process.exit(1); });
