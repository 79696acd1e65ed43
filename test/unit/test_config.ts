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

import {
    NORMALIZATION_OPTIONS,
    NORMALIZING_OPTIONS,
    PLAIN_OPTIONS,
    isTokenizerOption,
    isTokenizerPreset,
    resolveOptions,
} from '../../lib/config';
import { UnknownOptionError } from '../../lib/errors';

function testDefaults() {
    const options = resolveOptions();
    assert.deepStrictEqual(options, NORMALIZING_OPTIONS);
    assert(Object.isFrozen(options));
    assert.strictEqual(options.normalize, true);
    assert.strictEqual(options.tokenizeSgml, false);
    assert.strictEqual(options.abbrevPrecedesLowercase, false);

    for (const name of NORMALIZATION_OPTIONS) {
        assert.strictEqual(NORMALIZING_OPTIONS[name], true, name);
        assert.strictEqual(PLAIN_OPTIONS[name], false, name);
    }
    assert.strictEqual(PLAIN_OPTIONS.normalize, false);
}

function testOverrides() {
    const options = resolveOptions({ tokenizeSgml: true, normalizeDash: false, normalizeQuote: undefined });
    assert.strictEqual(options.tokenizeSgml, true);
    assert.strictEqual(options.normalizeDash, false);
    assert.strictEqual(options.normalizeQuote, true);
    assert.strictEqual(options.normalizeMDash, true);
}

function testMasterSwitch() {
    const options = resolveOptions({ normalize: false, normalizeQuote: true, tokenizeNewline: true });
    assert.strictEqual(options.normalize, false);
    assert.strictEqual(options.tokenizeNewline, true);
    for (const name of NORMALIZATION_OPTIONS)
        assert.strictEqual(options[name], false, name);
}

function testUnknownOption() {
    assert.throws(() => resolveOptions(JSON.parse('{ "normalizeEverything": true }')), (e : unknown) => {
        assert(e instanceof UnknownOptionError);
        assert.strictEqual(e.code, 'ERR_UNKNOWN_OPTION');
        assert.strictEqual(e.option, 'normalizeEverything');
        assert.strictEqual(e.message, 'Unknown tokenizer option normalizeEverything');
        return true;
    });
}

function testGuards() {
    assert.strictEqual(isTokenizerOption('normalizeQuote'), true);
    assert.strictEqual(isTokenizerOption('normalize'), true);
    assert.strictEqual(isTokenizerOption('tokenizeAllDashedWords'), true);
    assert.strictEqual(isTokenizerOption('normalizequote'), false);

    assert.strictEqual(isTokenizerPreset('plain'), true);
    assert.strictEqual(isTokenizerPreset('normalizing'), true);
    assert.strictEqual(isTokenizerPreset('conll'), false);
}

export default async function main() {
    testDefaults();
    testOverrides();
    testMasterSwitch();
    testUnknownOption();
    testGuards();
}
if (!module.parent)
    main().catch((e) => { console.error(e); process.exit(1); });
