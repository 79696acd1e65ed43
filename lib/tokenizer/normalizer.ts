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

import { NormalizationOption, TokenizerOptions } from '../config';
import {
    AMPERSAND,
    APOSTROPHE,
    CENTS,
    CURRENCY_SYMBOL,
    DASH,
    DOLLAR_PREFIXES,
    DOUBLE_QUOTE,
    ELLIPSIS,
    EM_DASH,
    ENTITY_NAMES,
    FRACTION,
    FRACTIONS,
    FRACTION_ENTITIES,
    HTML_SYMBOLS,
    PENN_BRACKETS,
    PENN_BRACKET_CODE,
    alternation,
    entityPattern,
} from './char-classes';

type Rewrite = [RegExp, string|((match : string, ...groups : string[]) => string)];

interface RewriteFamily {
    option : NormalizationOption;
    rewrites : Rewrite[];
}

function anyOf(...patterns : Array<RegExp|string>) : RegExp {
    return new RegExp(patterns.map((p) => typeof p === 'string' ? p : p.source).join('|'), 'g');
}

// the order matters only for how many passes it takes to reach a fixed point:
// entities are decoded before the glyphs they decode to are unified
const FAMILIES : RewriteFamily[] = [
    {
        option: 'undoPennParens',
        rewrites: [[anyOf(PENN_BRACKET_CODE), (code) => PENN_BRACKETS[code.substring(1, 4).toUpperCase()]]]
    },
    {
        option: 'unescapeSlash',
        rewrites: [[/\\\//g, '/']]
    },
    {
        option: 'unescapeAsterisk',
        rewrites: [[/\\\*/g, '*']]
    },
    {
        option: 'normalizeAmpersand',
        rewrites: [[anyOf(entityPattern(ENTITY_NAMES.ampersand), AMPERSAND), '&']]
    },
    {
        option: 'normalizeHtmlSymbol',
        rewrites: [[anyOf(entityPattern(Object.keys(HTML_SYMBOLS))), (entity) => HTML_SYMBOLS[entity.substring(1, entity.length-1)]]]
    },
    {
        option: 'normalizeHtmlAccent',
        rewrites: [
            [/&([A-Za-z])(?:acute|grave|circ|uml|tilde|cedil|ring|slash|caron);/g, '$1'],
            [/&szlig;/g, 'ss'],
            [/&(AE|ae|OE|oe)lig;/g, '$1'],
        ]
    },
    {
        option: 'normalizeQuote',
        rewrites: [[anyOf('``', "''", entityPattern(ENTITY_NAMES.quote), DOUBLE_QUOTE), '"']]
    },
    {
        option: 'normalizeApostrophe',
        rewrites: [[anyOf(entityPattern(ENTITY_NAMES.apostrophe), APOSTROPHE), "'"]]
    },
    {
        option: 'normalizeCurrency',
        rewrites: [
            [anyOf(entityPattern(ENTITY_NAMES.cents), CENTS), 'cents'],
            // a prefixed dollar is only rewritten when it is the whole token
            [new RegExp('^(?:' + alternation(DOLLAR_PREFIXES) + ')\\$$', 'g'), '$$'],
            [anyOf(entityPattern(ENTITY_NAMES.currency), CURRENCY_SYMBOL), '$$'],
        ]
    },
    {
        option: 'normalizeFractions',
        rewrites: [
            [anyOf(FRACTION), (glyph) => FRACTIONS.get(glyph) ?? glyph],
            [anyOf(entityPattern(Object.keys(FRACTION_ENTITIES))), (entity) => FRACTION_ENTITIES[entity.substring(1, entity.length-1)]],
        ]
    },
    {
        option: 'normalizeEllipsis',
        rewrites: [[anyOf(entityPattern(ENTITY_NAMES.ellipsis), ELLIPSIS), '...']]
    },
    {
        option: 'normalizeMDash',
        rewrites: [[anyOf(entityPattern(ENTITY_NAMES.mdash), EM_DASH), '--']]
    },
    {
        option: 'normalizeDash',
        rewrites: [[anyOf(entityPattern(ENTITY_NAMES.dash), DASH), '-']]
    },
];

/**
 * Rewrites token strings into their canonical form.
 *
 * Each family of rewrites is enabled by one option. The enabled rewrites are
 * applied until the string stops changing, so normalizing twice is the same
 * as normalizing once.
 */
export default class Normalizer {
    private readonly _rewrites : Rewrite[];

    constructor(options : Readonly<TokenizerOptions>) {
        this._rewrites = [];
        if (!options.normalize)
            return;
        for (const family of FAMILIES) {
            if (options[family.option])
                this._rewrites.push(...family.rewrites);
        }
    }

    /**
     * Whether this normalizer leaves every string unchanged.
     */
    get isIdentity() : boolean {
        return this._rewrites.length === 0;
    }

    normalize(text : string) : string {
        for (;;) {
            let rewritten = text;
            for (const [pattern, replacement] of this._rewrites) {
                if (typeof replacement === 'string')
                    rewritten = rewritten.replace(pattern, replacement);
                else
                    rewritten = rewritten.replace(pattern, replacement);
            }
            if (rewritten === text)
                return text;
            text = rewritten;
        }
    }
}
