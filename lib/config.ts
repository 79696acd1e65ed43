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

import { UnknownOptionError } from './errors';

/**
 * Options that change how the text is split into tokens.
 */
export interface StructuralOptions {
    /** Keep SGML/HTML tags as single tokens. */
    tokenizeSgml : boolean;
    /** Keep newline runs as tokens. */
    tokenizeNewline : boolean;
    /** Keep all whitespace runs, including newlines, as tokens. */
    tokenizeWhitespace : boolean;
    /** Split dashed words into separate tokens, as in CoNLL. */
    tokenizeAllDashedWords : boolean;
    /** Treat a period followed by a lowercase word as part of an abbreviation. */
    abbrevPrecedesLowercase : boolean;
}

/**
 * Options that enable one family of rewrites of the token strings.
 */
export interface NormalizationOptions {
    /** Convert all double quotes to `"`. */
    normalizeQuote : boolean;
    /** Convert all apostrophes to `'`, even within tokens. */
    normalizeApostrophe : boolean;
    /** Convert currency symbols to `$`, except cent signs, which become "cents". */
    normalizeCurrency : boolean;
    /** Convert ampersand variants, including `&amp;`, to `&`. */
    normalizeAmpersand : boolean;
    /** Convert fraction characters to their spelled out form, like "3/4". */
    normalizeFractions : boolean;
    /** Convert the ellipsis character to "...". */
    normalizeEllipsis : boolean;
    /** Convert -LRB- and friends back to brackets. */
    undoPennParens : boolean;
    /** Convert `\/` to `/`. */
    unescapeSlash : boolean;
    /** Convert `\*` to `*`. */
    unescapeAsterisk : boolean;
    /** Convert em-dashes to "--". */
    normalizeMDash : boolean;
    /** Convert all other dashes to "-". */
    normalizeDash : boolean;
    /** Convert `&lt;` to `<`, etc. */
    normalizeHtmlSymbol : boolean;
    /** Convert `Beyonc&eacute;` to `Beyonce`. */
    normalizeHtmlAccent : boolean;
}

export interface TokenizerOptions extends StructuralOptions, NormalizationOptions {
    /**
     * Master switch for normalization.
     *
     * If false, every normalization option is off, regardless of its own value.
     */
    normalize : boolean;
}

export type NormalizationOption = keyof NormalizationOptions;
export type TokenizerOption = keyof TokenizerOptions;

export const STRUCTURAL_OPTIONS : ReadonlyArray<keyof StructuralOptions> = [
    'tokenizeSgml',
    'tokenizeNewline',
    'tokenizeWhitespace',
    'tokenizeAllDashedWords',
    'abbrevPrecedesLowercase',
];

export const NORMALIZATION_OPTIONS : readonly NormalizationOption[] = [
    'normalizeQuote',
    'normalizeApostrophe',
    'normalizeCurrency',
    'normalizeAmpersand',
    'normalizeFractions',
    'normalizeEllipsis',
    'undoPennParens',
    'unescapeSlash',
    'unescapeAsterisk',
    'normalizeMDash',
    'normalizeDash',
    'normalizeHtmlSymbol',
    'normalizeHtmlAccent',
];

const ALL_OPTIONS : ReadonlySet<string> = new Set<string>([...STRUCTURAL_OPTIONS, 'normalize', ...NORMALIZATION_OPTIONS]);

function makeOptions(normalize : boolean) : Readonly<TokenizerOptions> {
    return Object.freeze({
        tokenizeSgml: false,
        tokenizeNewline: false,
        tokenizeWhitespace: false,
        tokenizeAllDashedWords: false,
        abbrevPrecedesLowercase: false,

        normalize,
        normalizeQuote: normalize,
        normalizeApostrophe: normalize,
        normalizeCurrency: normalize,
        normalizeAmpersand: normalize,
        normalizeFractions: normalize,
        normalizeEllipsis: normalize,
        undoPennParens: normalize,
        unescapeSlash: normalize,
        unescapeAsterisk: normalize,
        normalizeMDash: normalize,
        normalizeDash: normalize,
        normalizeHtmlSymbol: normalize,
        normalizeHtmlAccent: normalize,
    });
}

/**
 * Pure tokenization: no normalization of any kind.
 */
export const PLAIN_OPTIONS = makeOptions(false);

/**
 * Tokenization with every normalization enabled. This is the default, and
 * what you probably want to use.
 */
export const NORMALIZING_OPTIONS = makeOptions(true);

export type TokenizerPreset = 'plain'|'normalizing';

export const PRESETS : Readonly<Record<TokenizerPreset, Readonly<TokenizerOptions>>> = {
    plain: PLAIN_OPTIONS,
    normalizing: NORMALIZING_OPTIONS
};

export function isTokenizerOption(name : string) : name is TokenizerOption {
    return ALL_OPTIONS.has(name);
}

export function isTokenizerPreset(name : string) : name is TokenizerPreset {
    return name === 'plain' || name === 'normalizing';
}

/**
 * Fill in the missing options from {@link NORMALIZING_OPTIONS}, and turn off
 * every normalization if the master switch is off.
 */
export function resolveOptions(options : Partial<TokenizerOptions> = {}) : Readonly<TokenizerOptions> {
    const resolved : TokenizerOptions = { ...NORMALIZING_OPTIONS };
    for (const [name, value] of Object.entries(options)) {
        if (!isTokenizerOption(name))
            throw new UnknownOptionError(name);
        if (value !== undefined)
            resolved[name] = value;
    }

    if (!resolved.normalize) {
        for (const name of NORMALIZATION_OPTIONS)
            resolved[name] = false;
    }
    return Object.freeze(resolved);
}
