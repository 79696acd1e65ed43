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

// Character classes shared by the scanner and the normalizer.
//
// Every class is a regular expression matching exactly one character (or one
// short fixed sequence), so the scanner can splice its source into larger rules.
// Code points in the 0x80-0x9f range are the Windows-1252 punctuation that
// shows up in text decoded as Latin-1.

import escapeStringRegexp from 'escape-string-regexp';

/*eslint no-misleading-character-class: off */

// horizontal white spaces
// list from http://jkorpela.fi/chars/spaces.html
export const SPACE = /[ \t\v\f\u00a0\u1680\u180e\u2000-\u200b\u202f\u205f\u3000\ufeff]/;
export const NEWLINE = /[\n\r\u0085\u2028\u2029]/;

export const DIGIT = /[0-9]/;

// letters: Latin (with the Latin-1 and Latin Extended blocks), combining accents,
// Greek, Cyrillic, Hebrew, Arabic, Devanagari, kana, CJK ideographs and Hangul
export const LETTER = /[A-Za-z\u00aa\u00b5\u00ba\u00c0-\u00d6\u00d8-\u00f6\u00f8-\u02af\u0300-\u036f\u0370-\u03ff\u0400-\u052f\u05d0-\u05ea\u0620-\u064a\u0900-\u097f\u3040-\u30ff\u4e00-\u9fff\uac00-\ud7af]/;

// an accented letter written as an HTML entity, which counts as a letter inside words
export const ACCENT_ENTITY = /&[A-Za-z](?:acute|grave|circ|uml|tilde|cedil|ring|slash|caron);|&szlig;|&(?:AE|ae|OE|oe)lig;/;

export const HTML_ENTITY = /&(?:[A-Za-z][A-Za-z0-9]*|#[0-9]+|#[xX][0-9A-Fa-f]+);/;

export const DOUBLE_QUOTE = /["\u0093\u0094\u00ab\u00bb\u201c\u201d\u201e\u201f\u301d\u301e]/;
export const APOSTROPHE = /['`\u0091\u0092\u00b4\u2018\u2019\u201a\u201b]/;

export const CENTS = /[\u00a2\uffe0]/;
// every currency sign but the cent signs
export const CURRENCY_SYMBOL = /[$\u00a3-\u00a5\u058f\u060b\u09f2\u09f3\u0e3f\u17db\u20a0-\u20bf\ufdfc\ufe69\uff04\uffe1\uffe5\uffe6]/;

export const EM_DASH = /[\u0097\u2014\u2015\u2e3a\u2e3b]/;
export const DASH = /[\u0096\u2010-\u2013\u2043\u2212\ufe58\ufe63\uff0d]/;

export const AMPERSAND = /[&\ufe60\uff06]/;

export const ELLIPSIS = /\u2026/;

export const FRACTIONS : ReadonlyMap<string, string> = new Map([
    ['¼', '1/4'],
    ['½', '1/2'],
    ['¾', '3/4'],
    ['⅐', '1/7'],
    ['⅑', '1/9'],
    ['⅒', '1/10'],
    ['⅓', '1/3'],
    ['⅔', '2/3'],
    ['⅕', '1/5'],
    ['⅖', '2/5'],
    ['⅗', '3/5'],
    ['⅘', '4/5'],
    ['⅙', '1/6'],
    ['⅚', '5/6'],
    ['⅛', '1/8'],
    ['⅜', '3/8'],
    ['⅝', '5/8'],
    ['⅞', '7/8'],
    ['↉', '0/3'],
]);
export const FRACTION = /[\u00bc-\u00be\u2150-\u215e\u2189]/;

// right/left round/curly/square bracket
export const PENN_BRACKETS : Readonly<Record<string, string>> = {
    LRB: '(',
    RRB: ')',
    LCB: '{',
    RCB: '}',
    LSB: '[',
    RSB: ']',
};
export const PENN_BRACKET_CODE = /-(?:LRB|RRB|LCB|RCB|LSB|RSB)-|-(?:lrb|rrb|lcb|rcb|lsb|rsb)-/;

// "US$", "HK$" and the like
export const DOLLAR_PREFIXES = ['US', 'AU', 'A', 'CA', 'C', 'HK', 'NZ', 'NT', 'S', 'SG', 'MX', 'R'];

export const CURRENCY_CODES = [
    'USD', 'EUR', 'GBP', 'JPY', 'CNY', 'RMB', 'INR', 'KRW', 'KPW', 'RUB', 'CHF', 'CAD',
    'AUD', 'NZD', 'HKD', 'SGD', 'MXN', 'BRL', 'ZAR', 'SEK', 'NOK', 'DKK', 'TRY', 'ILS'
];

// named entities of the normalization families other than symbols and accents
export const ENTITY_NAMES = {
    quote: ['quot', 'ldquo', 'rdquo', 'bdquo', 'laquo', 'raquo'],
    apostrophe: ['apos', 'lsquo', 'rsquo', 'sbquo'],
    ampersand: ['amp'],
    cents: ['cent'],
    currency: ['pound', 'euro', 'yen', 'curren', 'dollar'],
    ellipsis: ['hellip'],
    mdash: ['mdash'],
    dash: ['ndash'],
} as const;

export const FRACTION_ENTITIES : Readonly<Record<string, string>> = {
    frac14: '1/4',
    frac12: '1/2',
    frac34: '3/4',
};

export const HTML_SYMBOLS : Readonly<Record<string, string>> = {
    lt: '<',
    gt: '>',
    copy: '©',
    reg: '®',
    trade: '™',
    deg: '°',
    sect: '§',
    para: '¶',
    middot: '·',
    bull: '•',
    times: '×',
    divide: '÷',
    plusmn: '±',
    permil: '‰',
    micro: 'µ',
    brvbar: '¦',
    not: '¬',
    iexcl: '¡',
    iquest: '¿',
    dagger: '†',
    Dagger: '‡',
    prime: '′',
};

/**
 * Build an alternation matching any of the given strings literally,
 * longest first.
 */
export function alternation(words : Iterable<string>) : string {
    return Array.from(words)
        .sort((a, b) => b.length - a.length)
        .map((w) => escapeStringRegexp(w))
        .join('|');
}

/**
 * Build a pattern matching the HTML entities with the given names.
 */
export function entityPattern(names : Iterable<string>) : string {
    return '&(?:' + alternation(names) + ');';
}

function whole(regexp : RegExp) : RegExp {
    return new RegExp('^(?:' + regexp.source + ')$');
}

const IS_SPACE = whole(SPACE);
const IS_NEWLINE = whole(NEWLINE);
const IS_DIGIT = whole(DIGIT);
const IS_QUOTE = whole(DOUBLE_QUOTE);
const IS_APOSTROPHE = whole(APOSTROPHE);
const IS_CURRENCY = new RegExp('^(?:' + CURRENCY_SYMBOL.source + '|' + CENTS.source + ')$');
const IS_EM_DASH = whole(EM_DASH);
const IS_DASH = whole(DASH);
const IS_FRACTION = whole(FRACTION);
const IS_ELLIPSIS = whole(ELLIPSIS);
const IS_PENN_BRACKET_CODE = whole(PENN_BRACKET_CODE);
const HTML_ENTITY_AT = new RegExp(HTML_ENTITY.source, 'y');

/**
 * Check if the character is a lowercase letter.
 *
 * Only characters with a distinct uppercase form count, so digits and
 * punctuation are not lowercase.
 */
export function isLowerCase(char : string) : boolean {
    return char.toLowerCase() === char && char.toUpperCase() !== char;
}

export function isWhitespace(char : string) : boolean {
    return IS_SPACE.test(char) || IS_NEWLINE.test(char);
}

export function isDigit(char : string) : boolean {
    return IS_DIGIT.test(char);
}

export function isQuote(char : string) : boolean {
    return IS_QUOTE.test(char);
}

export function isApostrophe(char : string) : boolean {
    return IS_APOSTROPHE.test(char);
}

export function isCurrencySymbol(char : string) : boolean {
    return IS_CURRENCY.test(char);
}

export function isEmDash(char : string) : boolean {
    return IS_EM_DASH.test(char);
}

// em-dashes are dashes too
export function isDash(char : string) : boolean {
    return char === '-' || IS_DASH.test(char) || IS_EM_DASH.test(char);
}

export function isFractionGlyph(char : string) : boolean {
    return IS_FRACTION.test(char);
}

export function isEllipsisGlyph(char : string) : boolean {
    return IS_ELLIPSIS.test(char);
}

export function isPennBracketCode(text : string) : boolean {
    return IS_PENN_BRACKET_CODE.test(text);
}

/**
 * Check if an HTML entity (`&name;`, `&#nn;` or `&#xhh;`) starts at the given
 * index of the text.
 */
export function startsHtmlEntity(text : string, index : number) : boolean {
    HTML_ENTITY_AT.lastIndex = index;
    return HTML_ENTITY_AT.test(text);
}

/**
 * Find the index of the last apostrophe in the text, or -1.
 */
export function lastApostrophe(text : string) : number {
    for (let i = text.length-1; i >= 0; i--) {
        if (IS_APOSTROPHE.test(text[i]))
            return i;
    }
    return -1;
}
