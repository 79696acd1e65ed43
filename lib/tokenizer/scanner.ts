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

import Lexer from 'flex-js';

import ABBREVIATIONS from '../../data/abbreviations.json';
import { StructuralOptions } from '../config';
import * as C from './char-classes';

/**
 * A span of text matched by one scanner rule.
 *
 * Offsets are relative to the scanned buffer.
 */
export interface RawLexeme {
    text : string;
    start : number;
    length : number;
    /** The name of the rule that matched. */
    rule : string;
}

interface ScanRule {
    name : string;
    expression : RegExp;
    /** False for the rules that match text to be skipped (whitespace). */
    keep : boolean;
    /** Split one match into several lexemes, returning the length of each. */
    split ?: (text : string) => number[];
}

interface Match {
    rule : ScanRule;
    text : string;
}

function splitAt(...lengths : Array<number|((text : string) => number)>) {
    return (text : string) : number[] => {
        const pieces : number[] = [];
        let remaining = text.length;
        for (const length of lengths) {
            const piece = typeof length === 'number' ? length : length(text);
            pieces.push(piece);
            remaining -= piece;
        }
        if (remaining > 0)
            pieces.push(remaining);
        return pieces;
    };
}

function abbreviationVariants(abbreviations : readonly string[]) : string[] {
    // abbreviations listed in lowercase are also recognized capitalized
    // (at the beginning of a sentence)
    const variants = new Set<string>();
    for (const abbrev of abbreviations) {
        variants.add(abbrev);
        if (C.isLowerCase(abbrev[0]))
            variants.add(abbrev[0].toUpperCase() + abbrev.substring(1));
    }
    return Array.from(variants);
}

/**
 * The rule-based scanner that splits text into lexemes.
 *
 * The rule set depends on the structural options, and is built once at
 * construction. Each call to {@link scan} runs a fresh lexer over the
 * rules, so the same scanner can be used on any number of texts.
 */
export default class Scanner {
    private readonly _options : Readonly<StructuralOptions>;
    private readonly _definitions : Map<string, string>;
    private readonly _rules : ScanRule[];

    constructor(options : Readonly<StructuralOptions>) {
        this._options = options;
        this._definitions = new Map;
        this._rules = [];

        // IMPORTANT NOTE for reading this
        // this is a classic longest-match-first (greedy) lexical analyzer
        // rules are listed in priority order: if two rules match the same
        // number of characters, the one listed first wins
        // (e.g. "USD1" is split by the currency rules even though it is also a word)

        this._initDefinitions();
        this._initWhitespace();
        this._initSgml();
        this._initURLs();
        this._initEntities();
        this._initAbbreviations();
        this._initDates();
        this._initCurrency();
        this._initNumbers();
        this._initWords();
        this._initPunctuation();
        this._initCatchAll();
    }

    /**
     * The names of the active rules, in priority order.
     */
    get ruleNames() : string[] {
        return this._rules.map((r) => r.name);
    }

    private _addDefinition(name : string, expansion : RegExp) {
        this._definitions.set(name, this._expand(expansion.source));
    }

    // definitions are expanded as they are added, so one pass is enough
    private _expand(source : string) : string {
        return source.replace(/\{([A-Z_]+)\}/g, (match, name : string) => {
            const definition = this._definitions.get(name);
            return definition === undefined ? match : '(?:' + definition + ')';
        });
    }

    private _addRule(name : string, expression : RegExp, split ?: (text : string) => number[], keep = true) {
        // wrap the expression so that top-level alternatives are anchored together
        const source = '(?:' + this._expand(expression.source) + ')';
        this._rules.push({ name, expression: new RegExp(source), keep, split });
    }

    private _initDefinitions() {
        this._addDefinition('SPACE', C.SPACE);
        this._addDefinition('NEWLINE', C.NEWLINE);
        this._addDefinition('DIGIT', C.DIGIT);
        this._addDefinition('LETTER', C.LETTER);
        this._addDefinition('APOS', C.APOSTROPHE);

        // letters and digits; accented letters written as HTML entities
        // ("Beyonc&eacute;") are part of the word
        this._addDefinition('WORDCHAR', new RegExp(`${C.LETTER.source}|${C.DIGIT.source}|${C.ACCENT_ENTITY.source}`));

        // words have internal apostrophes, but never start or end with one
        this._addDefinition('WORD', /{WORDCHAR}+(?:{APOS}{WORDCHAR}+)*/);

        this._addDefinition('NUMBER', /{DIGIT}+(?:[,.]{DIGIT}+)*|\.{DIGIT}+/);
        this._addDefinition('CURRENCY_CODE', new RegExp(C.alternation(C.CURRENCY_CODES)));
    }

    protected _initWhitespace() {
        if (this._options.tokenizeWhitespace) {
            this._addRule('whitespace', /(?:{SPACE}|{NEWLINE})+/);
        } else {
            // discard spaces
            this._addRule('space', /{SPACE}+/, undefined, false);
            this._addRule('newline', /{NEWLINE}+/, undefined, this._options.tokenizeNewline);
        }
    }

    protected _initSgml() {
        if (!this._options.tokenizeSgml)
            return;

        // a tag, a comment or a declaration, from "<" to the next ">"
        this._addRule('sgml', /<\/?[A-Za-z!?][^<>]*>/);
    }

    protected _initURLs() {
        // a long url is http:// and similar, followed by anything up to whitespace, "<", ">" or a quote,
        // but not including final punctuation
        this._addRule('url', /(?:https?|ftps?|file):\/\/[^\s\u0085<>"]*[^\s\u0085<>"'.,;:!?)\]]/);

        // a short url is www. followed by one or more host name components and an optional path
        this._addRule('url', /www\.[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)+(?:\/[^\s\u0085<>"]*[^\s\u0085<>"'.,;:!?)\]])?/);

        // local part of at most 64 characters, host labels of at most 63
        this._addRule('email', /(?:mailto:)?[A-Za-z0-9._%+-]{1,64}@[A-Za-z0-9-]{1,63}(?:\.[A-Za-z0-9-]{1,63})+/);
    }

    protected _initEntities() {
        // -LRB- and friends
        this._addRule('penn-bracket', C.PENN_BRACKET_CODE);

        // &amp; &#38; &#x26;
        this._addRule('html-entity', C.HTML_ENTITY);
    }

    protected _initAbbreviations() {
        this._addRule('abbreviation', new RegExp(C.alternation(abbreviationVariants(ABBREVIATIONS))));

        // initialisms: U.S. e.g. a.b.c.
        this._addRule('abbreviation', /(?:[A-Za-z]\.){2,}/);

        // AT&T, AT&amp;T
        this._addRule('ampersand-name', /[A-Z]+(?:&|&amp;)[A-Z]+(?!{WORDCHAR})/);
    }

    protected _initDates() {
        // ISO dates are one token, even if dashed words are split
        this._addRule('date', /{DIGIT}{4}-{DIGIT}{1,2}-{DIGIT}{1,2}(?!{WORDCHAR})/);
    }

    protected _initCurrency() {
        // US$ HK$
        this._addRule('currency', new RegExp('(?:' + C.alternation(C.DOLLAR_PREFIXES) + ')\\$'));

        // a currency code glued to an amount is split from it: USD1 -> USD 1, 2KPW -> 2 KPW
        this._addRule('currency', /{CURRENCY_CODE}{NUMBER}/, splitAt(3));
        this._addRule('currency', /{NUMBER}{CURRENCY_CODE}(?!{WORDCHAR})/, splitAt((text) => text.length - 3));
    }

    protected _initNumbers() {
        // numbers with "," or "." separated digit groups: 1,000.50 3.14 .5
        this._addRule('number', /{NUMBER}/);
    }

    protected _initWords() {
        // clitics are split from the word they follow: don't -> do n't, he'll -> he 'll
        this._addRule('clitic', /{WORDCHAR}*{LETTER}[nN]{APOS}[tT](?!{WORDCHAR})/, splitAt((text) => text.length - 3));
        this._addRule('clitic', /{WORD}{APOS}(?:[sSmMdD]|ll|LL|re|RE|ve|VE)(?!{WORDCHAR})/, splitAt(C.lastApostrophe));

        // and/or 3/4 1\/2
        this._addRule('slashed-word', /{WORD}(?:\\?\/{WORD})+/);

        // dashed words: ethno-centric art-o-torium
        // if dashed words are split, the hyphens are caught by the catch-all rule
        if (!this._options.tokenizeAllDashedWords)
            this._addRule('dashed-word', /{WORD}(?:-{WORD})+/);

        this._addRule('word', /{WORD}/);
    }

    protected _initPunctuation() {
        // ". . ."
        this._addRule('ellipsis', /\.(?: \.){2,}/);

        // runs of sentence final punctuation are one token: "..." "?!?" ".!?"
        this._addRule('sentence-final', /[.!?]+/);

        this._addRule('ellipsis', new RegExp(C.ELLIPSIS.source + '+'));

        // old-school dashes
        this._addRule('dash', /-{2,}/);
        this._addRule('dash', new RegExp(C.EM_DASH.source + '+'));

        // Penn Treebank style quotes
        this._addRule('quote', /``|''/);

        // \* and \/
        this._addRule('escaped', /(?:\\[*/])+/);
    }

    protected _initCatchAll() {
        // non-BMP characters (mainly emojis)
        // note: these are not Unicode regular expressions, they are UTF-16 regular expressions
        this._addRule('symbol', /[\ud800-\udbff][\udc00-\udfff]/);

        // catch-all rule: punctuation and other symbols
        this._addRule('symbol', /[\s\S]/);
    }

    /**
     * Split the buffer into lexemes, lazily.
     *
     * The buffer should end with a newline, so that rules that look ahead
     * always have a character to look at.
     */
    *scan(buffer : string) : IterableIterator<RawLexeme> {
        const lexer = new Lexer<Match>();
        lexer.setIgnoreCase(false);
        for (const rule of this._rules)
            lexer.addRule(rule.expression, (self) => ({ rule, text: self.text }));
        lexer.setSource(buffer);

        // every rule produces a match, including the rules for skipped text,
        // so the offset of each match is the sum of the lengths before it
        let offset = 0;
        let match : Match|(typeof Lexer.EOF);
        while ((match = lexer.lex()) !== Lexer.EOF) {
            const start = offset;
            offset += match.text.length;
            if (!match.rule.keep)
                continue;

            if (!match.rule.split) {
                yield { text: match.text, start, length: match.text.length, rule: match.rule.name };
                continue;
            }
            let pieceStart = start;
            for (const length of match.rule.split(match.text)) {
                yield {
                    text: match.text.substring(pieceStart - start, pieceStart - start + length),
                    start: pieceStart,
                    length,
                    rule: match.rule.name
                };
                pieceStart += length;
            }
        }
    }
}
