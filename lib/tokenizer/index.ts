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

import { getLogger } from 'log4js';

import {
    PRESETS,
    TokenizerOptions,
    TokenizerPreset,
    resolveOptions,
} from '../config';
import { Document, Section, Token, TOKEN_ANNOTATION } from '../document';
import { PreconditionError } from '../errors';
import AbbreviationCorrector from './abbreviation';
import Normalizer from './normalizer';
import Scanner from './scanner';

export { Normalizer, Scanner, AbbreviationCorrector };
export type { RawLexeme } from './scanner';

const logger = getLogger('tokenizer');

// appended to every section before scanning, and stripped afterwards
const SENTINEL = '\n';

/**
 * Splits the sections of a document into Penn Treebank style tokens.
 *
 * A tokenizer holds no state besides its options and rule tables, so one
 * instance can be used for any number of documents.
 */
export class TreebankTokenizer {
    readonly name = 'treebank-tokenizer';
    readonly options : Readonly<TokenizerOptions>;
    private readonly _scanner : Scanner;
    private readonly _normalizer : Normalizer;
    private readonly _corrector : AbbreviationCorrector|null;

    constructor(options : Partial<TokenizerOptions> = {}) {
        this.options = resolveOptions(options);
        this._scanner = new Scanner(this.options);
        this._normalizer = new Normalizer(this.options);
        this._corrector = this.options.abbrevPrecedesLowercase ? new AbbreviationCorrector() : null;
    }

    /**
     * Tokenize every section of the document.
     */
    process(document : Document) : Document {
        for (const section of document.sections)
            this.tokenizeSection(section);
        if (!document.annotators.has(TOKEN_ANNOTATION))
            document.annotators.set(TOKEN_ANNOTATION, this.name);

        logger.debug(`tokenized ${document.sections.length} sections into ${document.tokenCount} tokens`);
        return document;
    }

    tokenizeSection(section : Section) : void {
        if (section.length > 0)
            throw new PreconditionError(`Section [${section.start}, ${section.end}) is already tokenized`);

        for (const lexeme of this._scanner.scan(section.text + SENTINEL)) {
            const normalized = this._normalizer.normalize(lexeme.text);
            if (this._corrector)
                section.apply(this._corrector.correct(section, normalized));
            section.append(lexeme.start, lexeme.start + lexeme.length, this._attach(lexeme.text, normalized));
        }
        this._stripSentinel(section);
    }

    private _attach(raw : string, normalized : string) : string|null {
        return normalized === raw ? null : normalized;
    }

    // only a whitespace token can reach into the sentinel, and only as the
    // last token: drop it, or cut it back to the real trailing whitespace
    private _stripSentinel(section : Section) {
        const last = section.last();
        if (!last || last.end <= section.text.length)
            return;

        const index = section.length - 1;
        section.apply([{ type: 'remove', index }]);
        if (last.start < section.text.length) {
            const raw = section.text.substring(last.start);
            section.append(last.start, section.text.length, this._attach(raw, this._normalizer.normalize(raw)));
        }
    }

    /**
     * Tokenize a piece of text as a single section.
     */
    tokenize(text : string) : Token[] {
        return this.process(new Document(text)).tokens;
    }

    /**
     * Tokenize a piece of text, and return the string of every token
     * (normalized, if normalization is enabled).
     */
    tokenizeToStrings(text : string) : string[] {
        return this.tokenize(text).map((tok) => tok.string);
    }
}

const _instances = new Map<TokenizerPreset, TreebankTokenizer>();

/**
 * Get the shared tokenizer for a preset.
 */
export function getTokenizer(preset : TokenizerPreset = 'normalizing') : TreebankTokenizer {
    let instance = _instances.get(preset);
    if (instance)
        return instance;

    instance = new TreebankTokenizer(PRESETS[preset]);
    _instances.set(preset, instance);
    return instance;
}

function tokenizerFor(options ?: Partial<TokenizerOptions>) : TreebankTokenizer {
    return options === undefined ? getTokenizer() : new TreebankTokenizer(options);
}

export function tokenize(text : string, options ?: Partial<TokenizerOptions>) : Token[] {
    return tokenizerFor(options).tokenize(text);
}

export function tokenizeToStrings(text : string, options ?: Partial<TokenizerOptions>) : string[] {
    return tokenizerFor(options).tokenizeToStrings(text);
}
