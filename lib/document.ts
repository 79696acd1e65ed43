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

import { InvalidEditError, InvalidSectionError } from './errors';

/**
 * The name under which the tokenizer records its work in {@link Document.annotators}.
 */
export const TOKEN_ANNOTATION = 'token';

/**
 * One step of a change to the token list of a section.
 *
 * Inserting at index `section.length` appends.
 */
export type TokenEdit = {
    type : 'insert';
    index : number;
    start : number;
    end : number;
    normalized : string|null;
} | {
    type : 'remove';
    index : number;
};

/**
 * A span of a section's text.
 *
 * Offsets are relative to the start of the section.
 */
export class Token {
    constructor(public readonly section : Section,
                public readonly start : number,
                public readonly end : number,
                public readonly normalized : string|null = null) {
    }

    get length() : number {
        return this.end - this.start;
    }

    /**
     * The exact text covered by this token.
     */
    get raw() : string {
        return this.section.text.substring(this.start, this.end);
    }

    /**
     * The normalized text if there is one, the raw text otherwise.
     */
    get string() : string {
        return this.normalized ?? this.raw;
    }

    get documentStart() : number {
        return this.section.start + this.start;
    }

    get documentEnd() : number {
        return this.section.start + this.end;
    }

    toString() : string {
        return `${this.string}@${this.start}:${this.end}`;
    }
}

export class Section {
    readonly text : string;
    private _tokens : Token[];

    constructor(public readonly document : Document,
                public readonly start : number,
                public readonly end : number) {
        this.text = document.text.substring(start, end);
        this._tokens = [];
    }

    get tokens() : readonly Token[] {
        return this._tokens;
    }

    get length() : number {
        return this._tokens.length;
    }

    /**
     * The token `n` positions from the end (1 is the last token), or
     * undefined if the section is shorter than that.
     */
    last(n = 1) : Token|undefined {
        return this._tokens[this._tokens.length - n];
    }

    clearTokens() : void {
        this._tokens = [];
    }

    /**
     * Apply a sequence of edits, in order.
     *
     * Every step is checked: tokens must stay non-empty, sorted and
     * pairwise non-overlapping.
     */
    apply(edits : Iterable<TokenEdit>) : void {
        for (const edit of edits) {
            if (edit.type === 'insert')
                this._insert(edit.index, new Token(this, edit.start, edit.end, edit.normalized));
            else
                this._remove(edit.index);
        }
    }

    append(start : number, end : number, normalized : string|null = null) : Token {
        const token = new Token(this, start, end, normalized);
        this._insert(this._tokens.length, token);
        return token;
    }

    private _insert(index : number, token : Token) {
        if (index < 0 || index > this._tokens.length)
            throw new InvalidEditError(`Cannot insert at ${index} in a section of ${this._tokens.length} tokens`);
        if (token.start < 0 || token.end <= token.start)
            throw new InvalidEditError(`Invalid token span [${token.start}, ${token.end})`);

        const prev = this._tokens[index-1];
        if (prev && prev.end > token.start)
            throw new InvalidEditError(`Token [${token.start}, ${token.end}) overlaps the preceding token [${prev.start}, ${prev.end})`);
        const next = this._tokens[index];
        if (next && token.end > next.start)
            throw new InvalidEditError(`Token [${token.start}, ${token.end}) overlaps the following token [${next.start}, ${next.end})`);

        this._tokens.splice(index, 0, token);
    }

    private _remove(index : number) {
        if (index < 0 || index >= this._tokens.length)
            throw new InvalidEditError(`Cannot remove token ${index} from a section of ${this._tokens.length} tokens`);
        this._tokens.splice(index, 1);
    }
}

/**
 * A text, split into one or more sections that are tokenized independently.
 */
export class Document {
    readonly text : string;
    /**
     * The annotations completed on this document, mapped to the name of
     * the annotator that produced them.
     */
    readonly annotators : Map<string, string>;
    private _sections : Section[];

    /**
     * Construct a new document.
     *
     * @param text - the full text of the document
     * @param sections - the `[start, end)` ranges of the sections; by default
     *   a single section covers the whole text
     */
    constructor(text : string, sections : Array<[number, number]> = [[0, text.length]]) {
        this.text = text;
        this.annotators = new Map;
        this._sections = [];
        for (const [start, end] of sections)
            this.addSection(start, end);
    }

    get sections() : readonly Section[] {
        return this._sections;
    }

    get tokens() : Token[] {
        const tokens : Token[] = [];
        for (const section of this._sections) {
            for (const tok of section.tokens)
                tokens.push(tok);
        }
        return tokens;
    }

    get tokenCount() : number {
        let count = 0;
        for (const section of this._sections)
            count += section.length;
        return count;
    }

    addSection(start : number, end : number) : Section {
        const prev = this._sections[this._sections.length-1];
        if (start < 0 || end < start || end > this.text.length || (prev && prev.end > start))
            throw new InvalidSectionError(start, end);

        const section = new Section(this, start, end);
        this._sections.push(section);
        return section;
    }
}
