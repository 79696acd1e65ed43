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

import { Section, TokenEdit } from '../document';
import { isLowerCase } from './char-classes';

const logger = getLogger('tokenizer');

/**
 * Merge a word and the period that follows it into one abbreviation
 * token, when the next word starts with a lowercase letter
 * ("Abbrev. has" -> "Abbrev." "has").
 *
 * Only the last two tokens of the section are ever looked at, so an
 * abbreviation made of several word-period pairs is not merged.
 */
export default class AbbreviationCorrector {
    /**
     * Compute the edits to apply to the section before the next token is
     * appended.
     *
     * @param section - the section being tokenized
     * @param next - the (normalized) string of the token about to be appended
     * @returns the edits, or an empty list if there is nothing to merge
     */
    correct(section : Section, next : string) : TokenEdit[] {
        if (section.length < 2 || next.length === 0 || !isLowerCase(next[0]))
            return [];

        const period = section.last(1);
        const word = section.last(2);
        if (!period || !word || period.string !== '.' || word.end !== period.start)
            return [];

        let normalized : string|null = null;
        if (word.normalized !== null || period.normalized !== null)
            normalized = word.string + period.string;

        const index = section.length - 2;
        logger.debug(`merging abbreviation ${word.raw}${period.raw} at ${word.start}`);
        return [
            { type: 'remove', index: index + 1 },
            { type: 'remove', index },
            { type: 'insert', index, start: word.start, end: period.end, normalized },
        ];
    }
}
