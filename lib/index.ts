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

import {
    TreebankTokenizer,
    AbbreviationCorrector,
    Normalizer,
    Scanner,
    getTokenizer,
    tokenize,
    tokenizeToStrings,
} from './tokenizer';
import {
    PLAIN_OPTIONS,
    NORMALIZING_OPTIONS,
    PRESETS,
    resolveOptions,
    isTokenizerOption,
    isTokenizerPreset,
} from './config';
import { Document, Section, Token, TOKEN_ANNOTATION } from './document';
import {
    PreconditionError,
    InvalidEditError,
    InvalidSectionError,
    UnknownOptionError,
} from './errors';
import * as CharClasses from './tokenizer/char-classes';
import * as StreamUtils from './utils/stream-utils';

export type { RawLexeme } from './tokenizer';
export type {
    StructuralOptions,
    NormalizationOptions,
    NormalizationOption,
    TokenizerOptions,
    TokenizerOption,
    TokenizerPreset,
} from './config';
export type { TokenEdit } from './document';

export {
    // tokenization
    TreebankTokenizer,
    getTokenizer,
    tokenize,
    tokenizeToStrings,

    // pipeline stages
    Scanner,
    Normalizer,
    AbbreviationCorrector,
    CharClasses,

    // configuration
    PLAIN_OPTIONS,
    NORMALIZING_OPTIONS,
    PRESETS,
    resolveOptions,
    isTokenizerOption,
    isTokenizerPreset,

    // documents
    Document,
    Section,
    Token,
    TOKEN_ANNOTATION,

    // errors
    PreconditionError,
    InvalidEditError,
    InvalidSectionError,
    UnknownOptionError,

    // semi-unstable API
    StreamUtils,
};
