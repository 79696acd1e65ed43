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

/**
 * Raised when a section that already holds tokens is tokenized again.
 *
 * Call {@link Section.clearTokens} first.
 */
export class PreconditionError extends Error {
    code = 'ERR_ALREADY_TOKENIZED' as const;

    constructor(message : string) {
        super(message);
    }
}

export class InvalidEditError extends Error {
    code = 'ERR_INVALID_EDIT' as const;

    constructor(message : string) {
        super(message);
    }
}

export class InvalidSectionError extends Error {
    code = 'ERR_INVALID_SECTION' as const;

    constructor(public readonly start : number, public readonly end : number) {
        super(`Invalid section range [${start}, ${end})`);
    }
}

export class UnknownOptionError extends Error {
    code = 'ERR_UNKNOWN_OPTION' as const;

    constructor(public readonly option : string) {
        super(`Unknown tokenizer option ${option}`);
    }
}
