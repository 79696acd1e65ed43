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

import * as fs from 'fs';
import * as stream from 'stream';
import byline from 'byline';
import * as argparse from 'argparse';
import * as log4js from 'log4js';

import {
    NORMALIZATION_OPTIONS,
    PRESETS,
    STRUCTURAL_OPTIONS,
    TokenizerOption,
    TokenizerOptions,
    TokenizerPreset,
} from '../../lib/config';
import * as StreamUtils from '../../lib/utils/stream-utils';

const OPTION_NAMES : TokenizerOption[] = [...STRUCTURAL_OPTIONS, 'normalize', ...NORMALIZATION_OPTIONS];

/**
 * The arguments shared by every sub-command.
 */
export interface CommonArgs {
    input_file : stream.Readable[];
    output : stream.Writable;
    preset : TokenizerPreset;
    set_option : TokenizerOption[];
    unset_option : TokenizerOption[];
    debug : boolean;
}

export function maybeCreateReadStream(filename : string) : stream.Readable {
    if (filename === '-')
        return process.stdin;
    else
        return fs.createReadStream(filename);
}

/**
 * Read the lines of all the files, in order, as one object-mode stream of strings.
 */
export function readAllLines(files : stream.Readable[]) : stream.Readable {
    return StreamUtils.chain(files.map((s) => s.setEncoding('utf8').pipe(byline())));
}

export function addCommonArguments(parser : argparse.ArgumentParser) : void {
    parser.add_argument('input_file', {
        nargs: '+',
        type: maybeCreateReadStream,
        help: 'Input files, one section per line; use - for standard input'
    });
    parser.add_argument('-o', '--output', {
        required: false,
        type: fs.createWriteStream,
        default: process.stdout
    });
    parser.add_argument('--preset', {
        required: false,
        default: 'normalizing',
        choices: Object.keys(PRESETS),
        help: `The option preset to start from (defaults to 'normalizing', every normalization enabled)`
    });
    parser.add_argument('--set-option', {
        action: 'append',
        default: [],
        choices: OPTION_NAMES,
        metavar: 'OPTION',
        help: 'Turn on a tokenizer option (can be repeated)'
    });
    parser.add_argument('--unset-option', {
        action: 'append',
        default: [],
        choices: OPTION_NAMES,
        metavar: 'OPTION',
        help: 'Turn off a tokenizer option (can be repeated); applied after --set-option'
    });
    parser.add_argument('--debug', {
        action: 'store_true',
        default: false,
        help: 'Enable debugging.',
    });
}

export function makeTokenizerOptions(args : CommonArgs) : TokenizerOptions {
    const options : TokenizerOptions = { ...PRESETS[args.preset] };
    for (const name of args.set_option)
        options[name] = true;
    for (const name of args.unset_option)
        options[name] = false;
    return options;
}

export function configureLogging(debug : boolean) : void {
    log4js.configure({
        appenders: {
            stderr: { type: 'stderr' },
        },
        categories: {
            default: { appenders: ['stderr'], level: debug ? 'debug' : 'warn' },
        },
    });
}
