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

import * as argparse from 'argparse';
import Stream from 'stream';
import { pipeline } from 'stream/promises';

import { TreebankTokenizer } from '../lib/tokenizer';
import {
    CommonArgs,
    addCommonArguments,
    configureLogging,
    makeTokenizerOptions,
    readAllLines,
} from './lib/argutils';

export type OutputFormat = 'text'|'owpl';

/**
 * Tokenize each line written to the stream, and write out the tokens.
 *
 * In `text` format, each line becomes the token strings separated by a
 * space. In `owpl` (one word per line) format, each token becomes a line
 * with its string, start and end offset, and each input line is closed by
 * a blank line.
 */
export class TokenizeStream extends Stream.Transform {
    private _tokenizer : TreebankTokenizer;
    private _format : OutputFormat;

    constructor(tokenizer : TreebankTokenizer, format : OutputFormat = 'text') {
        super({
            readableObjectMode: true,
            writableObjectMode: true
        });
        this._tokenizer = tokenizer;
        this._format = format;
    }

    _transform(line : string, encoding : BufferEncoding, callback : () => void) {
        const tokens = this._tokenizer.tokenize(line);
        if (this._format === 'text') {
            this.push(tokens.map((tok) => tok.string).join(' ') + '\n');
        } else {
            for (const tok of tokens)
                this.push(`${tok.string}\t${tok.start}\t${tok.end}\n`);
            this.push('\n');
        }
        callback();
    }

    _flush(callback : () => void) {
        process.nextTick(callback);
    }
}

interface TokenizeArgs extends CommonArgs {
    output_format : OutputFormat;
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('tokenize', {
        add_help: true,
        description: "Split each line of the input into tokens."
    });
    addCommonArguments(parser);
    parser.add_argument('--output-format', {
        required: false,
        default: 'text',
        choices: ['text', 'owpl'],
        help: `How to write the tokens: 'text' writes one line of space-separated tokens per input line, 'owpl' one token per line with its offsets`
    });
}

export async function execute(args : TokenizeArgs) {
    configureLogging(args.debug);

    const tokenizer = new TreebankTokenizer(makeTokenizerOptions(args));
    await pipeline(
        readAllLines(args.input_file),
        new TokenizeStream(tokenizer, args.output_format),
        args.output
    );
}
