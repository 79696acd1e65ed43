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

import { resolveOptions } from '../lib/config';
import Normalizer from '../lib/tokenizer/normalizer';
import {
    CommonArgs,
    addCommonArguments,
    configureLogging,
    makeTokenizerOptions,
    readAllLines,
} from './lib/argutils';

// normalizes already tokenized text: the words are not split further
export class NormalizeStream extends Stream.Transform {
    private _normalizer : Normalizer;

    constructor(normalizer : Normalizer) {
        super({
            readableObjectMode: true,
            writableObjectMode: true
        });
        this._normalizer = normalizer;
    }

    _transform(line : string, encoding : BufferEncoding, callback : () => void) {
        const words = line.split(/\s+/).filter((w) => w.length > 0);
        this.push(words.map((w) => this._normalizer.normalize(w)).join(' ') + '\n');
        callback();
    }

    _flush(callback : () => void) {
        process.nextTick(callback);
    }
}

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('normalize', {
        add_help: true,
        description: "Normalize each space-separated word of the input, without tokenizing it."
    });
    addCommonArguments(parser);
}

export async function execute(args : CommonArgs) {
    configureLogging(args.debug);

    const normalizer = new Normalizer(resolveOptions(makeTokenizerOptions(args)));
    await pipeline(
        readAllLines(args.input_file),
        new NormalizeStream(normalizer),
        args.output
    );
}
