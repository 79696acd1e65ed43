#!/usr/bin/env node
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

process.on('unhandledRejection', (up) => {
    throw up;
});

import * as argparse from 'argparse';

import { CommonArgs } from './lib/argutils';
import * as Tokenize from './tokenize';
import * as Normalize from './normalize';

interface SubCommand {
    initArgparse(parser : argparse.SubParser) : void;
    execute(args : CommonArgs) : Promise<void>;
}

const subcommands : { [key : string] : SubCommand } = {
    'tokenize': Tokenize,
    'normalize': Normalize,
};

async function main() {
    const parser = new argparse.ArgumentParser({
        add_help: true,
        description: "A rule-based tokenizer and normalizer for English text, in the Penn Treebank style."
    });

    const subparsers = parser.add_subparsers({
        title: 'Available sub-commands',
        dest: 'subcommand',
        required: true
    });
    for (const subcommand in subcommands)
        subcommands[subcommand].initArgparse(subparsers);

    const args = parser.parse_args();
    await subcommands[args.subcommand].execute(args);
}
main().catch((e) => {
    console.error(e);
    process.exit(1);
});
