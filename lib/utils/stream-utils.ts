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

import * as Stream from 'stream';

type WriteCallback = (err ?: Error) => void;

/**
 * A sink that collects every object written to it.
 */
class ArrayAccumulator<T> extends Stream.Writable implements Stream.Writable {
    private _buffer : T[];

    constructor() {
        super({ objectMode: true });

        this._buffer = [];
    }

    _write(obj : T, encoding : BufferEncoding, callback : WriteCallback) : void {
        this._buffer.push(obj);
        callback();
    }

    read() : Promise<T[]> {
        return new Promise((resolve, reject) => {
            this.on('finish', () => resolve(this._buffer));
            this.on('error', reject);
        });
    }
}

async function* concat(streams : Stream.Readable[]) : AsyncGenerator<unknown> {
    for (const stream of streams) {
        for await (const chunk of stream)
            yield chunk;
    }
}

/**
 * Read the streams one after the other, as a single object-mode stream.
 *
 * Each stream is only read after the previous one has ended.
 */
function chain(streams : Stream.Readable[]) : Stream.Readable {
    return Stream.Readable.from(concat(streams));
}

export {
    ArrayAccumulator,
    chain,
};
