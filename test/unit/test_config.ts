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
//
// Author: Giovanni Campagna <gcampagn@cs.stanford.edu>

import assert from 'assert';

import { ConfigurationError, DEFAULT_CONFIG, makeConfig } from '../../lib/config';
import Pipeline from '../../lib/pipeline';

function isInvalid(err : unknown) : boolean {
    return err instanceof ConfigurationError && err.code === 'EINVAL';
}

export default async function main() {
    const config = makeConfig();
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert(Object.isFrozen(config));

    const custom = makeConfig({ emojiMode: 'convert', enableMath: false });
    assert.strictEqual(custom.emojiMode, 'convert');
    assert.strictEqual(custom.enableMath, false);
    assert.strictEqual(custom.enableNumbers, true);

    // configuration coming from outside the program, such as a JSON file
    assert.throws(() => makeConfig(JSON.parse('{"emojiMode":"bogus"}')), isInvalid);
    assert.throws(() => makeConfig(JSON.parse('{"enableFoo":true}')), isInvalid);
    assert.throws(() => makeConfig(JSON.parse('{"enableNumbers":"yes"}')), isInvalid);
    assert.throws(() => new Pipeline(JSON.parse('{"shaddaMode":"triple"}')), isInvalid);
}
if (!module.parent)
    main();
