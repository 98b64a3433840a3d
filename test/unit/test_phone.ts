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

import { groupDigits, splitCountryCode } from '../../lib/modules/phone';
import { normalize } from '../../lib/pipeline';

const LOCAL = 'سفر حەوت سەد و پەنجا سەد و بیست و سێ چل و پێنج شەست و حەوت';

export default async function main() {
    assert.deepStrictEqual(groupDigits('7501234567'), ['750', '123', '45', '67']);
    assert.deepStrictEqual(groupDigits('12345'), ['123', '45']);
    assert.deepStrictEqual(splitCountryCode('9647501234567'), ['964', '7501234567']);
    assert.deepStrictEqual(splitCountryCode('447700900123'), ['44', '7700900123']);

    assert.strictEqual(normalize('07501234567'), LOCAL);
    assert.strictEqual(normalize('0750 123 45 67'), LOCAL);
    assert.strictEqual(normalize('+964 750 123 4567'),
        'کۆ نۆ سەد و شەست و چوار حەوت سەد و پەنجا سەد و بیست و سێ چل و پێنج شەست و حەوت');
    assert.strictEqual(normalize('07501234567', { enablePauseMarkers: true }),
        'سفر حەوت سەد و پەنجا | سەد و بیست و سێ | چل و پێنج | شەست و حەوت');
}
if (!module.parent)
    main();
