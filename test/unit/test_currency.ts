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

import { readAmount } from '../../lib/modules/currency';
import { normalize } from '../../lib/pipeline';

const TEST_CASES : Array<[string, string]> = [
    ['$12.50', 'دوازدە دۆلار و پەنجا سەنت'],
    ['$ 12.50', 'دوازدە دۆلار و پەنجا سەنت'],
    ['100 $', 'سەد دۆلار'],
    ['0.75 €', 'حەفتا و پێنج سەنت'],
    ['5000 د.ع', 'پێنج ھەزار دینار'],
    ['1,500 IQD', 'ھەزار و پێنج سەد دینار'],
    ['نرخی $', 'نرخی دۆلار'],
];

export default async function main() {
    // decimals of a currency without a subunit are read as a decimal number
    assert.strictEqual(readAmount('2.50', { name: 'لیرە' }), 'دوو پۆینت پێنج لیرە');
    assert.strictEqual(readAmount('12', { name: 'دۆلار', subunit: 'سەنت' }), 'دوازدە دۆلار');
    assert.strictEqual(readAmount('1.2.3', { name: 'دۆلار' }), null);

    for (let i = 0; i < TEST_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = TEST_CASES[i];
        assert.strictEqual(normalize(input), expected);
    }
}
if (!module.parent)
    main();
