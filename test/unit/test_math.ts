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

import { formatFraction, scriptDigits } from '../../lib/modules/math';
import { normalize } from '../../lib/pipeline';

const TEST_CASES : Array<[string, string]> = [
    ['5 + 3 - 2 * 4 / 2 = 10', 'پێنج کۆ سێ کەم دوو کەڕەتی چوار دابەش دوو یەکسانە بە دە'],
    // a "/" between two bare numbers is a fraction, inside an expression it is a division
    ['6 / 3', 'شەش لەسەر سێ'],
    ['1 + 6 / 3', 'یەک کۆ شەش دابەش سێ'],
    ['1/2', 'نیوە'],
    ['1/4', 'چارەک'],
    ['3/4', 'سێ لەسەر چوار'],
    ['2 1/2', 'دوو و نیو'],
    ['½', 'نیوە'],
    ['3½', 'سێ و نیو'],
    ['1990-2000', 'ھەزار و نۆ سەد و نەوەد بۆ دوو ھەزار'],
    ['x = -5', 'ئێکس یەکسانە بە سالب پێنج'],
    // a tight hyphen after a variable is a subtraction
    ['x-5 = 0', 'ئێکس کەم پێنج یەکسانە بە سفر'],
    ['y = 2x-3', 'وای یەکسانە بە دوو ئێکس کەم سێ'],
    ['a-b = 2', 'ئەی کەم بی یەکسانە بە دوو'],
    ['2x + 3', 'دوو ئێکس کۆ سێ'],
    ['(2 + 3) × 4', 'کەوانە دوو کۆ سێ داخستنی کەوانە کەڕەتی چوار'],
    ['sin(x)', 'ساینی کەوانە ئێکس داخستنی کەوانە'],
    ['x²', 'ئێکس توان دوو'],
    ['H₂O', 'ئێچ بنچینە دوو ئۆ'],
    ['π', 'پای'],
    ['کورد + عەرەب', 'کورد لەگەڵ عەرەب'],
];

export default async function main() {
    assert.strictEqual(formatFraction(1, 2, true), 'و نیو');
    assert.strictEqual(formatFraction(2, 3, false), 'دوو لەسەر سێ');
    assert.strictEqual(formatFraction(2, 3, true), 'و دوو لەسەر سێ');
    assert.strictEqual(scriptDigits('²³', '⁰¹²³⁴⁵⁶⁷⁸⁹'), '23');
    assert.strictEqual(scriptDigits('x', '⁰¹²³⁴⁵⁶⁷⁸⁹'), null);

    for (let i = 0; i < TEST_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = TEST_CASES[i];
        assert.strictEqual(normalize(input), expected);
    }
}
if (!module.parent)
    main();
