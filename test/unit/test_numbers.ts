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

import {
    numberToWords,
    integerToWords,
    intToKurdish,
    digitGroupToWords
} from '../../lib/utils/numbers';
import Tokenizer from '../../lib/tokenizer';
import NumberNormalizer from '../../lib/modules/number';
import { makeConfig } from '../../lib/config';

const TEST_CASES : Array<[string, string|null]> = [
    ['0', 'سفر'],
    ['7', 'حەوت'],
    ['15', 'پازدە'],
    ['21', 'بیست و یەک'],
    ['100', 'سەد'],
    ['101', 'سەد و یەک'],
    ['123', 'سەد و بیست و سێ'],
    ['250', 'دوو سەد و پەنجا'],
    ['1000', 'ھەزار'],
    ['1001', 'ھەزار و یەک'],
    ['2500', 'دوو ھەزار و پێنج سەد'],
    ['1,000,000', 'یەک ملیۆن'],
    ['3.14', 'سێ پۆینت چواردە'],
    ['2.05', 'دوو پۆینت سفر پێنج'],
    ['2.5', 'دوو و نیو'],
    ['0.5', 'نیو'],
    ['0025', 'سفر سفر دوو پێنج'],
    ['1.5e3', 'یەک و نیو کەڕەتی دە بە توانی سێ'],
    ['2e-5', 'دوو کەڕەتی دە بە توانی سالب پێنج'],
    ['1' + '0'.repeat(22), 'یەک کەڕەتی دە بە توانی بیست و دوو'],
    ['٢٥', 'بیست و پێنج'],
    ['abc', null],
];

const MODULE_CASES : Array<[string, string]> = [
    ['-5', 'سالب پێنج'],
    ['ژمارە -3', 'ژمارە سالب سێ'],
    // after a number, "-" is not a sign
    ['5-3', 'پێنج-سێ'],
    ['(-2)', '(سالب دوو)'],
];

function testHelpers() {
    assert.strictEqual(integerToWords('990'), 'نۆ سەد و نەوەد');
    assert.strictEqual(intToKurdish(-12), 'سالب دوازدە');
    assert.throws(() => intToKurdish(1.5), RangeError);
    assert.strictEqual(digitGroupToWords('007'), 'سفر سفر حەوت');
    assert.strictEqual(digitGroupToWords('00'), 'سفر سفر');
}

export default async function main() {
    for (let i = 0; i < TEST_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = TEST_CASES[i];
        assert.strictEqual(numberToWords(input), expected);
    }
    testHelpers();

    const tokenizer = new Tokenizer();
    const normalizer = new NumberNormalizer(makeConfig());
    for (const [input, expected] of MODULE_CASES)
        assert.strictEqual(tokenizer.detokenize(normalizer.process(tokenizer.tokenize(input))), expected);
}
if (!module.parent)
    main();
