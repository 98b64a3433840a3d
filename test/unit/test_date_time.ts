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

import { dateToWords, timeToWords, timePeriod, matchMarker } from '../../lib/modules/date-time';
import { normalize } from '../../lib/pipeline';

const DATE_CASES : Array<[string, string|null]> = [
    ['2025/12/03', 'سێی کانونی یەکەمی ساڵی دوو ھەزار و بیست و پێنج'],
    ['15/03/2024', 'پازدەی ئازاری ساڵی دوو ھەزار و بیست و چوار'],
    // the field above 12 is the day
    ['03/15/2024', 'پازدەی ئازاری ساڵی دوو ھەزار و بیست و چوار'],
    ['2025/13/01', null],
    ['2025/12/00', null],
];

const TIME_CASES : Array<[string, 'am'|'pm'|'night'|null, string]> = [
    ['12:30', 'pm', 'دوازدە و نیوی نیوەڕۆ'],
    ['12:30', null, 'دوازدە و نیو'],
    ['3:15', 'pm', 'سێ و پازدە خولەکی دوای نیوەڕۆ'],
    ['8:00', null, 'ھەشت'],
    ['14:00', null, 'دووی دوای نیوەڕۆ'],
    ['0:45', null, 'دوازدە و چل و پێنج خولەکی نیوەشەو'],
    ['2:00', 'night', 'دووی شەو'],
    ['10:00', 'night', 'دەی شەو'],
    ['12:00', 'am', 'دوازدەی نیوەشەو'],
];

const PIPELINE_CASES : Array<[string, string]> = [
    ['2025/12/03', 'سێی کانونی یەکەمی ساڵی دوو ھەزار و بیست و پێنج'],
    ['12:30 PM', 'دوازدە و نیوی نیوەڕۆ'],
    ['12:30pm', 'دوازدە و نیوی نیوەڕۆ'],
    ['12:30', 'دوازدە و نیو'],
    ['کاتژمێر 12:30 PMـە', 'کاتژمێر دوازدە و نیوی نیوەڕۆیە'],
    ['لە 3:15 ئێوارە دێم', 'لە سێ و پازدە خولەکی دوای نیوەڕۆ دێم'],
    ['12:30 P.M.', 'دوازدە و نیوی نیوەڕۆ .'],
];

function testMarkers() {
    assert.deepStrictEqual(matchMarker('PM'), { meridiem: 'pm', suffix: '' });
    assert.deepStrictEqual(matchMarker('ی ئێوارە'), { meridiem: 'pm', suffix: '' });
    assert.deepStrictEqual(matchMarker('پێش نیوەڕۆ'), { meridiem: 'am', suffix: '' });
    assert.strictEqual(matchMarker('ئێوارە دێم'), null);
    assert.strictEqual(timePeriod(5), 'بەرەبەیان');
    assert.strictEqual(timePeriod(23), 'شەو');
}

export default async function main() {
    for (const [input, expected] of DATE_CASES)
        assert.strictEqual(dateToWords(input), expected);
    for (const [input, meridiem, expected] of TIME_CASES)
        assert.strictEqual(timeToWords(input, meridiem), expected);
    testMarkers();

    for (let i = 0; i < PIPELINE_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = PIPELINE_CASES[i];
        assert.strictEqual(normalize(input), expected);
    }
}
if (!module.parent)
    main();
