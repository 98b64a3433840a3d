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

import { romanize, transliterateWord } from '../../lib/utils/transliterate';
import { readForeignWord, isAcronym } from '../../lib/utils/reading';
import { splitSuffix, appendSuffix } from '../../lib/utils/suffixes';
import { normalize } from '../../lib/pipeline';

const WORDS : Array<[string, string]> = [
    ['Razwan', 'ڕازوان'],
    ['Ahmed', 'ئاھمەد'],
    ['shop', 'شۆپ'],
    ['note', 'نۆت'],
    ['Путин', 'پوتین'],
];

function testSuffixes() {
    assert.deepStrictEqual(splitSuffix('UKم'), ['UK', 'م']);
    assert.deepStrictEqual(splitSuffix('hـە'), ['h', 'ە']);
    assert.deepStrictEqual(splitSuffix('Google'), ['Google', '']);
    assert.strictEqual(appendSuffix('نیوەڕۆ', 'ە'), 'نیوەڕۆیە');
    assert.strictEqual(appendSuffix('پێنج', 'ەم'), 'پێنجەم');
    assert.strictEqual(appendSuffix('نیوەڕۆ', 'ەکە'), 'نیوەڕۆیەکە');
    // only "ە", "ەکە" and "ەکان" take the linking "ی"
    assert.strictEqual(appendSuffix('نیوەڕۆ', 'ەوە'), 'نیوەڕۆەوە');
}

export default async function main() {
    for (const [input, expected] of WORDS)
        assert.strictEqual(transliterateWord(input), expected);
    assert.strictEqual(romanize('Café'), 'cafe');
    assert(isAcronym('NASA'));
    assert(!isAcronym('Nasa'));
    assert.strictEqual(readForeignWord('NASA'), 'ئێن ئەی ئێس ئەی');
    assert.strictEqual(readForeignWord('hello'), 'ھێلۆ');
    testSuffixes();

    assert.strictEqual(normalize('Hello World'), 'ھێلۆ وۆرڵد');
    assert.strictEqual(normalize('UKم'), 'یو کەیم');
    assert.strictEqual(normalize('Razwan'), 'ڕازوان');
    assert.strictEqual(normalize('Razwan', { enableTransliteration: false }), 'Razwan');
}
if (!module.parent)
    main();
