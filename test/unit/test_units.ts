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

import { lookupUnit } from '../../lib/utils/units';
import Tokenizer from '../../lib/tokenizer';
import { Tag } from '../../lib/tokenizer/token';
import UnitTagger from '../../lib/modules/unit-tagger';
import { makeConfig } from '../../lib/config';
import { normalize } from '../../lib/pipeline';

const TEST_CASES : Array<[string, string]> = [
    ['100 km/h', 'سەد کیلۆمەتر بۆ ھەر کاتژمێرێک'],
    ['2.5 km', 'دوو کیلۆمەتر و نیو'],
    ['10m²', 'دە مەتر دووجا'],
    ['10 m^2', 'دە مەتر دووجا'],
    ['25°C', 'بیست و پێنج پلەی سەدی'],
    ['5kmـە', 'پێنج کیلۆمەترە'],
];

function testTagger() {
    const tokenizer = new Tokenizer();
    const tagger = new UnitTagger(makeConfig());

    const withNumber = tagger.process(tokenizer.tokenize('10m'));
    assert(withNumber[1].tags.has(Tag.IS_UNIT));

    // the same word without a number before it is not a unit
    const prose = tagger.process(tokenizer.tokenize('I am m'));
    assert.strictEqual(prose[2].text, 'm');
    assert(!prose[2].tags.has(Tag.IS_UNIT));

    const rate = tagger.process(tokenizer.tokenize('5 km/h'));
    assert(rate[1].tags.has(Tag.IS_UNIT));
    assert(rate[3].tags.has(Tag.IS_UNIT));
}

export default async function main() {
    assert.deepStrictEqual(lookupUnit('KM'), { name: 'کیلۆمەتر', suffix: '' });
    assert.deepStrictEqual(lookupUnit('kmـە'), { name: 'کیلۆمەتر', suffix: 'ە' });
    assert.strictEqual(lookupUnit('kilo'), null);
    testTagger();

    for (let i = 0; i < TEST_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = TEST_CASES[i];
        assert.strictEqual(normalize(input), expected);
    }
}
if (!module.parent)
    main();
