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

import { normalizeLetters } from '../../lib/modules/linguistics';
import { detectScript } from '../../lib/modules/script-tagger';
import { Tag } from '../../lib/tokenizer/token';
import { normalize } from '../../lib/pipeline';

const LETTER_CASES : Array<[string, string]> = [
    ['كتاب', 'کتاب'],
    ['مدرسة', 'مدرسە'],
    ['هەولێر', 'ھەولێر'],
    ['كوردستانـى', 'کوردستانی'],
    ['ماله', 'مالە'],
];

const SCRIPT_CASES : Array<[string, Tag]> = [
    ['hello', Tag.SCRIPT_LATIN],
    ['سڵاو', Tag.SCRIPT_KURDISH],
    ['كتاب', Tag.SCRIPT_ARABIC],
    ['Путин', Tag.SCRIPT_CYRILLIC],
    ['λόγος', Tag.SCRIPT_GREEK],
];

const PIPELINE_CASES : Array<[string, string]> = [
    ['هتد', 'ھەتا دوایی'],
    ['د. ئەحمەد', 'دکتۆر ئەحمەد'],
    ['علي', 'عەلی'],
    ['كتاب', 'کتاب'],
];

export default async function main() {
    for (const [input, expected] of LETTER_CASES)
        assert.strictEqual(normalizeLetters(input), expected);
    for (const [input, expected] of SCRIPT_CASES)
        assert.strictEqual(detectScript(input), expected);

    for (let i = 0; i < PIPELINE_CASES.length; i++) {
        console.log(`Test case #${i+1}`);
        const [input, expected] = PIPELINE_CASES[i];
        assert.strictEqual(normalize(input), expected);
    }
    assert.strictEqual(normalize('كتاب', { enableLinguistics: false }), 'كتاب');
}
if (!module.parent)
    main();
