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

import { readVocalized, removeDiacritics, isVocalized } from '../../lib/modules/diacritics';
import { normalize } from '../../lib/pipeline';

// ِ kasra, َ fatha, ُ damma, ْ sukun, ّ shadda
const KITAB = 'ک\u0650ت\u064eاب';
const SHAMS = '\u0671لش\u0651\u064eم\u0652س';
const BISMI = 'ب\u0650س\u0652م\u0650';
const ALLAHI = '\u0671لل\u0651\u064eه\u0650';
const ALLAHU = '\u0671لل\u0651\u064eه\u064f';
const MIRSAD = 'م\u0650ر\u0652ص\u064eاد';
const MIN = 'م\u0650ن\u0652';
const WALAD = 'و\u064eل\u064eد';
const QARN = 'ق\u064eر\u0652ن';
const FIRN = 'ف\u0650ر\u0652ن';
const RABB = 'ر\u0652ب';

function testWords() {
    assert.strictEqual(readVocalized(KITAB, null, undefined, 'double').text, 'کیتاب');
    assert.strictEqual(readVocalized(KITAB, null, undefined, 'double').final, 'none');
    assert.strictEqual(readVocalized(SHAMS, null, undefined, 'double').text, 'ئەششەمس');
    // the connecting alef is silent inside an utterance
    assert.strictEqual(readVocalized(SHAMS, 'a', undefined, 'double').text, 'ششەمس');
    assert.strictEqual(readVocalized(SHAMS, null, undefined, 'remove').text, 'ئەشەمس');
    // heavy ra before a heavy letter
    assert.strictEqual(readVocalized(MIRSAD, null, undefined, 'double').text, 'میڕساد');
    // a final nun before ب is read م
    assert.strictEqual(readVocalized(MIN, 'none', 'ب', 'double').text, 'میم');
    assert.strictEqual(readVocalized(MIN, 'none', 'ک', 'double').text, 'مین');
}

function testNoonBeforeSemivowel() {
    // the nun merges into a following و or ي, which doubles
    assert.deepStrictEqual(readVocalized(MIN, 'none', 'و', 'double'), { text: 'می', final: 'none', mergesIntoNext: true });
    assert.strictEqual(readVocalized(MIN, 'none', 'ي', 'double').mergesIntoNext, true);
    assert.strictEqual(readVocalized(MIN, 'none', 'ک', 'double').mergesIntoNext, false);
    assert.strictEqual(readVocalized(WALAD, 'none', undefined, 'double', true).text, 'ووەلەد');
    assert.strictEqual(readVocalized(WALAD, 'none', undefined, 'remove', true).text, 'وەلەد');

    assert.strictEqual(normalize(MIN + ' ' + WALAD), 'می ووەلەد');
    assert.strictEqual(normalize(MIN + ' ' + WALAD, { shaddaMode: 'remove' }), 'می وەلەد');
}

function testRa() {
    // a silent ra is heavy after fatha or damma, light after kasra
    assert.strictEqual(readVocalized(QARN, null, undefined, 'double').text, 'قەڕن');
    assert.strictEqual(readVocalized(FIRN, null, undefined, 'double').text, 'فیرن');
    // the sound carried over from the previous word counts too
    assert.strictEqual(readVocalized(RABB, 'a', undefined, 'double').text, 'ڕب');
    assert.strictEqual(readVocalized(RABB, 'u', undefined, 'double').text, 'ڕب');
    assert.strictEqual(readVocalized(RABB, 'i', undefined, 'double').text, 'رب');
}

function testAllah() {
    assert.deepStrictEqual(readVocalized(ALLAHU, null, undefined, 'double'), { text: 'ئەڵڵاھو', final: 'u', mergesIntoNext: false });
    // light after kasra
    assert.strictEqual(readVocalized(ALLAHU, 'i', undefined, 'double').text, 'للاھو');
    assert.strictEqual(readVocalized(ALLAHU, 'a', undefined, 'double').text, 'ڵڵاھو');
}

function testHelpers() {
    assert.strictEqual(removeDiacritics(KITAB), 'کتاب');
    assert(isVocalized(KITAB));
    assert(!isVocalized('کتاب'));
}

function testPipeline() {
    assert.strictEqual(normalize(SHAMS), 'ئەششەمس');
    // the first word ends in kasra, so the name of God is light
    assert.strictEqual(normalize(BISMI + ' ' + ALLAHI), 'بیسمی للاھی');
    assert.strictEqual(normalize(KITAB, { diacriticsMode: 'remove' }), 'کتاب');
    assert.strictEqual(normalize(KITAB, { diacriticsMode: 'keep' }), KITAB);
    assert.strictEqual(normalize(KITAB, { enableDiacritics: false }), KITAB);
}

export default async function main() {
    testWords();
    testNoonBeforeSemivowel();
    testRa();
    testAllah();
    testHelpers();
    testPipeline();
}
if (!module.parent)
    main();
