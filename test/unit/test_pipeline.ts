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

import Pipeline, { normalize, cleanWhitespace } from '../../lib/pipeline';
import { Token } from '../../lib/tokenizer/token';
import { Module } from '../../lib/modules/base';

const STABLE_INPUTS = [
    '123',
    '5 + 3 - 2 * 4 / 2 = 10',
    '2025/12/03',
    'کاتژمێر 12:30 PMـە',
    '100 km/h',
    'user@gmail.com',
    'x = -5',
    'Hello World',
];

class BrokenModule implements Module {
    readonly name = 'BrokenModule';
    readonly priority = 70;

    process(tokens : Token[]) : Token[] {
        tokens[0].text = 'broken';
        throw new Error('test failure');
    }
}

function testModuleOrder() {
    const pipeline = new Pipeline();
    assert.deepStrictEqual(pipeline.modules.map((m) => m.name), [
        'WebNormalizer',
        'PhoneNormalizer',
        'DateTimeNormalizer',
        'TechnicalNormalizer',
        'UnitTagger',
        'CurrencyNormalizer',
        'MathNormalizer',
        'UnitNormalizer',
        'NumberNormalizer',
        'SymbolNormalizer',
        'EmojiNormalizer',
        'DiacriticsNormalizer',
        'ScriptTagger',
        'LinguisticsNormalizer',
        'TransliterationNormalizer',
        'GrammarNormalizer',
        'SpacingNormalizer',
    ]);

    const reduced = new Pipeline({ enableLinguistics: false, enableUnits: false });
    const names = reduced.modules.map((m) => m.name);
    assert(!names.includes('ScriptTagger'));
    assert(!names.includes('LinguisticsNormalizer'));
    assert(!names.includes('UnitTagger'));
    assert(!names.includes('UnitNormalizer'));
    assert(names.includes('SpacingNormalizer'));
}

function testFailingModule() {
    const pipeline = new Pipeline();
    pipeline.addModule(new BrokenModule());
    assert.strictEqual(pipeline.modules[8].name, 'BrokenModule');
    assert.strictEqual(pipeline.normalize('123'), 'سەد و بیست و سێ');
}

function testWhitespace() {
    assert.strictEqual(cleanWhitespace('  a \t b \r\n\n c  '), 'a b\nc');
    assert.strictEqual(normalize(''), '');
    assert.strictEqual(normalize('   '), '');
    assert.strictEqual(normalize('سڵاو\n\n5'), 'سڵاو\nپێنج');
}

// converted tokens are spaced on both sides, punctuation included
function testSpacing() {
    assert.strictEqual(normalize('سڵاو 5.'), 'سڵاو پێنج .');
    assert.strictEqual(normalize('سڵاو 5، 6'), 'سڵاو پێنج ، شەش');
}

function testStability() {
    const pipeline = new Pipeline();
    for (const input of STABLE_INPUTS) {
        const once = pipeline.normalize(input);
        assert(!/[0-9a-z]/i.test(once), `${input} was not fully converted: ${once}`);
        assert.strictEqual(pipeline.normalize(once), once);
    }
}

export default async function main() {
    testModuleOrder();
    testFailingModule();
    testWhitespace();
    testSpacing();
    testStability();

    assert.strictEqual(normalize('123'), 'سەد و بیست و سێ');
    assert.strictEqual(normalize('123', { enableNumbers: false }), '123');
}
if (!module.parent)
    main();
