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

process.on('unhandledRejection', (up) => {
    throw up;
});

import testTokenizer from './test_tokenizer';
import testConfig from './test_config';
import testNumbers from './test_numbers';
import testDateTime from './test_date_time';
import testMath from './test_math';
import testDiacritics from './test_diacritics';
import testPhone from './test_phone';
import testCurrency from './test_currency';
import testUnits from './test_units';
import testWebTechnical from './test_web_technical';
import testTransliteration from './test_transliteration';
import testLinguistics from './test_linguistics';
import testSymbolsEmoji from './test_symbols_emoji';
import testPipeline from './test_pipeline';

const TESTS : Array<[string, () => Promise<void>]> = [
    ['test_tokenizer', testTokenizer],
    ['test_config', testConfig],
    ['test_numbers', testNumbers],
    ['test_date_time', testDateTime],
    ['test_math', testMath],
    ['test_diacritics', testDiacritics],
    ['test_phone', testPhone],
    ['test_currency', testCurrency],
    ['test_units', testUnits],
    ['test_web_technical', testWebTechnical],
    ['test_transliteration', testTransliteration],
    ['test_linguistics', testLinguistics],
    ['test_symbols_emoji', testSymbolsEmoji],
    ['test_pipeline', testPipeline],
];

async function seq(tests : Array<[string, () => Promise<void>]>) {
    for (const [name, fn] of tests) {
        console.log(`Running ${name}`);
        await fn();
    }
}
seq(TESTS).catch((e) => {
    console.error(e);
    process.exit(1);
});
