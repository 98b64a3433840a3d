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

import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

// letters only used in Kurdish: ڕ ڵ ێ ۆ ە پ چ ژ گ ڤ ھ ی ک
const KURDISH_LETTERS = /[\u0695\u06b5\u06ce\u06c6\u06d5\u067e\u0686\u0698\u06af\u06a4\u06be\u06cc\u06a9]/;
// Arabic letter forms and harakat that Kurdish spelling does not use
const ARABIC_LETTERS = /[\u0643\u064a\u0629\u0649\u064b-\u0652\u0671]/;

/**
 * Find the script a word is written in, from its letters.
 */
export function detectScript(text : string) : Tag {
    if (/[a-z\u00c0-\u024f\u1e00-\u1eff]/i.test(text))
        return Tag.SCRIPT_LATIN;
    if (/[\u0400-\u04ff]/.test(text))
        return Tag.SCRIPT_CYRILLIC;
    if (/[\u0370-\u03ff]/.test(text))
        return Tag.SCRIPT_GREEK;
    if (/[\u0600-\u06ff\u0750-\u077f\u08a0-\u08ff\ufb50-\ufdff\ufe70-\ufefc]/.test(text)) {
        if (KURDISH_LETTERS.test(text))
            return Tag.SCRIPT_KURDISH;
        if (ARABIC_LETTERS.test(text))
            return Tag.SCRIPT_ARABIC;
        return Tag.SCRIPT_KURDISH;
    }
    return Tag.SCRIPT_OTHER;
}

/**
 * Tag every word with the script it is written in.
 */
export default class ScriptTagger extends BaseModule {
    readonly name = 'ScriptTagger';
    readonly priority = 35;

    constructor(config : NormalizationConfig) {
        super(config, 'linguistics');
    }

    process(tokens : Token[]) : Token[] {
        for (const token of tokens) {
            if (token.type === TokenType.WORD && !token.isConverted)
                token.tags.add(detectScript(token.text));
        }
        return tokens;
    }
}
