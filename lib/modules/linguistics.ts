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

import abbreviationTable from '../data/abbreviations.json';
import nameTable from '../data/arabic-names.json';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';
import { detectScript } from './script-tagger';

const ABBREVIATIONS = new Map<string, string>(Object.entries(abbreviationTable));
const NAMES = new Map<string, string>(Object.entries(nameTable));

// the longest abbreviation, in tokens: "پ.ز." is four
const MAX_ABBREVIATION_TOKENS = 4;

/**
 * Rewrite Arabic letter forms in Kurdish spelling, and drop tatweel.
 *
 * "ه" is "ە" at the end of a word or before a zero-width non-joiner,
 * and "ھ" elsewhere.
 */
export function normalizeLetters(word : string) : string {
    return word
        .replace(/ـ/g, '')
        .replace(/ك/g, 'ک')
        .replace(/[يى]/g, 'ی')
        .replace(/ة/g, 'ە')
        .replace(/ه(?=\u200c|$)\u200c?/g, 'ە')
        .replace(/ه/g, 'ھ');
}

function isArabicScript(token : Token) : boolean {
    if (token.tags.has(Tag.SCRIPT_KURDISH) || token.tags.has(Tag.SCRIPT_ARABIC))
        return true;
    const script = detectScript(token.text);
    return script === Tag.SCRIPT_KURDISH || script === Tag.SCRIPT_ARABIC;
}

/**
 * Expand abbreviations, read common Arabic names, and normalize the
 * spelling of Arabic-script words.
 */
export default class LinguisticsNormalizer extends BaseModule {
    readonly name = 'LinguisticsNormalizer';
    readonly priority = 30;

    constructor(config : NormalizationConfig) {
        super(config, 'linguistics');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.isTombstone || token.isConverted || token.type !== TokenType.WORD || !isArabicScript(token))
                return;

            if (this._expandDotted(tokens, i))
                return;

            const expansion = ABBREVIATIONS.get(token.text) ?? NAMES.get(token.text);
            if (expansion !== undefined) {
                token.convert(expansion);
                return;
            }

            token.text = normalizeLetters(token.text);
            if (token.isTombstone)
                token.consume();
        });
        return this._compact(tokens);
    }

    // abbreviations written with dots span several tokens: "پ.ز", "د."
    private _expandDotted(tokens : Token[], i : number) : boolean {
        for (let length = MAX_ABBREVIATION_TOKENS; length >= 2; length--) {
            const window = tokens.slice(i, i + length);
            if (window.length < length || window.slice(0, -1).some((t) => t.whitespaceAfter !== '' || t.isTombstone))
                continue;
            const expansion = ABBREVIATIONS.get(window.map((t) => t.text).join(''));
            if (expansion === undefined)
                continue;

            tokens[i].convert(expansion);
            tokens[i].whitespaceAfter = window[window.length-1].whitespaceAfter;
            for (const consumed of window.slice(1)) {
                consumed.consume();
                consumed.whitespaceAfter = '';
            }
            return true;
        }
        return false;
    }
}
