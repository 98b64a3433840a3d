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

import { integerToWords } from '../utils/numbers';
import { appendSuffix, endsWithVowel } from '../utils/suffixes';
import { lookupUnit } from '../utils/units';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { toAsciiDigits } from '../tokenizer/helpers';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const POWERS : Readonly<Record<string, string>> = {
    '²': 'دووجا',
    '³': 'سێجا',
    '2': 'دووجا',
    '3': 'سێجا',
};

function power(text : string) : string|undefined {
    return Object.prototype.hasOwnProperty.call(POWERS, text) ? POWERS[text] : undefined;
}

/**
 * Read the unit abbreviations tagged by the unit tagger.
 *
 * "km/h" is read "کیلۆمەتر بۆ ھەر کاتژمێرێک", "m²" and "m^2" "مەتر دووجا",
 * and "2.5 km" "دوو کیلۆمەتر و نیو".
 */
export default class UnitNormalizer extends BaseModule {
    readonly name = 'UnitNormalizer';
    readonly priority = 75;

    constructor(config : NormalizationConfig) {
        super(config, 'units');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.isTombstone || token.isConverted || !token.tags.has(Tag.IS_UNIT))
                return;
            const unit = lookupUnit(token.text);
            if (unit === null)
                return;

            let text = unit.name;
            let suffix = unit.suffix;
            let last = i;

            const second = this._matchPer(tokens, i);
            if (second !== null) {
                const denominator = lookupUnit(tokens[second].text);
                if (denominator !== null) {
                    text += ` بۆ ھەر ${denominator.name}${endsWithVowel(denominator.name) ? 'یەک' : 'ێک'}`;
                    suffix = denominator.suffix;
                    last = second;
                }
            }

            const exponent = this._matchPower(tokens, last);
            if (exponent !== null) {
                text += ' ' + exponent.word;
                last = exponent.last;
            }

            const prev = this._prev(tokens, i);
            if (prev !== undefined && prev.type === TokenType.NUMBER) {
                const half = /^([0-9]+)\.5$/.exec(toAsciiDigits(prev.text));
                if (half !== null && !/^0+$/.test(half[1])) {
                    prev.convert(integerToWords(half[1]));
                    text += ' و نیو';
                }
            }

            if (last !== i) {
                token.whitespaceAfter = tokens[last].whitespaceAfter;
                for (let j = i + 1; j <= last; j++) {
                    tokens[j].consume();
                    tokens[j].whitespaceAfter = '';
                }
            }
            token.convert(appendSuffix(text, suffix));
            token.tags.add(Tag.UNIT_PROCESSED);
        });
        return this._compact(tokens);
    }

    // "km/h": the index of the second unit
    private _matchPer(tokens : Token[], i : number) : number|null {
        const slash = this._nextIndex(tokens, i);
        if (slash < 0 || tokens[slash].text !== '/' || tokens[i].whitespaceAfter)
            return null;
        const second = this._nextIndex(tokens, slash);
        if (second < 0 || !tokens[second].tags.has(Tag.IS_UNIT))
            return null;
        return second;
    }

    private _matchPower(tokens : Token[], i : number) : { word : string, last : number }|null {
        if (tokens[i].whitespaceAfter)
            return null;
        const next = this._nextIndex(tokens, i);
        if (next < 0)
            return null;

        if (tokens[next].type === TokenType.SUPERSCRIPT) {
            const word = power(tokens[next].text);
            return word === undefined ? null : { word, last: next };
        }
        if (tokens[next].text === '^' && !tokens[next].whitespaceAfter) {
            const exponent = this._nextIndex(tokens, next);
            const word = exponent < 0 ? undefined : power(tokens[exponent].text);
            return word === undefined ? null : { word, last: exponent };
        }
        return null;
    }
}
