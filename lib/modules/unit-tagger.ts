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

import { lookupUnit } from '../utils/units';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule, isNumeric } from './base';

/**
 * Tag unit abbreviations.
 *
 * Abbreviations such as "m" or "in" are also ordinary words, so a token is
 * only tagged as a unit after a number ("10 m", "10m"), or after a "/" that
 * follows a unit ("km/h").
 */
export default class UnitTagger extends BaseModule {
    readonly name = 'UnitTagger';
    readonly priority = 88;

    constructor(config : NormalizationConfig) {
        super(config, 'units');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.isConverted || (token.type !== TokenType.WORD && token.type !== TokenType.SYMBOL))
                return;
            if (lookupUnit(token.text) === null)
                return;

            const prevIndex = this._prevIndex(tokens, i);
            if (prevIndex < 0)
                return;
            const prev = tokens[prevIndex];
            if (isNumeric(prev) && !prev.isConverted) {
                token.tags.add(Tag.IS_UNIT);
                return;
            }
            if (prev.text === '/' && !prev.whitespaceAfter && this._prev(tokens, prevIndex)?.tags.has(Tag.IS_UNIT))
                token.tags.add(Tag.IS_UNIT);
        });
        return tokens;
    }
}
