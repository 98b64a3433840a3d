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

import { NEGATIVE, numberToWords } from '../utils/numbers';
import { Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const MINUS_SIGNS = ['-', '−'];

// tokens after which a minus sign is a sign and not a subtraction or range
const UNARY_CONTEXT = ['(', '[', '{', '=', ',', '،', ':', '+', '*', '×', '/', '÷', '^', '<', '>'];

/**
 * Read NUMBER tokens in words.
 *
 * A minus sign written tight against the number, in unary position
 * ("-5", "x = -2"), is merged into the number and read "سالب".
 */
export default class NumberNormalizer extends BaseModule {
    readonly name = 'NumberNormalizer';
    readonly priority = 60;

    constructor(config : NormalizationConfig) {
        super(config, 'numbers');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.type !== TokenType.NUMBER)
                return;

            const words = numberToWords(token.text);
            if (words === null) {
                this._logger.debug(`cannot read ${token.text} as a number`);
                return;
            }

            const signIndex = this._unarySignIndex(tokens, i);
            if (signIndex >= 0) {
                tokens[signIndex].consume();
                token.convert(NEGATIVE + ' ' + words);
            } else {
                token.convert(words);
            }
        });
        return this._compact(tokens);
    }

    private _unarySignIndex(tokens : Token[], i : number) : number {
        const j = this._prevIndex(tokens, i);
        if (j < 0)
            return -1;
        const sign = tokens[j];
        if (sign.type !== TokenType.SYMBOL || !MINUS_SIGNS.includes(sign.text) || sign.whitespaceAfter)
            return -1;

        const before = this._prev(tokens, j);
        if (before === undefined || UNARY_CONTEXT.includes(before.originalText))
            return j;
        // after a word, "-5" is a sign; after a number it is a range or a subtraction
        if (before.whitespaceAfter && before.type !== TokenType.NUMBER)
            return j;
        return -1;
    }
}
