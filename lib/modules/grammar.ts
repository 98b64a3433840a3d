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

import { appendSuffix, isGrammarSuffix } from '../utils/suffixes';
import { Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

/**
 * Attach Kurdish suffixes written after a number, a symbol or a foreign
 * word to its spoken form: "5ـەم" is "پێنجەم" and "3ی" is "سێی".
 */
export default class GrammarNormalizer extends BaseModule {
    readonly name = 'GrammarNormalizer';
    readonly priority = 10;

    constructor(config : NormalizationConfig) {
        super(config, 'grammar');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (token.type !== TokenType.WORD || token.isConverted || token.isTombstone)
                return;

            const prev = this._prev(tokens, i);
            if (prev === undefined || !prev.isConverted || prev.whitespaceAfter !== '')
                return;
            const suffix = token.text.replace(/^[ـ\u200c]+/, '');
            if (!isGrammarSuffix(suffix))
                return;

            prev.text = appendSuffix(prev.text, suffix);
            prev.whitespaceAfter = token.whitespaceAfter;
            token.consume();
            token.whitespaceAfter = '';
        });
        return this._compact(tokens);
    }
}
