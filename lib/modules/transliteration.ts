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

import { isAcronym, readForeignWord } from '../utils/reading';
import { appendSuffix, splitSuffix } from '../utils/suffixes';
import { Tag, Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const FOREIGN_START = /^[a-z\u00c0-\u024f\u1e00-\u1eff\u0370-\u03ff\u0400-\u04ff]/i;

/**
 * Write Latin, Cyrillic and Greek words in the Kurdish alphabet.
 *
 * A Kurdish suffix attached to the foreign word is kept: "UKم" is "یو کەیم".
 */
export default class TransliterationNormalizer extends BaseModule {
    readonly name = 'TransliterationNormalizer';
    readonly priority = 20;

    constructor(config : NormalizationConfig) {
        super(config, 'transliteration');
    }

    process(tokens : Token[]) : Token[] {
        for (const token of tokens) {
            if (token.type !== TokenType.WORD || token.isConverted || !FOREIGN_START.test(token.text))
                continue;

            const [base, suffix] = splitSuffix(token.text);
            const parts = base.split(/[-_]+/).filter((part) => part !== '');
            const spoken = parts.map(readForeignWord).filter((part) => part !== '').join(' ');
            if (spoken === '') {
                this._logger.debug(`cannot transliterate ${token.text}`);
                continue;
            }

            token.convert(appendSuffix(spoken, suffix));
            if (parts.some((part) => part.length === 1 || isAcronym(part)))
                token.tags.add(Tag.IS_SPELLED_OUT);
        }
        return tokens;
    }
}
