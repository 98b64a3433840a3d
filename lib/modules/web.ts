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

import { readCode } from '../utils/reading';
import { Token, TokenType } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

/**
 * Read URLs and email addresses piece by piece.
 *
 * Known words come from the pronunciation lexicon ("gmail", "com"), other
 * pieces are spelled letter by letter or transliterated, and separators are
 * read by name: "user@gmail.com" is "یوسەر ئەت جیمەیڵ دۆت کۆم".
 */
export default class WebNormalizer extends BaseModule {
    readonly name = 'WebNormalizer';
    readonly priority = 100;

    constructor(config : NormalizationConfig) {
        super(config, 'web');
    }

    process(tokens : Token[]) : Token[] {
        for (const token of tokens) {
            if (token.type !== TokenType.URL && token.type !== TokenType.EMAIL)
                continue;
            const address = token.type === TokenType.EMAIL ? token.text.replace(/^mailto:/i, '') : token.text;
            const spoken = readCode(address);
            if (spoken === '') {
                this._logger.debug(`nothing to read in ${token.text}`);
                continue;
            }
            token.convert(spoken);
        }
        return tokens;
    }
}
