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

import { Token } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

// no space is added after these
const OPENING = ['(', '[', '{', '“', '”', '"', '«'];

/**
 * Make sure every converted token is separated from its neighbors, so that
 * "5+3" does not become "پێنجکۆسێ".
 */
export default class SpacingNormalizer extends BaseModule {
    readonly name = 'SpacingNormalizer';
    readonly priority = 0;

    constructor(config : NormalizationConfig) {
        super(config, 'spacing');
    }

    process(tokens : Token[]) : Token[] {
        tokens.forEach((token, i) => {
            if (!token.isConverted || token.isTombstone)
                return;
            this._ensureSpaceAfter(token);

            const prev = this._prev(tokens, i);
            if (prev !== undefined && !OPENING.includes(prev.text))
                this._ensureSpaceAfter(prev);
        });
        return tokens;
    }
}
