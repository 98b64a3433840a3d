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

import emojiNames from '../data/emoji.json';
import { Tag, Token } from '../tokenizer/token';
import { NormalizationConfig } from '../config';
import { BaseModule } from './base';

const EMOJI_NAMES = new Map<string, string>(Object.entries(emojiNames));

// variation selectors and skin tone modifiers do not change the name
const MODIFIERS_RE = /\ufe0f|\ud83c[\udffb-\udfff]/g;

export function emojiName(emoji : string) : string|undefined {
    return EMOJI_NAMES.get(emoji) ?? EMOJI_NAMES.get(emoji.replace(MODIFIERS_RE, ''));
}

/**
 * Remove emoji, replace them with their Kurdish name, or leave them, per
 * the configured emoji mode.
 */
export default class EmojiNormalizer extends BaseModule {
    readonly name = 'EmojiNormalizer';
    readonly priority = 45;

    constructor(config : NormalizationConfig) {
        super(config, 'emoji');
    }

    process(tokens : Token[]) : Token[] {
        const mode = this._config.emojiMode;
        if (mode === 'ignore')
            return tokens;

        for (const token of tokens) {
            if (!token.tags.has(Tag.EMOJI) || token.isConverted)
                continue;
            const name = mode === 'convert' ? emojiName(token.text) : undefined;
            if (name !== undefined)
                token.convert(name);
            else
                token.consume();
        }
        return this._compact(tokens);
    }
}
